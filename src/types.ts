// src/types.ts
export enum OpType {
  ARITH = 'ARITH',
  MOVE = 'MOVE',
  SEEK = 'SEEK',
  JUMP = 'JUMP',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
  SET = 'SET',
  BREAK = 'BREAK',
}

export enum MathOp {
  ADD = 'ADD',
  SUB = 'SUB',
  MUL = 'MUL',
  DIV = 'DIV',
}

export enum Direction {
  LEFT = 'LEFT',
  RIGHT = 'RIGHT',
}

export enum JumpCondition {
  ZERO = 'ZERO',
  NONZERO = 'NONZERO',
}

export enum CharCode {
  ADD = '+',
  SUB = '-',
  MUL = '*',
  DIV = '/',
  LT = '<',
  GT = '>',
  AT = '@',
  LB = '[',
  RB = ']',
  CARET = '^',
  DOT = '.',
  COMMA = ',',
  BANG = '!',
}

export type Operand =
  | { readonly kind: 'literal'; readonly value: number }
  | { readonly kind: 'current' };

export const ONE: Operand = { kind: 'literal', value: 1 };

export const literal = (value: number): Operand => ({ kind: 'literal', value });

export const CURRENT: Operand = { kind: 'current' };

export const resolveOperand = (operand: Operand, cell: number): number =>
  operand.kind === 'literal' ? operand.value : cell;

export type Token =
  | { readonly kind: 'command'; readonly symbol: CharCode }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'current' };

export interface Command {
  readonly symbol: CharCode;
  readonly operand: Operand | null;
}

export type Op =
  | { readonly type: OpType.ARITH; readonly op: MathOp; readonly operand: Operand }
  | { readonly type: OpType.MOVE; readonly direction: Direction; readonly operand: Operand }
  | { readonly type: OpType.SEEK; readonly operand: Operand }
  | { readonly type: OpType.JUMP; readonly target: number; readonly condition: JumpCondition }
  | { readonly type: OpType.OUTPUT }
  | { readonly type: OpType.INPUT }
  | { readonly type: OpType.SET; readonly operand: Operand }
  | { readonly type: OpType.BREAK };

export interface LoopMap {
  openToClose: Map<number, number>;
  closeToOpen: Map<number, number>;
}

export interface RunOptions {
  debug: boolean;
  verbose: boolean;
  window: number;
}

export const DEFAULT_OPTIONS: RunOptions = {
  debug: false,
  verbose: false,
  window: 3,
};
