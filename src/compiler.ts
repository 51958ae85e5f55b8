import {
    CharCode,
    type Command,
    Direction,
    JumpCondition,
    MathOp,
    ONE,
    type Op,
    OpType,
    type Operand,
} from './types.js';
import { tokenize } from './lexer.js';
import { assemble } from './assembler.js';
import { resolveLoops } from './loops.js';

export interface CompileOptions {
    debug: boolean;
}

/**
 * Lower assembled commands to machine instructions.
 *
 * Breakpoints are dropped before loops are resolved, so every jump target is an
 * index into the returned list.
 */
export const lower = (commands: Command[], options: CompileOptions): Op[] => {
    const kept = options.debug
        ? commands
        : commands.filter((command) => command.symbol !== CharCode.BANG);
    const { openToClose, closeToOpen } = resolveLoops(kept);

    return kept.map((command, i): Op => {
        const operand = command.operand ?? ONE;
        switch (command.symbol) {
            case CharCode.ADD:
                return { type: OpType.ARITH, op: MathOp.ADD, operand };
            case CharCode.SUB:
                return { type: OpType.ARITH, op: MathOp.SUB, operand };
            case CharCode.MUL:
                return { type: OpType.ARITH, op: MathOp.MUL, operand };
            case CharCode.DIV:
                return { type: OpType.ARITH, op: MathOp.DIV, operand };
            case CharCode.LT:
                return { type: OpType.MOVE, direction: Direction.LEFT, operand };
            case CharCode.GT:
                return { type: OpType.MOVE, direction: Direction.RIGHT, operand };
            case CharCode.AT:
                return { type: OpType.SEEK, operand };
            case CharCode.LB:
                return { type: OpType.JUMP, target: lookup(openToClose, i), condition: JumpCondition.ZERO };
            case CharCode.RB:
                return { type: OpType.JUMP, target: lookup(closeToOpen, i), condition: JumpCondition.NONZERO };
            case CharCode.DOT:
                return { type: OpType.OUTPUT };
            case CharCode.COMMA:
                return { type: OpType.INPUT };
            case CharCode.CARET:
                return { type: OpType.SET, operand };
            case CharCode.BANG:
                return { type: OpType.BREAK };
        }
    });
};

const lookup = (map: Map<number, number>, i: number): number => {
    const target = map.get(i);
    if (target === undefined) {
        throw new Error(`No loop partner recorded for command ${i}`);
    }
    return target;
};

export const compile = (source: string, options: CompileOptions = { debug: false }): Op[] =>
    lower(assemble(tokenize(source)), options);

const formatOperand = (operand: Operand): string =>
    operand.kind === 'literal' ? String(operand.value) : 'V';

export const formatOp = (op: Op): string => {
    switch (op.type) {
        case OpType.ARITH:
            return `${op.op} ${formatOperand(op.operand)}`;
        case OpType.MOVE:
            return `${op.direction} ${formatOperand(op.operand)}`;
        case OpType.SEEK:
        case OpType.SET:
            return `${op.type} ${formatOperand(op.operand)}`;
        case OpType.JUMP:
            return `JUMP ${op.target} IF ${op.condition}`;
        default:
            return op.type;
    }
};
