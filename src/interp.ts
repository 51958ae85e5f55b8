import {
    DEFAULT_OPTIONS,
    Direction,
    JumpCondition,
    MathOp,
    type Op,
    OpType,
    type RunOptions,
    resolveOperand,
} from './types.js';
import { RuntimeError } from './errors.js';
import type { MachineIO } from './io.js';
import { DebugStepper } from './debugger.js';
import { formatOp } from './compiler.js';

export class ExecutionState {
    cells: number[] = [0];
    cc = 0;
    pc = 0;
    debugging = false;

    get current(): number {
        return this.cells[this.cc];
    }

    setCurrent(value: number): void {
        this.cells[this.cc] = value & 0xFF;
    }

    // Grows the tape with zero cells so that `index` is addressable.
    moveTo(index: number): void {
        while (this.cells.length <= index) {
            this.cells.push(0);
        }
        this.cc = index;
    }

    reset(): void {
        this.cells = [0];
        this.cc = 0;
        this.pc = 0;
        this.debugging = false;
    }
}

const applyMath = (cell: number, op: MathOp, value: number): number | null => {
    switch (op) {
        case MathOp.ADD:
            return (cell + value) & 0xFF;
        case MathOp.SUB:
            return (cell - value) & 0xFF;
        case MathOp.MUL:
            return (cell * value) & 0xFF;
        case MathOp.DIV:
            return value === 0 ? null : Math.floor(cell / value);
    }
};

export class Interpreter {
    private readonly stepper: DebugStepper;
    readonly options: RunOptions;

    constructor(
        private readonly io: MachineIO,
        options: Partial<RunOptions> = {}
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
        this.stepper = new DebugStepper(this, io, this.options.window);
    }

    /**
     * Execute `prog` from `state.pc` until the instruction pointer reaches the end
     * of the list. Breakpoints only take effect when `allowDebug` is set.
     */
    run(prog: Op[], state: ExecutionState, allowDebug: boolean = this.options.debug): void {
        while (state.pc < prog.length) {
            if (state.debugging) {
                if (!this.stepper.pause(prog, state)) {
                    continue;
                }
            } else {
                this.step(prog[state.pc], state, allowDebug);
            }
            state.pc++;
        }
    }

    // `execute`, logging the faulting instruction first when verbose.
    step(op: Op, state: ExecutionState, allowDebug: boolean): void {
        try {
            this.execute(op, state, allowDebug);
        } catch (e) {
            if (this.options.verbose) {
                console.error(`Fault at PC=${state.pc}, CC=${state.cc}, Op=${formatOp(op)}:`, e);
            }
            throw e;
        }
    }

    execute(op: Op, state: ExecutionState, allowDebug: boolean): void {
        switch (op.type) {
            case OpType.ARITH: {
                const value = resolveOperand(op.operand, state.current);
                const result = applyMath(state.current, op.op, value);
                if (result === null) {
                    throw new RuntimeError('Division by zero', state.pc, state.cc);
                }
                state.setCurrent(result);
                break;
            }
            case OpType.MOVE: {
                const value = resolveOperand(op.operand, state.current);
                const next = state.cc + (op.direction === Direction.LEFT ? -value : value);
                if (next < 0) {
                    throw new RuntimeError('Pointer underflow', state.pc, state.cc);
                }
                state.moveTo(next);
                break;
            }
            case OpType.SEEK:
                state.moveTo(resolveOperand(op.operand, state.current));
                break;
            case OpType.JUMP: {
                const isZero = state.current === 0;
                if (isZero === (op.condition === JumpCondition.ZERO)) {
                    state.pc = op.target;
                }
                break;
            }
            case OpType.OUTPUT:
                this.io.write(Uint8Array.of(state.current));
                break;
            case OpType.INPUT: {
                const byte = this.io.readByte();
                if (byte === null) {
                    throw new RuntimeError('End of input while reading', state.pc, state.cc);
                }
                state.setCurrent(byte);
                break;
            }
            case OpType.SET:
                state.setCurrent(resolveOperand(op.operand, state.current));
                break;
            case OpType.BREAK:
                if (allowDebug) {
                    state.debugging = true;
                }
                break;
        }
    }
}
