import type { Op } from './types.js';
import type { MachineIO } from './io.js';
import type { ExecutionState, Interpreter } from './interp.js';
import { compile, formatOp } from './compiler.js';
import { renderTape } from './tape-view.js';

export const PROMPT = 'EZ> ';
export const QUIT = '!';

export const renderInstructions = (prog: Op[], pc: number, window: number): string => {
    if (prog.length === 0) {
        return '';
    }
    const start = Math.max(0, pc - window);
    const end = Math.min(pc + window, prog.length - 1);
    const width = String(prog.length).length;

    let repr = '';
    for (let i = start; i <= end; i++) {
        const marker = i === pc ? '> ' : '  ';
        repr += `${String(i).padStart(width, '0')} ${marker}${formatOp(prog[i])}\n`;
    }
    return repr;
};

/**
 * Interactive pause point reached after a breakpoint. Each pause shows the tape
 * and the instructions around `pc`, then runs one line of ad-hoc code against
 * the live tape before executing the instruction it stopped on.
 */
export class DebugStepper {
    constructor(
        private readonly interpreter: Interpreter,
        private readonly io: MachineIO,
        private readonly window: number
    ) { }

    /**
     * @returns false when the user left the debugger, in which case the frozen
     * instruction has not been executed yet.
     */
    pause(prog: Op[], state: ExecutionState): boolean {
        this.io.write('\n');
        this.io.write(renderTape(state.cells, state.cc));
        this.io.write(renderInstructions(prog, state.pc, this.window));
        this.io.write(PROMPT);

        const line = this.io.readLine();
        if (line === null || line.startsWith(QUIT)) {
            state.debugging = false;
            this.io.write('\n');
            return false;
        }

        if (line.length > 0) {
            this.runNested(compile(line, { debug: false }), state);
            this.io.write('\n');
        }

        this.interpreter.step(prog[state.pc], state, false);
        this.io.write('\n');
        return true;
    }

    // The nested run shares the tape; both cursors and the debugging flag are put back afterwards.
    private runNested(prog: Op[], state: ExecutionState): void {
        const { pc, cc, debugging } = state;
        state.pc = 0;
        state.debugging = false;
        try {
            this.interpreter.run(prog, state, false);
        } finally {
            state.pc = pc;
            state.cc = cc;
            state.debugging = debugging;
        }
    }
}
