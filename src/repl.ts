import type { MachineIO } from './io.js';
import { compile } from './compiler.js';
import { ExecutionState, Interpreter } from './interp.js';
import { renderTape } from './tape-view.js';
import { PROMPT, QUIT } from './debugger.js';
import type { RunOptions } from './types.js';

/**
 * Read-eval loop over a persistent tape. Each line is compiled on its own and
 * run from its first instruction; the cell pointer and the tape carry over.
 */
export const startRepl = (io: MachineIO, options: Partial<RunOptions> = {}): ExecutionState => {
    const state = new ExecutionState();
    const interpreter = new Interpreter(io, { ...options, debug: false });

    for (;;) {
        io.write(renderTape(state.cells, state.cc));
        io.write(PROMPT);

        const line = io.readLine();
        if (line === null || line.startsWith(QUIT)) {
            return state;
        }

        const prog = compile(line, { debug: false });
        io.write('Output: ');
        interpreter.run(prog, state);
        state.pc = 0;
        io.write('\n');
    }
};
