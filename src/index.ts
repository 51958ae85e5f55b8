import { compile } from './compiler.js';
import { ExecutionState, Interpreter } from './interp.js';
import type { MachineIO } from './io.js';
import type { RunOptions } from './types.js';

export * from './types.js';
export * from './errors.js';
export { scan, classify, tokenize } from './lexer.js';
export { assemble } from './assembler.js';
export { resolveLoops } from './loops.js';
export { compile, lower, formatOp } from './compiler.js';
export type { CompileOptions } from './compiler.js';
export { ExecutionState, Interpreter } from './interp.js';
export { DebugStepper, renderInstructions } from './debugger.js';
export { renderTape } from './tape-view.js';
export { startRepl } from './repl.js';
export { StdIO, BufferIO } from './io.js';
export type { MachineIO } from './io.js';

export const run = (source: string, io: MachineIO, options: Partial<RunOptions> = {}): ExecutionState => {
    const interpreter = new Interpreter(io, options);
    const prog = compile(source, { debug: interpreter.options.debug });
    const state = new ExecutionState();
    interpreter.run(prog, state);
    return state;
};
