import { describe, expect, it } from 'vitest';
import { startRepl } from '../repl.js';
import { BufferIO } from '../io.js';
import { RuntimeError } from '../errors.js';

const EMPTY_TAPE = '     V  \ni | 000 |\nd | 000 |\na |     |\n';

describe('startRepl', () => {
    it('runs each line and shows the tape before every prompt', () => {
        const io = new BufferIO('^72.\n!\n');
        const state = startRepl(io);
        expect(io.text()).toBe(
            `${EMPTY_TAPE}EZ> Output: H\n` +
            '     V  \ni | 000 |\nd | 072 |\na |  H  |\nEZ> ',
        );
        expect(state.cells).toEqual([72]);
    });

    it('keeps the tape and pointer between lines', () => {
        const state = startRepl(new BufferIO('>3\n+5\n'));
        expect(state.cc).toBe(3);
        expect(state.cells).toEqual([0, 0, 0, 5]);
        expect(state.pc).toBe(0);
    });

    it('ignores breakpoints in entered code', () => {
        const state = startRepl(new BufferIO('+!+\n!'));
        expect(state.cells).toEqual([2]);
        expect(state.debugging).toBe(false);
    });

    it('does not recover from a runtime error', () => {
        expect(() => startRepl(new BufferIO('/0\n+\n'))).toThrow(RuntimeError);
    });
});
