import { afterEach, describe, expect, it, vi } from 'vitest';
import { compile } from '../compiler.js';
import { renderInstructions } from '../debugger.js';
import { BufferIO } from '../io.js';
import { run } from '../index.js';
import { CompileError, RuntimeError } from '../errors.js';

const TAPE_A = '     V  \ni | 000 |\nd | 065 |\na |  A  |\n';
const WINDOW = '0   SET 65\n1   BREAK\n2 > OUTPUT\n';

describe('renderInstructions', () => {
    it('marks the instruction pointer', () => {
        expect(renderInstructions(compile('+>.'), 0, 3)).toBe('0 > ADD 1\n1   RIGHT 1\n2   OUTPUT\n');
    });

    it('clips the window and pads indices to the list length', () => {
        const prog = compile('+++++++++++');
        expect(renderInstructions(prog, 5, 2)).toBe('03   ADD 1\n04   ADD 1\n05 > ADD 1\n06   ADD 1\n07   ADD 1\n');
        expect(renderInstructions(prog, 10, 1)).toBe('09   ADD 1\n10 > ADD 1\n');
    });

    it('renders nothing for an empty program', () => {
        expect(renderInstructions([], 0, 3)).toBe('');
    });
});

describe('DebugStepper', () => {
    it('runs a line against the live tape, then the paused instruction', () => {
        const io = new BufferIO('+1\n');
        const state = run('^65!.', io, { debug: true });
        expect(io.text()).toBe(`\n${TAPE_A}${WINDOW}EZ> \nB\n`);
        expect(state.cells).toEqual([66]);
    });

    it('executes the paused instruction once after quitting', () => {
        const io = new BufferIO('!\n');
        const state = run('^65!.', io, { debug: true });
        expect(io.text()).toBe(`\n${TAPE_A}${WINDOW}EZ> \nA`);
        expect(state.debugging).toBe(false);
    });

    it('treats end of input at the prompt as quitting', () => {
        const io = new BufferIO();
        run('^65!.', io, { debug: true });
        expect(io.text()).toBe(`\n${TAPE_A}${WINDOW}EZ> \nA`);
    });

    it('skips the nested run for an empty line', () => {
        const io = new BufferIO('\n');
        run('^65!.', io, { debug: true });
        expect(io.text()).toBe(`\n${TAPE_A}${WINDOW}EZ> A\n`);
    });

    it('keeps pausing until the user quits', () => {
        const io = new BufferIO('\n!\n');
        run('^65!..', io, { debug: true });
        const prompts = io.text().split('EZ> ').length - 1;
        expect(prompts).toBe(2);
        expect(io.text().endsWith('EZ> \nA')).toBe(true);
    });

    it('restores the cursors but keeps tape changes from the nested run', () => {
        const state = run('>2!+', new BufferIO('<2^7\n'), { debug: true });
        expect(state.cells).toEqual([7, 0, 1]);
        expect(state.cc).toBe(2);
        expect(state.pc).toBe(3);
    });

    it('ignores breakpoints inside the nested line', () => {
        const io = new BufferIO('+!+\n');
        const state = run('!+', io, { debug: true });
        expect(state.cells).toEqual([3]);
        expect(io.text().split('EZ> ').length - 1).toBe(1);
    });

    it('does not pause on a trailing breakpoint', () => {
        const io = new BufferIO();
        run('+!', io, { debug: true });
        expect(io.text()).toBe('');
    });

    it('fails on a nested line that does not compile', () => {
        expect(() => run('^65!.', new BufferIO('[\n'), { debug: true })).toThrow(CompileError);
    });

    describe('verbose mode', () => {
        afterEach(() => {
            vi.restoreAllMocks();
        });

        it('logs a fault in the instruction executed after a pause', () => {
            const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            expect(() => run('^5!/0', new BufferIO('\n'), { debug: true, verbose: true }))
                .toThrow('Division by zero (pc=2, cc=0)');
            expect(spy).toHaveBeenCalledWith('Fault at PC=2, CC=0, Op=DIV 0:', expect.any(RuntimeError));
        });
    });
});
