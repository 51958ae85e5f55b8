import { CharCode, type Token } from './types.js';
import { CompileError } from './errors.js';

const COMMAND_SYMBOLS: ReadonlySet<string> = new Set<string>(Object.values(CharCode));
const DIGITS: ReadonlySet<string> = new Set('0123456789');
const CURRENT_CELL_MARKER = 'V';

export const VALUELESS_SYMBOLS: ReadonlySet<CharCode> = new Set([
    CharCode.LB,
    CharCode.RB,
    CharCode.DOT,
    CharCode.COMMA,
    CharCode.BANG,
]);

const isCommandSymbol = (c: string): c is CharCode => COMMAND_SYMBOLS.has(c);

/**
 * Split source into lexemes. Symbols and the current-cell marker are always one
 * character long, digit runs merge, anything else is dropped and ends a run.
 */
export const scan = (source: string): string[] => {
    const lexemes: string[] = [];
    let partial = '';

    const flush = (): void => {
        if (partial.length > 0) {
            lexemes.push(partial);
            partial = '';
        }
    };

    for (const c of source) {
        if (isCommandSymbol(c) || c === CURRENT_CELL_MARKER) {
            flush();
            lexemes.push(c);
        } else if (DIGITS.has(c)) {
            partial += c;
        } else {
            flush();
        }
    }
    flush();

    return lexemes;
};

export const classify = (lexeme: string): Token => {
    if (lexeme.length === 1 && isCommandSymbol(lexeme)) {
        return { kind: 'command', symbol: lexeme };
    }
    if (lexeme === CURRENT_CELL_MARKER) {
        return { kind: 'current' };
    }
    if (/^[0-9]+$/.test(lexeme)) {
        const value = Number(lexeme);
        if (value > 0xFF) {
            throw new CompileError('scan', `Integer literal ${lexeme} does not fit in a cell (0-255)`);
        }
        return { kind: 'integer', value };
    }
    throw new CompileError('scan', `Unknown lexeme: ${lexeme}`);
};

export const tokenize = (source: string): Token[] => scan(source).map(classify);
