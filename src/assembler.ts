import { CharCode, type Command, CURRENT, type Operand, type Token, literal } from './types.js';
import { CompileError } from './errors.js';
import { VALUELESS_SYMBOLS } from './lexer.js';

const describeOperand = (operand: Operand): string =>
    operand.kind === 'literal' ? String(operand.value) : 'V';

// Pair each command symbol with the operand that directly follows it, if any.
export const assemble = (tokens: Token[]): Command[] => {
    const commands: Command[] = [];
    let pending: CharCode | null = null;

    const attach = (operand: Operand): void => {
        if (pending === null) {
            throw new CompileError('assemble', `Operand ${describeOperand(operand)} has no preceding command`);
        }
        if (VALUELESS_SYMBOLS.has(pending)) {
            throw new CompileError('assemble', `Command '${pending}' cannot take an operand, given ${describeOperand(operand)}`);
        }
        commands.push({ symbol: pending, operand });
        pending = null;
    };

    for (const token of tokens) {
        switch (token.kind) {
            case 'command':
                if (pending !== null) {
                    commands.push({ symbol: pending, operand: null });
                }
                pending = token.symbol;
                break;
            case 'integer':
                attach(literal(token.value));
                break;
            case 'current':
                attach(CURRENT);
                break;
        }
    }

    if (pending !== null) {
        commands.push({ symbol: pending, operand: null });
    }

    return commands;
};
