import { CharCode, type Command, type LoopMap } from './types.js';
import { CompileError } from './errors.js';

export const resolveLoops = (commands: Command[]): LoopMap => {
    const openToClose = new Map<number, number>();
    const closeToOpen = new Map<number, number>();
    const bracketStack: number[] = [];

    commands.forEach((command, i) => {
        if (command.symbol === CharCode.LB) {
            bracketStack.push(i);
        } else if (command.symbol === CharCode.RB) {
            const openPos = bracketStack.pop();
            if (openPos === undefined) {
                throw new CompileError('resolve', `']' at command ${i} has no matching '['`);
            }
            openToClose.set(openPos, i);
            closeToOpen.set(i, openPos);
        }
    });

    if (bracketStack.length > 0) {
        throw new CompileError('resolve', `'[' at command ${bracketStack.join(', ')} has no matching ']'`);
    }

    return { openToClose, closeToOpen };
};
