export class EzfuckError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export type CompilePhase = 'scan' | 'assemble' | 'resolve';

export class CompileError extends EzfuckError {
    constructor(
        public readonly phase: CompilePhase,
        message: string
    ) {
        super(message);
    }
}

export class RuntimeError extends EzfuckError {
    constructor(
        message: string,
        public readonly pc: number,
        public readonly cc: number
    ) {
        super(`${message} (pc=${pc}, cc=${cc})`);
    }
}
