import fs from 'fs';

const NEWLINE = 0x0A;
const CR = 0x0D;
const RETRY_DELAY_MS = 10;

const sleep = (ms: number): void => {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
};

/**
 * Blocking byte I/O shared by the interpreter, the debugger prompt and the REPL.
 * `null` means end of input.
 */
export interface MachineIO {
    readByte(): number | null;
    readLine(): string | null;
    write(chunk: string | Uint8Array): void;
}

const decodeLine = (bytes: number[]): string => {
    if (bytes.length > 0 && bytes[bytes.length - 1] === CR) {
        bytes.pop();
    }
    return Buffer.from(bytes).toString('utf8');
};

export class StdIO implements MachineIO {
    private readonly buf = Buffer.alloc(1);

    constructor(
        private readonly inFd: number = process.stdin.fd,
        private readonly outFd: number = process.stdout.fd
    ) { }

    readByte(): number | null {
        for (;;) {
            try {
                const n = fs.readSync(this.inFd, this.buf, 0, 1, null);
                return n === 0 ? null : this.buf[0];
            } catch (e) {
                // non-blocking stdin (e.g. a TTY on some platforms) reports EAGAIN until data arrives
                if (e instanceof Error && 'code' in e && e.code === 'EAGAIN') {
                    sleep(RETRY_DELAY_MS);
                    continue;
                }
                throw e;
            }
        }
    }

    readLine(): string | null {
        const bytes: number[] = [];
        for (;;) {
            const b = this.readByte();
            if (b === null) {
                return bytes.length === 0 ? null : decodeLine(bytes);
            }
            if (b === NEWLINE) {
                return decodeLine(bytes);
            }
            bytes.push(b);
        }
    }

    write(chunk: string | Uint8Array): void {
        fs.writeSync(this.outFd, typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    }
}

export class BufferIO implements MachineIO {
    private readonly input: Uint8Array;
    private pos = 0;
    private readonly output: number[] = [];

    constructor(input: string | Uint8Array = '') {
        this.input = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
    }

    readByte(): number | null {
        if (this.pos >= this.input.length) {
            return null;
        }
        return this.input[this.pos++];
    }

    readLine(): string | null {
        if (this.pos >= this.input.length) {
            return null;
        }
        const bytes: number[] = [];
        while (this.pos < this.input.length) {
            const b = this.input[this.pos++];
            if (b === NEWLINE) {
                break;
            }
            bytes.push(b);
        }
        return decodeLine(bytes);
    }

    write(chunk: string | Uint8Array): void {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
        for (const b of bytes) {
            this.output.push(b);
        }
    }

    bytes(): Uint8Array {
        return Uint8Array.from(this.output);
    }

    text(): string {
        return Buffer.from(this.output).toString('latin1');
    }
}
