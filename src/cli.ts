#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { run } from './index.js';
import { startRepl } from './repl.js';
import { StdIO } from './io.js';

function printUsage(): void {
    console.log(`
ezfuck Interpreter

Usage: ezfuck [options] [file]

Without a file, starts an interactive session (a line starting with '!' exits).

Options:
  --no-debug     Ignore '!' breakpoints in the file
  --verbose, -v  Log the faulting instruction on runtime errors
  --time, -t     Show execution time
  --help, -h     Show this help
`);
}

function main(): void {
    const args = process.argv.slice(2);
    let file: string | null = null;
    let showTime = false;
    let debug = true;
    let verbose = false;

    for (const arg of args) {
        if (arg === '--help' || arg === '-h') {
            printUsage();
            process.exit(0);
        } else if (arg === '--no-debug') {
            debug = false;
        } else if (arg === '--verbose' || arg === '-v') {
            verbose = true;
        } else if (arg === '--time' || arg === '-t') {
            showTime = true;
        } else if (!arg.startsWith('-')) {
            file = arg;
        } else {
            console.error(`Unknown option: ${arg}`);
            printUsage();
            process.exit(1);
        }
    }

    try {
        const io = new StdIO();
        const start = process.hrtime.bigint();

        if (file) {
            const source = fs.readFileSync(file, 'utf8');
            run(source, io, { debug, verbose });
        } else {
            startRepl(io, { verbose });
        }

        if (showTime) {
            const end = process.hrtime.bigint();
            const timeMs = Number(end - start) / 1e6;
            console.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
        }
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        process.exit(1);
    }
}

main();
