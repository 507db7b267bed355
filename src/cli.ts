#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { USAGE, UsageError, parseArgs, stripTrailingNewline } from './args.js';
import type { CliOptions } from './args.js';
import { InterpreterError, ResourceExhaustedError } from './errors.js';
import { formatNode } from './format.js';
import { run } from './interp-tree.js';
import { stdinSource, stdoutSink } from './io.js';
import { parse } from './parser.js';

function printUsage(): void {
    console.log(USAGE);
}

function loadProgram(opts: CliOptions): Uint8Array {
    if (opts.code !== null) {
        return Buffer.from(opts.code, 'latin1');
    }
    if (opts.file === null) {
        throw new UsageError('No input file specified');
    }
    return stripTrailingNewline(fs.readFileSync(opts.file));
}

function main(): void {
    let opts: CliOptions;
    try {
        opts = parseArgs(process.argv.slice(2));
    } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        printUsage();
        process.exit(1);
    }

    if (opts.help) {
        printUsage();
        process.exit(0);
    }

    try {
        const content = loadProgram(opts);

        if (opts.printTree) {
            console.log(formatNode(parse(content, { strictBrackets: opts.strictBrackets })));
            return;
        }

        const start = process.hrtime.bigint();
        const result = run(content, {
            input: stdinSource(),
            output: stdoutSink(),
            tapeSize: opts.tapeSize,
            maxCycles: opts.maxCycles,
            strictBrackets: opts.strictBrackets,
        });

        if (opts.showTime) {
            const end = process.hrtime.bigint();
            const timeMs = Number(end - start) / 1e6;
            console.error(`\nExecution time: ${timeMs.toFixed(2)}ms (${result.cyclesUsed} cycles)`);
        }
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        if (err instanceof InterpreterError) {
            process.exit(err instanceof ResourceExhaustedError ? 2 : 1);
        }
        process.exit(1);
    }
}

main();
