// src/args.ts

export interface CliOptions {
    file: string | null;
    code: string | null;
    tapeSize?: number;
    maxCycles?: number;
    strictBrackets: boolean;
    printTree: boolean;
    showTime: boolean;
    help: boolean;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export const USAGE = `
Tape interpreter

Usage: tape-tree [options] <file>

Options:
  --eval, -e <code>        Run <code> instead of a file
  --tape-size, -s <n>      Number of tape cells [default: 65536]
  --max-cycles, -c <n>     Instruction budget [default: 16777216]
  --strict                 Reject unmatched brackets
  --print-tree, -p         Print the parsed tree and exit
  --time, -t               Show execution time
  --help, -h               Show this help
`;

const parseCount = (flag: string, value: string | undefined): number => {
    if (value === undefined || !/^\d+$/.test(value)) {
        throw new UsageError(`${flag} expects a non-negative integer`);
    }
    const n = Number(value);
    if (!Number.isSafeInteger(n)) {
        throw new UsageError(`${flag} is too large`);
    }
    return n;
};

export const parseArgs = (args: readonly string[]): CliOptions => {
    const opts: CliOptions = {
        file: null,
        code: null,
        strictBrackets: false,
        printTree: false,
        showTime: false,
        help: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            opts.help = true;
        } else if (arg === '--eval' || arg === '-e') {
            i++;
            const code = args[i];
            if (code === undefined) {
                throw new UsageError(`${arg} expects program text`);
            }
            opts.code = code;
        } else if (arg === '--tape-size' || arg === '-s') {
            i++;
            opts.tapeSize = parseCount(arg, args[i]);
            if (opts.tapeSize === 0) {
                throw new UsageError(`${arg} must be at least 1`);
            }
        } else if (arg === '--max-cycles' || arg === '-c') {
            i++;
            opts.maxCycles = parseCount(arg, args[i]);
        } else if (arg === '--strict') {
            opts.strictBrackets = true;
        } else if (arg === '--print-tree' || arg === '-p') {
            opts.printTree = true;
        } else if (arg === '--time' || arg === '-t') {
            opts.showTime = true;
        } else if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option: ${arg}`);
        } else {
            opts.file = arg;
        }
    }

    if (!opts.help && opts.file === null && opts.code === null) {
        throw new UsageError('No input file specified');
    }
    return opts;
};

/** Drops one trailing LF or CRLF; editors append one to program files. */
export const stripTrailingNewline = (bytes: Uint8Array): Uint8Array => {
    let end = bytes.length;
    if (end > 0 && bytes[end - 1] === 0x0A) {
        end--;
        if (end > 0 && bytes[end - 1] === 0x0D) end--;
    }
    return bytes.subarray(0, end);
};
