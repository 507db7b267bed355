// src/interp-tree.ts
import { ExecutionContext } from './context.js';
import { bufferSource } from './io.js';
import { parse } from './parser.js';
import { NodeKind } from './types.js';
import type { ByteSink, ByteSource, Node } from './types.js';

/**
 * Walks `node` against `ctx`. Only leaves cost cycles; blocks and loop
 * condition checks are free.
 */
export const exec = (node: Node, ctx: ExecutionContext): void => {
    switch (node.kind) {
        case NodeKind.BLOCK:
            for (const child of node.children) {
                exec(child, ctx);
            }
            break;
        case NodeKind.LOOP:
            if (node.body.children.length === 0 && ctx.cell !== 0) {
                ctx.exhaust();
            }
            while (ctx.cell !== 0) {
                exec(node.body, ctx);
            }
            break;
        default:
            ctx.execute(node);
    }
};

export interface RunOptions {
    input?: ByteSource | Uint8Array | string;
    output?: ByteSink;
    tapeSize?: number;
    maxCycles?: number;
    data?: Uint8Array;
    strictBrackets?: boolean;
    maxDepth?: number;
}

export interface RunResult {
    pointer: number;
    cyclesUsed: number;
    context: ExecutionContext;
}

const toSource = (input: RunOptions['input']): ByteSource | undefined =>
    typeof input === 'string' || input instanceof Uint8Array ? bufferSource(input) : input;

export const run = (source: Uint8Array | string, options: RunOptions = {}): RunResult => {
    const program = parse(source, {
        strictBrackets: options.strictBrackets,
        maxDepth: options.maxDepth,
    });
    const ctx = new ExecutionContext({
        tapeSize: options.tapeSize,
        maxCycles: options.maxCycles,
        input: toSource(options.input),
        output: options.output,
        data: options.data,
    });
    exec(program, ctx);
    return { pointer: ctx.pointer, cyclesUsed: ctx.cyclesUsed, context: ctx };
};
