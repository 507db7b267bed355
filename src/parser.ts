// src/parser.ts
import { DEFAULT_MAX_DEPTH } from './config.js';
import { BfSyntaxError, ErrorCode } from './errors.js';
import { TokenSource } from './tokens.js';
import { CharCode, NodeKind, block, leaf, loop } from './types.js';
import type { BlockNode, LeafKind, Node } from './types.js';

const opMap: Record<number, LeafKind> = {
    [CharCode.ADD]: NodeKind.INCREMENT,
    [CharCode.SUB]: NodeKind.DECREMENT,
    [CharCode.GT]: NodeKind.RIGHT,
    [CharCode.LT]: NodeKind.LEFT,
    [CharCode.DOT]: NodeKind.PRINT,
    [CharCode.COMMA]: NodeKind.READ,
};

export interface ParseOptions {
    /**
     * Reject unmatched `[` and stray `]` instead of accepting them. Off by
     * default: a missing `]` closes at end of input and a top-level `]` ends
     * the program, leaving the rest unparsed.
     */
    strictBrackets?: boolean;
    /** Deepest loop nesting accepted; the tree walk recurses once per level. */
    maxDepth?: number;
}

/**
 * Collects nodes until end of input or a `]`. A top-level `]` ends the whole
 * parse unless brackets are strict.
 * `openOffset` is the offset of the `[` that opened it, or -1 at top level.
 */
export const parseBlock = (
    tokens: TokenSource,
    openOffset: number,
    options: ParseOptions = {},
    depth: number = 0
): BlockNode => {
    const children: Node[] = [];
    const nested = openOffset >= 0;
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

    while (tokens.hasMore()) {
        const offset = tokens.position;
        const c = tokens.next();
        const kind = opMap[c];

        if (kind !== undefined) {
            children.push(leaf(kind));
        } else if (c === CharCode.LB) {
            if (depth >= maxDepth) {
                throw new BfSyntaxError(ErrorCode.NESTING_TOO_DEEP, offset, { limit: maxDepth });
            }
            children.push(loop(parseBlock(tokens, offset, options, depth + 1)));
        } else if (c === CharCode.RB) {
            if (!nested && options.strictBrackets) {
                throw new BfSyntaxError(ErrorCode.UNMATCHED_CLOSE, offset);
            }
            return block(children);
        } else {
            throw new BfSyntaxError(ErrorCode.INVALID_TOKEN, offset, { byte: c });
        }
    }

    if (nested && options.strictBrackets) {
        throw new BfSyntaxError(ErrorCode.UNMATCHED_OPEN, openOffset);
    }
    return block(children);
};

export const parse = (source: Uint8Array | string, options: ParseOptions = {}): BlockNode =>
    parseBlock(TokenSource.from(source), -1, options);
