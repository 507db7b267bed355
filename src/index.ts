export { DEFAULT_CONFIG, DEFAULT_MAX_DEPTH, resolveConfig } from './config.js';
export type { InterpreterConfig } from './config.js';
export { ExecutionContext } from './context.js';
export type { ContextOptions } from './context.js';
export { BfSyntaxError, ERROR_CATALOG, ErrorCode, InterpreterError, ResourceExhaustedError } from './errors.js';
export type { ErrorParams } from './errors.js';
export { formatNode } from './format.js';
export { exec, run } from './interp-tree.js';
export type { RunOptions, RunResult } from './interp-tree.js';
export { bufferSource, emptySource, memorySink, stdinSource, stdoutSink } from './io.js';
export type { MemorySink } from './io.js';
export { parse, parseBlock } from './parser.js';
export type { ParseOptions } from './parser.js';
export { TokenSource } from './tokens.js';
export { CharCode, NodeKind, block, leaf, loop } from './types.js';
export type { BlockNode, ByteSink, ByteSource, LeafKind, LeafNode, LoopNode, Node } from './types.js';
