// src/types.ts
export enum NodeKind {
  INCREMENT = 'INCREMENT',
  DECREMENT = 'DECREMENT',
  RIGHT = 'RIGHT',
  LEFT = 'LEFT',
  PRINT = 'PRINT',
  READ = 'READ',
  LOOP = 'LOOP',
  BLOCK = 'BLOCK',
}

export type LeafKind =
  | NodeKind.INCREMENT
  | NodeKind.DECREMENT
  | NodeKind.RIGHT
  | NodeKind.LEFT
  | NodeKind.PRINT
  | NodeKind.READ;

export interface LeafNode {
  readonly kind: LeafKind;
}

export interface BlockNode {
  readonly kind: NodeKind.BLOCK;
  readonly children: readonly Node[];
}

export interface LoopNode {
  readonly kind: NodeKind.LOOP;
  readonly body: BlockNode;
}

export type Node = LeafNode | BlockNode | LoopNode;

export const leaf = (kind: LeafKind): LeafNode => Object.freeze<LeafNode>({ kind });

export const block = (children: readonly Node[]): BlockNode =>
  Object.freeze<BlockNode>({ kind: NodeKind.BLOCK, children: Object.freeze([...children]) });

export const loop = (body: BlockNode): LoopNode => Object.freeze<LoopNode>({ kind: NodeKind.LOOP, body });

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

/** Produces input bytes; `null` once exhausted. */
export interface ByteSource {
  read(): number | null;
}

export interface ByteSink {
  write(byte: number): void;
  flush?(): void;
}
