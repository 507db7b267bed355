// src/format.ts
import { NodeKind } from './types.js';
import type { LeafKind, Node } from './types.js';

const leafNames: Record<LeafKind, string> = {
    [NodeKind.INCREMENT]: 'Increment',
    [NodeKind.DECREMENT]: 'Decrement',
    [NodeKind.RIGHT]: 'MoveRight',
    [NodeKind.LEFT]: 'MoveLeft',
    [NodeKind.PRINT]: 'Print',
    [NodeKind.READ]: 'Read',
};

const formatLines = (node: Node, depth: number, lines: string[]): void => {
    const pad = '  '.repeat(depth);
    switch (node.kind) {
        case NodeKind.BLOCK:
            lines.push(`${pad}Block (${node.children.length})`);
            for (const child of node.children) {
                formatLines(child, depth + 1, lines);
            }
            break;
        case NodeKind.LOOP:
            lines.push(`${pad}Loop`);
            formatLines(node.body, depth + 1, lines);
            break;
        default:
            lines.push(`${pad}${leafNames[node.kind]}`);
    }
};

/** Indented, one node per line. */
export const formatNode = (node: Node): string => {
    const lines: string[] = [];
    formatLines(node, 0, lines);
    return lines.join('\n');
};
