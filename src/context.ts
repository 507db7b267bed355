// src/context.ts
import { resolveConfig } from './config.js';
import { ResourceExhaustedError } from './errors.js';
import { NodeKind } from './types.js';
import type { ByteSink, ByteSource, LeafNode } from './types.js';

export interface ContextOptions {
    tapeSize?: number;
    maxCycles?: number;
    input?: ByteSource;
    output?: ByteSink;
    /** Initial tape contents, written from cell 0. */
    data?: Uint8Array;
}

/**
 * Mutable state of a single run: tape, pointer, remaining cycle budget and
 * the caller's I/O handles.
 */
export class ExecutionContext {
    private readonly cells: Uint8Array;
    private cc = 0;
    private cycles: number;
    private readonly maxCycles: number;
    private readonly input: ByteSource | undefined;
    private readonly output: ByteSink | undefined;

    constructor(options: ContextOptions = {}) {
        const { tapeSize, maxCycles } = resolveConfig(options);
        const data = options.data ?? new Uint8Array(0);
        if (data.length > tapeSize) {
            throw new RangeError(`initial data (${data.length} bytes) exceeds tape size ${tapeSize}`);
        }
        this.cells = new Uint8Array(tapeSize);
        this.cells.set(data);
        this.cycles = maxCycles;
        this.maxCycles = maxCycles;
        this.input = options.input;
        this.output = options.output;
    }

    get cell(): number {
        return this.cells[this.cc];
    }

    set cell(value: number) {
        this.cells[this.cc] = value & 0xFF;
    }

    get pointer(): number {
        return this.cc;
    }

    set pointer(value: number) {
        const size = this.cells.length;
        this.cc = ((value % size) + size) % size;
    }

    get tapeSize(): number {
        return this.cells.length;
    }

    get cyclesRemaining(): number {
        return this.cycles;
    }

    get cyclesUsed(): number {
        return this.maxCycles - this.cycles;
    }

    peek(index: number): number {
        const size = this.cells.length;
        return this.cells[((index % size) + size) % size];
    }

    readByte(): number {
        const byte = this.input?.read() ?? null;
        return byte === null ? 0 : byte & 0xFF;
    }

    writeByte(byte: number): void {
        if (!this.output) return;
        this.output.write(byte & 0xFF);
        this.output.flush?.();
    }

    /**
     * Fails as if the budget ran out, leaving the counters untouched. Used for
     * a loop with an empty body entered on a nonzero cell, which no leaf
     * charge would stop.
     */
    exhaust(): never {
        throw new ResourceExhaustedError(this.maxCycles);
    }

    /** Charges one cycle, then applies the instruction. */
    execute(node: LeafNode): void {
        if (this.cycles <= 0) {
            throw new ResourceExhaustedError(this.maxCycles);
        }
        this.cycles--;

        switch (node.kind) {
            case NodeKind.INCREMENT:
                this.cell += 1;
                break;
            case NodeKind.DECREMENT:
                this.cell -= 1;
                break;
            case NodeKind.RIGHT:
                this.pointer += 1;
                break;
            case NodeKind.LEFT:
                this.pointer -= 1;
                break;
            case NodeKind.PRINT:
                this.writeByte(this.cell);
                break;
            case NodeKind.READ:
                this.cell = this.readByte();
                break;
            default: {
                const unreachable: never = node.kind;
                throw new Error(`unknown instruction: ${String(unreachable)}`);
            }
        }
    }
}
