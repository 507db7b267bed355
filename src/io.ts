// src/io.ts
import fs from 'fs';
import type { ByteSink, ByteSource } from './types.js';

export const emptySource = (): ByteSource => ({ read: () => null });

export const bufferSource = (data: Uint8Array | string): ByteSource => {
    const bytes = typeof data === 'string' ? Buffer.from(data, 'latin1') : data;
    let pos = 0;
    return {
        read: () => (pos < bytes.length ? bytes[pos++] : null),
    };
};

/** Blocking reads from fd 0, one byte at a time. */
export const stdinSource = (fd: number = process.stdin.fd): ByteSource => {
    const buf = Buffer.alloc(1);
    let done = false;
    return {
        read: () => {
            if (done) return null;
            let n: number;
            try {
                n = fs.readSync(fd, buf, 0, 1, null);
            } catch (e) {
                // stdin closed or not readable
                if (e instanceof Error && 'code' in e && e.code === 'EOF') {
                    n = 0;
                } else {
                    throw e;
                }
            }
            if (n === 0) {
                done = true;
                return null;
            }
            return buf[0];
        },
    };
};

/** Unbuffered: every byte reaches fd 1 before `write` returns. */
export const stdoutSink = (fd: number = process.stdout.fd): ByteSink => {
    const buf = Buffer.alloc(1);
    return {
        write: (byte) => {
            buf[0] = byte;
            fs.writeSync(fd, buf, 0, 1);
        },
    };
};

export interface MemorySink extends ByteSink {
    bytes(): Uint8Array;
    text(): string;
}

export const memorySink = (): MemorySink => {
    const out: number[] = [];
    return {
        write: (byte) => {
            out.push(byte);
        },
        bytes: () => Uint8Array.from(out),
        text: () => Buffer.from(out).toString('latin1'),
    };
};
