import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { bufferSource, emptySource, memorySink, stdinSource, stdoutSink } from './io.js';

describe('io', () => {
  let dir: string;
  const fds: number[] = [];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tape-tree-io-'));
  });

  afterEach(() => {
    while (fds.length > 0) {
      const fd = fds.pop();
      if (fd !== undefined) fs.closeSync(fd);
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const open = (file: string, flags: string): number => {
    const fd = fs.openSync(file, flags);
    fds.push(fd);
    return fd;
  };

  it('emptySource is exhausted from the start', () => {
    const source = emptySource();
    expect(source.read()).toBeNull();
    expect(source.read()).toBeNull();
  });

  it('bufferSource yields each byte then null', () => {
    const source = bufferSource('ab');
    expect([source.read(), source.read(), source.read()]).toEqual([97, 98, null]);
  });

  it('stdoutSink writes every byte through before returning', () => {
    const file = path.join(dir, 'out.bin');
    const sink = stdoutSink(open(file, 'w'));

    sink.write(72);
    expect(Array.from(fs.readFileSync(file))).toEqual([72]);
    sink.write(0);
    expect(Array.from(fs.readFileSync(file))).toEqual([72, 0]);
    sink.write(255);
    expect(Array.from(fs.readFileSync(file))).toEqual([72, 0, 255]);
  });

  it('stdinSource reads one byte then stays exhausted', () => {
    const file = path.join(dir, 'in.txt');
    fs.writeFileSync(file, 'A');
    const source = stdinSource(open(file, 'r'));

    expect(source.read()).toBe(65);
    expect(source.read()).toBeNull();
    expect(source.read()).toBeNull();
  });

  it('memorySink collects bytes and text', () => {
    const sink = memorySink();
    sink.write(104);
    sink.write(105);
    expect(Array.from(sink.bytes())).toEqual([104, 105]);
    expect(sink.text()).toBe('hi');
  });
});
