import { describe, expect, it } from 'vitest';
import { UsageError, parseArgs, stripTrailingNewline } from './args.js';
import { formatNode } from './format.js';
import { parse } from './parser.js';

describe('parseArgs', () => {
  it('reads a file argument with defaults', () => {
    expect(parseArgs(['prog.b'])).toEqual({
      file: 'prog.b',
      code: null,
      strictBrackets: false,
      printTree: false,
      showTime: false,
      help: false,
    });
  });

  it('reads every option', () => {
    const opts = parseArgs(['-e', '+.', '-s', '100', '--max-cycles', '5', '--strict', '-p', '-t']);
    expect(opts).toMatchObject({
      code: '+.',
      tapeSize: 100,
      maxCycles: 5,
      strictBrackets: true,
      printTree: true,
      showTime: true,
    });
  });

  it('allows --help without a program', () => {
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('rejects missing programs and bad values', () => {
    expect(() => parseArgs([])).toThrow('No input file specified');
    expect(() => parseArgs(['-c', 'ten', 'f'])).toThrow('-c expects a non-negative integer');
    expect(() => parseArgs(['--tape-size', '0', 'f'])).toThrow('--tape-size must be at least 1');
    expect(() => parseArgs(['--eval'])).toThrow(UsageError);
    expect(() => parseArgs(['--fast', 'f'])).toThrow('Unknown option: --fast');
  });
});

describe('stripTrailingNewline', () => {
  it('drops a single LF or CRLF', () => {
    expect(Array.from(stripTrailingNewline(Buffer.from('+.\n')))).toEqual([43, 46]);
    expect(Array.from(stripTrailingNewline(Buffer.from('+\r\n')))).toEqual([43]);
    expect(Array.from(stripTrailingNewline(Buffer.from('+\n\n')))).toEqual([43, 10]);
    expect(stripTrailingNewline(Buffer.from('')).length).toBe(0);
  });
});

describe('formatNode', () => {
  it('indents nested nodes', () => {
    expect(formatNode(parse('+[-.]<'))).toBe(
      ['Block (3)', '  Increment', '  Loop', '    Block (2)', '      Decrement', '      Print', '  MoveLeft'].join('\n')
    );
  });
});
