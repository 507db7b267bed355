// src/errors.ts

export enum ErrorCode {
  INVALID_TOKEN = 'INVALID_TOKEN',
  UNMATCHED_OPEN = 'UNMATCHED_OPEN',
  UNMATCHED_CLOSE = 'UNMATCHED_CLOSE',
  NESTING_TOO_DEEP = 'NESTING_TOO_DEEP',
  CYCLES_EXHAUSTED = 'CYCLES_EXHAUSTED',
}

export type ErrorParams = Record<string, string | number>;

const describeByte = (byte: string | number | undefined): string => {
  if (typeof byte !== 'number') return String(byte);
  const hex = `0x${byte.toString(16).padStart(2, '0')}`;
  return byte >= 0x20 && byte < 0x7f ? `'${String.fromCharCode(byte)}' (${hex})` : hex;
};

export const ERROR_CATALOG: Record<ErrorCode, (params: ErrorParams) => string> = {
  [ErrorCode.INVALID_TOKEN]: ({ byte, offset }) =>
    `invalid instruction ${describeByte(byte)} at offset ${offset}`,
  [ErrorCode.UNMATCHED_OPEN]: ({ offset }) =>
    `unmatched '[' at offset ${offset}`,
  [ErrorCode.UNMATCHED_CLOSE]: ({ offset }) =>
    `unmatched ']' at offset ${offset}`,
  [ErrorCode.NESTING_TOO_DEEP]: ({ limit, offset }) =>
    `loops nested deeper than ${limit} at offset ${offset}`,
  [ErrorCode.CYCLES_EXHAUSTED]: ({ limit }) =>
    `cycle budget of ${limit} instructions exhausted`,
};

export class InterpreterError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly params: ErrorParams = {}
  ) {
    super(ERROR_CATALOG[code](params));
    this.name = new.target.name;
  }
}

/** Raised while parsing; nothing has executed yet. */
export class BfSyntaxError extends InterpreterError {
  constructor(
    code:
      | ErrorCode.INVALID_TOKEN
      | ErrorCode.UNMATCHED_OPEN
      | ErrorCode.UNMATCHED_CLOSE
      | ErrorCode.NESTING_TOO_DEEP,
    public readonly offset: number,
    params: ErrorParams = {}
  ) {
    super(code, { ...params, offset });
  }
}

/**
 * Raised before the leaf instruction that would take the cycle budget below
 * zero. Output written before it has already been flushed.
 */
export class ResourceExhaustedError extends InterpreterError {
  constructor(public readonly limit: number) {
    super(ErrorCode.CYCLES_EXHAUSTED, { limit });
  }
}
