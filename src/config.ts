// src/config.ts
export const DEFAULT_CONFIG = Object.freeze({
  tapeSize: 2 ** 16,
  maxCycles: 2 ** 24,
});

export const DEFAULT_MAX_DEPTH = 1000;

export type InterpreterConfig = {
  tapeSize: number;
  maxCycles: number;
};

export const resolveConfig = (overrides: Partial<InterpreterConfig> = {}): InterpreterConfig => {
  const config = {
    tapeSize: overrides.tapeSize ?? DEFAULT_CONFIG.tapeSize,
    maxCycles: overrides.maxCycles ?? DEFAULT_CONFIG.maxCycles,
  };
  if (!Number.isSafeInteger(config.tapeSize) || config.tapeSize <= 0) {
    throw new RangeError(`tape size must be a positive integer, got ${config.tapeSize}`);
  }
  if (!Number.isSafeInteger(config.maxCycles) || config.maxCycles < 0) {
    throw new RangeError(`cycle limit must be a non-negative integer, got ${config.maxCycles}`);
  }
  return config;
};
