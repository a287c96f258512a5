export type ProgsErrorCode = 'TRUNCATED_INPUT' | 'INVALID_ENUM_VALUE' | 'INVALID_RECORD' | 'BAD_OFFSET';

export abstract class ProgsError extends Error {
  abstract readonly code: ProgsErrorCode;
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Fewer bytes remain than a fixed-width read needs. Aborts the whole load. */
export class TruncatedInputError extends ProgsError {
  readonly code = 'TRUNCATED_INPUT';
  constructor(readonly region: string, readonly position: number, readonly needed: number, readonly available: number) {
    super(`truncated input in ${region} at offset ${position}: need ${needed} byte(s), ${available} available`);
  }
}

export class InvalidEnumValueError extends ProgsError {
  readonly code = 'INVALID_ENUM_VALUE';
  constructor(readonly enumName: string, readonly value: number, readonly region: string, readonly position: number) {
    super(`invalid ${enumName} value ${value} in ${region} at offset ${position}`);
  }
}

export class InvalidRecordError extends ProgsError {
  readonly code = 'INVALID_RECORD';
  constructor(readonly region: string, readonly position: number, detail: string) {
    super(`invalid record in ${region} at offset ${position}: ${detail}`);
  }
}

/**
 * A string or global lookup fell outside its backing buffer.
 * Lookups happen after the load, so this fails the single call only.
 */
export class BadOffsetError extends ProgsError {
  readonly code = 'BAD_OFFSET';
  constructor(readonly table: 'strings' | 'globals', readonly offset: number, readonly size: number, readonly length: number) {
    super(`bad offset ${offset} in ${table} (read of ${size} byte(s), table length ${length})`);
  }
}

export function isProgsError(e: unknown): e is ProgsError {
  return e instanceof ProgsError;
}
