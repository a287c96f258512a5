import { TruncatedInputError } from './errors';

export type FieldKind = 'u8' | 'i8' | 'u16' | 'i16' | 'u32' | 'i32' | 'f32';

const FIELD_SIZE: Record<FieldKind, number> = { u8: 1, i8: 1, u16: 2, i16: 2, u32: 4, i32: 4, f32: 4 };

export function sizeOfFields(kinds: readonly FieldKind[]): number {
  let n = 0;
  for (const k of kinds) n += FIELD_SIZE[k];
  return n;
}

/**
 * Seekable little-endian reader over a byte buffer.
 * `region` names what is being decoded so short reads can say where they failed.
 */
export class Cursor {
  private o = 0;
  region = 'header';
  constructor(private b: Buffer, offset = 0) { this.o = offset; }
  get offset() { return this.o; }
  get length() { return this.b.length; }
  get remaining() { return Math.max(0, this.b.length - this.o); }
  seekAbs(pos: number) { this.o = pos; }

  private ensure(n: number) {
    if (this.o < 0 || this.o + n > this.b.length) {
      throw new TruncatedInputError(this.region, this.o, n, this.remaining);
    }
  }

  readU8(): number { this.ensure(1); const v = this.b.readUInt8(this.o); this.o += 1; return v; }
  readI8(): number { this.ensure(1); const v = this.b.readInt8(this.o); this.o += 1; return v; }
  readU16(): number { this.ensure(2); const v = this.b.readUInt16LE(this.o); this.o += 2; return v; }
  readI16(): number { this.ensure(2); const v = this.b.readInt16LE(this.o); this.o += 2; return v; }
  readU32(): number { this.ensure(4); const v = this.b.readUInt32LE(this.o); this.o += 4; return v; }
  readI32(): number { this.ensure(4); const v = this.b.readInt32LE(this.o); this.o += 4; return v; }
  readF32(): number { this.ensure(4); const v = this.b.readFloatLE(this.o); this.o += 4; return v; }
  readBytes(len: number): Buffer { this.ensure(len); const s = this.b.subarray(this.o, this.o + len); this.o += len; return s; }

  /** Reads one value per kind, in order. The whole run is bounds-checked up front. */
  readFields(kinds: readonly FieldKind[]): number[] {
    this.ensure(sizeOfFields(kinds));
    return kinds.map((k) => this.readField(k));
  }

  private readField(kind: FieldKind): number {
    switch (kind) {
      case 'u8': return this.readU8();
      case 'i8': return this.readI8();
      case 'u16': return this.readU16();
      case 'i16': return this.readI16();
      case 'u32': return this.readU32();
      case 'i32': return this.readI32();
      case 'f32': return this.readF32();
    }
  }
}
