import { BadOffsetError } from './errors';
import { StringTable } from './stringTable';
import { GlobalValue, ProgsFunction, Type, Vector3 } from './types';

/**
 * The globals lump, interpreted on demand.
 *
 * Nothing is decoded up front: the same bytes read as a float, a string
 * offset or a function index depending on the definition that names them.
 */
export class GlobalBlob {
  constructor(private bytes: Buffer, private strings: StringTable) {}

  get length() { return this.bytes.length; }

  private check(offset: number, size: number) {
    if (!Number.isInteger(offset) || offset < 0 || offset + size > this.bytes.length) {
      throw new BadOffsetError('globals', offset, size, this.bytes.length);
    }
  }

  readU32(offset: number): number { this.check(offset, 4); return this.bytes.readUInt32LE(offset); }
  readF32(offset: number): number { this.check(offset, 4); return this.bytes.readFloatLE(offset); }

  readVector(offset: number): Vector3 {
    this.check(offset, 12);
    return [this.bytes.readFloatLE(offset), this.bytes.readFloatLE(offset + 4), this.bytes.readFloatLE(offset + 8)];
  }

  read(offset: number, type: Type, functions: readonly ProgsFunction[]): GlobalValue {
    switch (type) {
      case Type.STRING:
        return { kind: 'string', value: this.strings.resolve(this.readU32(offset)) };
      case Type.FLOAT:
        return { kind: 'float', value: this.readF32(offset) };
      case Type.VECTOR:
        return { kind: 'vector', value: this.readVector(offset) };
      case Type.ENTITY:
        return { kind: 'entity', value: this.readU32(offset) };
      case Type.FUNCTION: {
        const index = this.readU32(offset);
        if (index < functions.length) return { kind: 'function', index, value: functions[index] };
        return { kind: 'unrepresentable', reason: 'function-out-of-range', index };
      }
      default:
        return { kind: 'unrepresentable', reason: 'unhandled-type', type };
    }
  }
}
