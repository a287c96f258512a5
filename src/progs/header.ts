import { Cursor } from './streams';
import { LUMP_ORDER, LumpTable, ProgsHeader } from './types';

export const HEADER_SIZE = 8 + LUMP_ORDER.length * 8;

// version, crc, then (offset, count) per lump in LUMP_ORDER; offsets are not checked here
export function parseHeader(cur: Cursor): ProgsHeader {
  cur.region = 'header';
  const [version, crc] = cur.readFields(['u32', 'u32']);
  const lump = () => {
    const [offset, count] = cur.readFields(['u32', 'u32']);
    return { offset, count };
  };
  // property initialisers run in source order, which is the wire order
  const lumps: LumpTable = {
    statements: lump(),
    globalDefs: lump(),
    fieldDefs: lump(),
    functions: lump(),
    strings: lump(),
    globals: lump(),
  };
  return { version, crc, lumps };
}

export function encodeHeader(header: ProgsHeader): Buffer {
  const out = Buffer.alloc(HEADER_SIZE);
  let p = 0;
  out.writeUInt32LE(header.version >>> 0, p); p += 4;
  out.writeUInt32LE(header.crc >>> 0, p); p += 4;
  for (const name of LUMP_ORDER) {
    const { offset, count } = header.lumps[name];
    out.writeUInt32LE(offset >>> 0, p); p += 4;
    out.writeUInt32LE(count >>> 0, p); p += 4;
  }
  return out;
}
