import { InvalidEnumValueError, InvalidRecordError } from './errors';
import { Cursor, FieldKind, sizeOfFields } from './streams';
import { Definition, MAX_PARMS, ProgsFunction, Statement, toOp, toType } from './types';

const FUNCTION_FIELDS: readonly FieldKind[] = ['i32', 'u32', 'u32', 'u32', 'u32', 'u32', 'u32'];
const STATEMENT_FIELDS: readonly FieldKind[] = ['u16', 'i16', 'i16', 'i16'];
// s_name is signed here, unlike the function record's name offsets
const DEFINITION_FIELDS: readonly FieldKind[] = ['u16', 'u16', 'i32'];

export const FUNCTION_SIZE = sizeOfFields(FUNCTION_FIELDS) + MAX_PARMS;
export const STATEMENT_SIZE = sizeOfFields(STATEMENT_FIELDS);
export const DEFINITION_SIZE = sizeOfFields(DEFINITION_FIELDS);

const SAVE_GLOBAL = 1 << 15;

export function readFunction(cur: Cursor): ProgsFunction {
  const start = cur.offset;
  const [firstStatement, parmStart, locals, profile, sName, sFile, numParms] = cur.readFields(FUNCTION_FIELDS);
  // all 8 size bytes are always present
  const sizes = cur.readBytes(MAX_PARMS);
  if (numParms > MAX_PARMS) {
    throw new InvalidRecordError(cur.region, start, `num_parms ${numParms} exceeds ${MAX_PARMS}`);
  }
  return { firstStatement, parmStart, locals, profile, sName, sFile, parmSize: Array.from(sizes.subarray(0, numParms)) };
}

export function readStatement(cur: Cursor): Statement {
  const start = cur.offset;
  const [rawOp, a, b, c] = cur.readFields(STATEMENT_FIELDS);
  const op = toOp(rawOp);
  if (op === undefined) throw new InvalidEnumValueError('Op', rawOp, cur.region, start);
  return { op, a, b, c };
}

export function readDefinition(cur: Cursor): Definition {
  const start = cur.offset;
  const [packed, ofs, sName] = cur.readFields(DEFINITION_FIELDS);
  const saveGlobal = (packed & SAVE_GLOBAL) !== 0;
  const masked = packed & ~SAVE_GLOBAL;
  const type = toType(masked);
  if (type === undefined) throw new InvalidEnumValueError('Type', masked, cur.region, start);
  return { type, saveGlobal, ofs, sName };
}

export function readRecords<T>(cur: Cursor, count: number, read: (cur: Cursor) => T): T[] {
  const list: T[] = [];
  for (let i = 0; i < count; i++) list.push(read(cur));
  return list;
}
