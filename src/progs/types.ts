// Numeric values are part of the wire format; keep the order.
export enum Op {
  DONE = 0,
  MUL_F,
  MUL_V,
  MUL_FV,
  MUL_VF,
  DIV_F,
  ADD_F,
  ADD_V,
  SUB_F,
  SUB_V,
  EQ_F,
  EQ_V,
  EQ_S,
  EQ_E,
  EQ_FNC,
  NE_F,
  NE_V,
  NE_S,
  NE_E,
  NE_FNC,
  LE,
  GE,
  LT,
  GT,
  LOAD_F,
  LOAD_V,
  LOAD_S,
  LOAD_ENT,
  LOAD_FLD,
  LOAD_FNC,
  ADDRESS,
  STORE_F,
  STORE_V,
  STORE_S,
  STORE_ENT,
  STORE_FLD,
  STORE_FNC,
  STOREP_F,
  STOREP_V,
  STOREP_S,
  STOREP_ENT,
  STOREP_FLD,
  STOREP_FNC,
  RETURN,
  NOT_F,
  NOT_V,
  NOT_S,
  NOT_ENT,
  NOT_FNC,
  IF,
  IFNOT,
  CALL0,
  CALL1,
  CALL2,
  CALL3,
  CALL4,
  CALL5,
  CALL6,
  CALL7,
  CALL8,
  STATE,
  GOTO,
  AND,
  OR,
  BITAND,
  BITOR,
}

export const OP_COUNT = Op.BITOR + 1;

export enum Type {
  BAD = -1,
  VOID = 0,
  STRING = 1,
  FLOAT = 2,
  VECTOR = 3,
  ENTITY = 4,
  FIELD = 5,
  FUNCTION = 6,
  POINTER = 7,
}

export function typeName(t: Type): string {
  return Type[t].toLowerCase();
}

export function toOp(value: number): Op | undefined {
  return Number.isInteger(value) && value >= 0 && value < OP_COUNT ? value : undefined;
}

/** Maps a masked definition type to a known member. BAD is never produced here. */
export function toType(value: number): Type | undefined {
  return Number.isInteger(value) && value >= Type.VOID && value <= Type.POINTER ? value : undefined;
}

export const MAX_PARMS = 8;

export interface ProgsFunction {
  /** Index into statements; `<= 0` marks a built-in whose number is the negation. */
  firstStatement: number;
  parmStart: number;
  locals: number;
  profile: number;
  sName: number;
  sFile: number;
  parmSize: readonly number[];
}

export interface Statement {
  op: Op;
  a: number;
  b: number;
  c: number;
}

export interface Definition {
  type: Type;
  saveGlobal: boolean;
  ofs: number;
  sName: number;
}

export const LUMP_ORDER = ['statements', 'globalDefs', 'fieldDefs', 'functions', 'strings', 'globals'] as const;
export type LumpName = typeof LUMP_ORDER[number];

export interface Lump {
  offset: number;
  count: number;
}

export type LumpTable = Record<LumpName, Lump>;

export interface ProgsHeader {
  version: number;
  crc: number;
  lumps: LumpTable;
}

export type Vector3 = readonly [number, number, number];

export type Unrepresentable =
  | { kind: 'unrepresentable'; reason: 'function-out-of-range'; index: number }
  | { kind: 'unrepresentable'; reason: 'unhandled-type'; type: Type };

/** A global slot interpreted through its declared type. */
export type GlobalValue =
  | { kind: 'string'; value: string }
  | { kind: 'float'; value: number }
  | { kind: 'vector'; value: Vector3 }
  | { kind: 'entity'; value: number }
  | { kind: 'function'; index: number; value: ProgsFunction }
  | Unrepresentable;
