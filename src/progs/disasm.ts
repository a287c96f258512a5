import { Op, Statement, Type, typeName } from './types';

export type BinaryOp = readonly [symbol: string, result: Type, left: Type, right: Type];

export const BINARY_OPS: ReadonlyMap<Op, BinaryOp> = new Map<Op, BinaryOp>([
  [Op.ADD_F, ['+', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.SUB_F, ['-', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.MUL_F, ['*', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.DIV_F, ['/', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.ADD_V, ['+', Type.VECTOR, Type.VECTOR, Type.VECTOR]],
  [Op.SUB_V, ['-', Type.VECTOR, Type.VECTOR, Type.VECTOR]],
  [Op.MUL_V, ['*', Type.VECTOR, Type.VECTOR, Type.VECTOR]],
  [Op.MUL_VF, ['*vf', Type.VECTOR, Type.FLOAT, Type.VECTOR]],
  [Op.MUL_FV, ['*fv', Type.VECTOR, Type.VECTOR, Type.FLOAT]],
  [Op.BITAND, ['&', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.BITOR, ['|', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.GE, ['>=', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.LE, ['<=', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.GT, ['>', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.LT, ['<', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.AND, ['&&', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.OR, ['||', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.EQ_F, ['==', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.EQ_V, ['==', Type.FLOAT, Type.VECTOR, Type.VECTOR]],
  [Op.EQ_S, ['==', Type.FLOAT, Type.STRING, Type.STRING]],
  [Op.EQ_E, ['==', Type.FLOAT, Type.ENTITY, Type.ENTITY]],
  [Op.EQ_FNC, ['==', Type.FLOAT, Type.FUNCTION, Type.FUNCTION]],
  [Op.NE_F, ['!=', Type.FLOAT, Type.FLOAT, Type.FLOAT]],
  [Op.NE_V, ['!=', Type.FLOAT, Type.VECTOR, Type.VECTOR]],
  [Op.NE_S, ['!=', Type.FLOAT, Type.STRING, Type.STRING]],
  [Op.NE_E, ['!=', Type.FLOAT, Type.ENTITY, Type.ENTITY]],
  [Op.NE_FNC, ['!=', Type.FLOAT, Type.FUNCTION, Type.FUNCTION]],
]);

// STORE_*: copy the value at <a> into <b>
export const STORE_OPS: ReadonlyMap<Op, Type> = new Map<Op, Type>([
  [Op.STORE_F, Type.FLOAT],
  [Op.STORE_V, Type.VECTOR],
  [Op.STORE_S, Type.STRING],
  [Op.STORE_ENT, Type.ENTITY],
  [Op.STORE_FLD, Type.FIELD],
  [Op.STORE_FNC, Type.FUNCTION],
]);

const ptr = (t: Type, operand: number) => `*(${typeName(t)} *)${operand}`;

export function formatRaw(st: Statement): string {
  return `(${Op[st.op]}, ${st.a}, ${st.b}, ${st.c})`;
}

/**
 * Renders one statement as a pseudo-assembly line.
 *
 * Operands are printed as raw slot offsets; nothing is resolved against
 * the global pool. Opcodes without a table entry fall back to
 * {@link formatRaw}.
 */
export function formatStatement(st: Statement): string {
  const bin = BINARY_OPS.get(st.op);
  if (bin) {
    const [sym, result, left, right] = bin;
    return `${ptr(result, st.c)} = ${ptr(left, st.a)} ${sym} ${ptr(right, st.b)}`;
  }
  const store = STORE_OPS.get(st.op);
  if (store !== undefined) return `${ptr(store, st.b)} = ${ptr(store, st.a)}`;
  return formatRaw(st);
}
