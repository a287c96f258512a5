export { Progs } from './model';
export type { LoadOptions, Progress } from './model';
export { StringTable } from './stringTable';
export { GlobalBlob } from './globals';
export { Cursor, sizeOfFields } from './streams';
export type { FieldKind } from './streams';
export { parseHeader, encodeHeader, HEADER_SIZE } from './header';
export { readFunction, readStatement, readDefinition, FUNCTION_SIZE, STATEMENT_SIZE, DEFINITION_SIZE } from './records';
export { formatStatement, formatRaw, BINARY_OPS, STORE_OPS } from './disasm';
export type { BinaryOp } from './disasm';
export { dumpProgs, formatGlobalValue } from './report';
export type { ReportOptions } from './report';
export { encodingForStrings } from './helpers';
export * from './errors';
export * from './types';
export { readFileBuffer, loadProgsFromFile } from './file';
