export * from './progs';
export { createOutputChannel, silentChannel } from './output';
export type { OutputChannel } from './output';
export { createProgram } from './commander';
