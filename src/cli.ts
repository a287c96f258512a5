#!/usr/bin/env node
import { createProgram } from './commander';
import { createOutputChannel } from './output';

const program = createProgram({
  out: createOutputChannel('progs', process.stdout),
  output: createOutputChannel('PROGS'),
  setExitCode: (code) => { process.exitCode = code; },
});

program.parseAsync(process.argv).catch((e: unknown) => {
  process.stderr.write(`${e instanceof Error ? e.stack ?? e.message : String(e)}\n`);
  process.exitCode = 1;
});
