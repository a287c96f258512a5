import { Command } from 'commander';
import { silentChannel } from '../output';
import { isProgsError } from '../progs/errors';
import { loadProgsFromFile } from '../progs/file';
import { Progs } from '../progs/model';
import { dumpProgs } from '../progs/report';
import { Deps } from './types';

interface DumpOpts {
  encoding?: string;
  functions: boolean;
  statements: boolean;
  globals: boolean;
  fields?: boolean;
  strings?: boolean;
  verbose?: boolean;
}

// Structural failures end the command with exit status 1; anything else propagates.
async function openOrReport(file: string, opts: { encoding?: string; verbose?: boolean }, deps: Deps): Promise<Progs | undefined> {
  try {
    return await loadProgsFromFile(file, { encoding: opts.encoding, output: opts.verbose ? deps.output : silentChannel });
  } catch (e) {
    if (!isProgsError(e)) throw e;
    deps.output.appendLine(`[PROGS] unreadable: ${file}: ${e.message}`);
    deps.setExitCode(1);
    return undefined;
  }
}

export function registerDump(program: Command, deps: Deps) {
  program
    .command('dump')
    .description('disassemble a progs.dat: functions, statements and global values')
    .argument('<file>', 'path to progs.dat')
    .option('-e, --encoding <name>', 'string table encoding (default: PROGS_ENCODING or ascii)')
    .option('--no-functions', 'skip the function list')
    .option('--no-statements', 'skip the disassembly')
    .option('--no-globals', 'skip global definitions')
    .option('--fields', 'also list field definitions')
    .option('--strings', 'also list the string table')
    .option('-v, --verbose', 'log load progress to stderr')
    .action(async (file: string, opts: DumpOpts) => {
      const progs = await openOrReport(file, opts, deps);
      if (!progs) return;
      const lines = dumpProgs(progs, {
        functions: opts.functions,
        statements: opts.statements,
        globals: opts.globals,
        fields: !!opts.fields,
        strings: !!opts.strings,
      });
      for (const line of lines) deps.out.appendLine(line);
    });
}

export function registerStrings(program: Command, deps: Deps) {
  program
    .command('strings')
    .description('print the string table as offset<TAB>text')
    .argument('<file>', 'path to progs.dat')
    .option('-e, --encoding <name>', 'string table encoding')
    .action(async (file: string, opts: { encoding?: string }) => {
      const progs = await openOrReport(file, opts, deps);
      if (!progs || progs.strings.length === 0) return;
      deps.out.appendLine(progs.strings.dumpText());
    });
}
