import { Command } from 'commander';
import { registerDump, registerStrings } from './dump';
import { Deps } from './types';

export function registerAllCommands(program: Command, deps: Deps) {
  registerDump(program, deps);
  registerStrings(program, deps);
}

export function createProgram(deps: Deps): Command {
  const program = new Command();
  program
    .name('progs')
    .description('Inspect compiled QuakeC progs.dat files')
    .version('0.1.0');
  registerAllCommands(program, deps);
  return program;
}
