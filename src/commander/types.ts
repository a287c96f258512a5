import { OutputChannel } from '../output';

export interface Deps {
  /** Report lines. */
  out: OutputChannel;
  /** Diagnostics: load timings, failures. */
  output: OutputChannel;
  /** Records the process exit status. */
  setExitCode(code: number): void;
}
