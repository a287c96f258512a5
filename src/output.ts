export interface OutputChannel {
  readonly name: string;
  appendLine(value: string): void;
}

export function createOutputChannel(name: string, stream: NodeJS.WritableStream = process.stderr): OutputChannel {
  return { name, appendLine: (value: string) => { stream.write(`${value}\n`); } };
}

export const silentChannel: OutputChannel = { name: 'silent', appendLine: () => {} };
