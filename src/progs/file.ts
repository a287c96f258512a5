import { promises as fsp } from 'fs';
import { LoadOptions, Progs } from './model';

export async function readFileBuffer(filePath: string): Promise<Buffer> {
  const st = await fsp.stat(filePath);
  const fd = await fsp.open(filePath, 'r');
  try {
    const buf = Buffer.allocUnsafe(st.size);
    const { bytesRead } = await fd.read(buf, 0, st.size, 0);
    return bytesRead === st.size ? buf : buf.subarray(0, bytesRead);
  } finally {
    await fd.close();
  }
}

export async function loadProgsFromFile(filePath: string, options: LoadOptions = {}): Promise<Progs> {
  options.output?.appendLine(`[PROGS] open: ${filePath}`);
  const buf = await readFileBuffer(filePath);
  return Progs.load(buf, options);
}
