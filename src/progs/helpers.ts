import * as iconv from 'iconv-lite';

export const DEFAULT_ENCODING = 'ascii';

// Explicit option wins, then PROGS_ENCODING (ASCII / LATIN1 / UTF8 or any iconv-lite name), then ascii
export function encodingForStrings(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  const raw = (explicit || env.PROGS_ENCODING || '').trim();
  if (!raw) return DEFAULT_ENCODING;
  switch (raw.toUpperCase()) {
    case 'ASCII': return 'ascii';
    case 'LATIN1': return 'latin1';
    case 'UTF8': return 'utf8';
    default:
      if (!iconv.encodingExists(raw)) throw new Error(`unknown string encoding: ${raw}`);
      return raw.toLowerCase();
  }
}
