import * as iconv from 'iconv-lite';
import { BadOffsetError } from './errors';
import { DEFAULT_ENCODING } from './helpers';

/** NUL-separated text lump addressed by byte offset. */
export class StringTable {
  private bytes: Buffer;
  private encoding: string;
  constructor(bytes: Buffer, encoding: string = DEFAULT_ENCODING) {
    this.bytes = bytes;
    this.encoding = encoding;
  }
  get length() { return this.bytes.length; }

  resolve(offset: number): string {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.bytes.length) {
      throw new BadOffsetError('strings', offset, 1, this.bytes.length);
    }
    let end = this.bytes.indexOf(0, offset);
    if (end < 0) end = this.bytes.length;
    return iconv.decode(this.bytes.subarray(offset, end), this.encoding);
  }

  // offset\ttext per string, in storage order
  dumpText(): string {
    const lines: string[] = [];
    let start = 0;
    while (start < this.bytes.length) {
      const s = this.resolve(start);
      lines.push(`${start}\t${s}`);
      let end = this.bytes.indexOf(0, start);
      if (end < 0) end = this.bytes.length;
      start = end + 1;
    }
    return lines.join('\n');
  }
}
