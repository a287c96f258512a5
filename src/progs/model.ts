import { performance } from 'perf_hooks';
import { OutputChannel, silentChannel } from '../output';
import { BadOffsetError } from './errors';
import { GlobalBlob } from './globals';
import { parseHeader } from './header';
import { encodingForStrings } from './helpers';
import { readDefinition, readFunction, readRecords, readStatement } from './records';
import { Cursor } from './streams';
import { StringTable } from './stringTable';
import { Definition, GlobalValue, LumpName, LumpTable, ProgsFunction, Statement, Type } from './types';

export interface Progress { (n: number): void }

export interface LoadOptions {
  /** String lump encoding; see {@link encodingForStrings}. */
  encoding?: string;
  output?: OutputChannel;
  progress?: Progress;
}

/**
 * A decoded progs.dat.
 *
 * Records hold raw offsets only. Names, files and global values are looked
 * up here, passing the record in.
 */
export class Progs {
  readonly functions: readonly ProgsFunction[];
  readonly statements: readonly Statement[];
  readonly globalDefs: readonly Definition[];
  readonly fieldDefs: readonly Definition[];
  private readonly entryMap: ReadonlyMap<number, ProgsFunction>;

  private constructor(
    readonly version: number,
    readonly crc: number,
    readonly lumps: Readonly<LumpTable>,
    readonly strings: StringTable,
    readonly globals: GlobalBlob,
    parts: { functions: ProgsFunction[]; statements: Statement[]; globalDefs: Definition[]; fieldDefs: Definition[] },
  ) {
    this.functions = Object.freeze(parts.functions.map((f) => Object.freeze({ ...f, parmSize: Object.freeze([...f.parmSize]) })));
    this.statements = Object.freeze(parts.statements.map((s) => Object.freeze(s)));
    this.globalDefs = Object.freeze(parts.globalDefs.map((d) => Object.freeze(d)));
    this.fieldDefs = Object.freeze(parts.fieldDefs.map((d) => Object.freeze(d)));
    const entries = new Map<number, ProgsFunction>();
    for (const fn of this.functions) {
      if (!this.isBuiltin(fn) && !entries.has(fn.firstStatement)) entries.set(fn.firstStatement, fn);
    }
    this.entryMap = entries;
  }

  /** Decodes a complete progs.dat image. Any structural failure aborts the whole load. */
  static load(buf: Buffer, options: LoadOptions = {}): Progs {
    const output = options.output ?? silentChannel;
    const progress = options.progress;
    const t0 = performance.now();
    output.appendLine(`[PROGS] load start: ${buf.length} bytes`);

    const cur = new Cursor(buf);
    const { version, crc, lumps } = parseHeader(cur);
    output.appendLine(`[PROGS] version=${version} crc=0x${crc.toString(16).padStart(4, '0')}`);
    if (progress) progress(10);

    const bytesOf = (name: LumpName) => {
      enter(cur, name, lumps);
      return Buffer.from(cur.readBytes(lumps[name].count));
    };
    const recordsOf = <T>(name: LumpName, read: (cur: Cursor) => T) => {
      enter(cur, name, lumps);
      return readRecords(cur, lumps[name].count, read);
    };

    const strings = new StringTable(bytesOf('strings'), encodingForStrings(options.encoding));
    const globals = new GlobalBlob(bytesOf('globals'), strings);
    if (progress) progress(30);
    const functions = recordsOf('functions', readFunction);
    if (progress) progress(50);
    const statements = recordsOf('statements', readStatement);
    if (progress) progress(80);
    const globalDefs = recordsOf('globalDefs', readDefinition);
    const fieldDefs = recordsOf('fieldDefs', readDefinition);
    if (progress) progress(100);

    const ms = Math.round(performance.now() - t0);
    output.appendLine(`[PROGS] load done in ${ms}ms: ${functions.length} functions, ${statements.length} statements, ${globalDefs.length} globals, ${fieldDefs.length} fields`);
    return new Progs(version, crc, lumps, strings, globals, { functions, statements, globalDefs, fieldDefs });
  }

  readString(offset: number): string { return this.strings.resolve(offset); }
  readGlobal(offset: number, type: Type): GlobalValue { return this.globals.read(offset, type, this.functions); }

  functionName(fn: ProgsFunction): string { return this.readString(fn.sName); }
  functionFile(fn: ProgsFunction): string { return this.readString(fn.sFile); }
  definitionName(def: Definition): string { return this.readString(def.sName); }
  definitionValue(def: Definition): GlobalValue { return this.readGlobal(def.ofs, def.type); }

  isBuiltin(fn: ProgsFunction): boolean { return fn.firstStatement <= 0; }
  builtinNumber(fn: ProgsFunction): number | undefined { return this.isBuiltin(fn) ? Math.abs(fn.firstStatement) : undefined; }

  /** Statement index -> the function whose body starts there. Built-ins are skipped. */
  entryPoints(): ReadonlyMap<number, ProgsFunction> { return this.entryMap; }

  findFunction(name: string): ProgsFunction | undefined {
    return this.functions.find((fn) => tryName(() => this.functionName(fn)) === name);
  }

  findGlobal(name: string): Definition | undefined {
    return this.globalDefs.find((def) => tryName(() => this.definitionName(def)) === name);
  }
}

function enter(cur: Cursor, name: LumpName, lumps: LumpTable) {
  cur.region = name;
  cur.seekAbs(lumps[name].offset);
}

// Records with an out-of-range name offset simply do not match a search.
function tryName(get: () => string): string | undefined {
  try {
    return get();
  } catch (e) {
    if (e instanceof BadOffsetError) return undefined;
    throw e;
  }
}
