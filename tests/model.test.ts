import { describe, it, expect } from 'vitest';
import { Progs } from '../src/progs/model';
import { BadOffsetError, InvalidEnumValueError, TruncatedInputError } from '../src/progs/errors';
import { HEADER_SIZE } from '../src/progs/header';
import { Op, Type } from '../src/progs/types';
import { OutputChannel } from '../src/output';
import { buildProgs, StringPool } from './helpers/builder';
import { sampleProgs } from './helpers/sample';
import { thrown } from './helpers/thrown';

function collect(): OutputChannel & { lines: string[] } {
  const lines: string[] = [];
  return { name: 'test', lines, appendLine: (v: string) => { lines.push(v); } };
}

describe('Progs.load', () => {
  const progs = Progs.load(sampleProgs());

  it('reads the header fields', () => {
    expect(progs.version).toBe(6);
    expect(progs.crc).toBe(0x1234);
    expect(progs.lumps.statements).toEqual({ offset: HEADER_SIZE, count: 4 });
  });

  it('decodes every record list', () => {
    expect(progs.functions).toHaveLength(2);
    expect(progs.statements.map((s) => s.op)).toEqual([Op.DONE, Op.ADD_F, Op.CALL1, Op.DONE]);
    expect(progs.globalDefs).toHaveLength(8);
    expect(progs.fieldDefs).toEqual([{ type: Type.VECTOR, saveGlobal: false, ofs: 3, sName: progs.fieldDefs[0].sName }]);
    expect(progs.globalDefs[0].saveGlobal).toBe(true);
  });

  it('resolves names and files by passing the record in', () => {
    const [print, main] = progs.functions;
    expect(progs.functionName(print)).toBe('print');
    expect(progs.functionFile(print)).toBe('builtins.qc');
    expect(progs.functionName(main)).toBe('main');
    expect(progs.functionFile(main)).toBe('progs.qc');
    expect(progs.definitionName(progs.globalDefs[2])).toBe('origin');
    expect(print.parmSize).toEqual([1]);
  });

  it('reads global values through their definitions', () => {
    expect(progs.definitionValue(progs.globalDefs[0])).toEqual({ kind: 'float', value: 1 });
    expect(progs.definitionValue(progs.globalDefs[1])).toEqual({ kind: 'string', value: 'hello' });
    expect(progs.definitionValue(progs.globalDefs[3])).toEqual({ kind: 'function', index: 1, value: progs.functions[1] });
    expect(progs.readGlobal(28, Type.ENTITY)).toEqual({ kind: 'entity', value: 5 });
    expect(() => progs.definitionValue(progs.globalDefs[7])).toThrow(BadOffsetError);
  });

  it('keeps the aggregate usable after a failed lookup', () => {
    expect(() => progs.readString(10_000)).toThrow(BadOffsetError);
    expect(progs.functionName(progs.functions[1])).toBe('main');
  });

  it('maps entry points and skips built-ins', () => {
    const entries = progs.entryPoints();
    expect([...entries.keys()]).toEqual([1]);
    expect(entries.get(1)).toBe(progs.functions[1]);
    expect(progs.isBuiltin(progs.functions[0])).toBe(true);
    expect(progs.builtinNumber(progs.functions[0])).toBe(1);
    expect(progs.builtinNumber(progs.functions[1])).toBeUndefined();
  });

  it('finds functions and globals by name', () => {
    expect(progs.findFunction('main')).toBe(progs.functions[1]);
    expect(progs.findFunction('missing')).toBeUndefined();
    expect(progs.findGlobal('self')).toBe(progs.globalDefs[5]);
  });

  it('freezes decoded records', () => {
    expect(Object.isFrozen(progs.functions)).toBe(true);
    expect(Object.isFrozen(progs.statements[0])).toBe(true);
    expect(Object.isFrozen(progs.functions[0].parmSize)).toBe(true);
  });

  it('does not keep a view of the source buffer', () => {
    const buf = sampleProgs();
    const p = Progs.load(buf);
    buf.fill(0);
    expect(p.functionName(p.functions[1])).toBe('main');
  });

  it('logs start and finish and reports progress', () => {
    const out = collect();
    const steps: number[] = [];
    Progs.load(sampleProgs(), { output: out, progress: (n) => steps.push(n) });
    expect(out.lines[0]).toMatch(/^\[PROGS\] load start: \d+ bytes$/);
    expect(out.lines[1]).toBe('[PROGS] version=6 crc=0x1234');
    expect(out.lines[2]).toMatch(/^\[PROGS\] load done in \d+ms: 2 functions, 4 statements, 8 globals, 1 fields$/);
    expect(steps).toEqual([10, 30, 50, 80, 100]);
  });
});

describe('Progs.load failures', () => {
  it('names the lump a short read happened in', () => {
    const buf = sampleProgs().subarray(0, HEADER_SIZE + 12);
    const err = thrown(() => Progs.load(buf), TruncatedInputError);
    expect(err.region).toBe('strings');
  });

  it('fails when a lump offset is past the end of the stream', () => {
    const pool = new StringPool();
    const buf = buildProgs({ strings: pool.toBuffer(), statements: [{ op: Op.DONE }] });
    buf.writeUInt32LE(buf.length + 100, 8);
    const err = thrown(() => Progs.load(buf), TruncatedInputError);
    expect(err.region).toBe('statements');
    expect(err.position).toBe(buf.length + 100);
  });

  it('aborts the whole load on an unknown opcode', () => {
    const buf = buildProgs({ statements: [{ op: Op.DONE }, { op: 70 }] });
    const err = thrown(() => Progs.load(buf), InvalidEnumValueError);
    expect(err.region).toBe('statements');
    expect(err.position).toBe(HEADER_SIZE + 8);
  });

  it('aborts the whole load on an unknown definition type', () => {
    const buf = buildProgs({ fieldDefs: [{ packed: 0x000c, ofs: 0, sName: 0 }] });
    const err = thrown(() => Progs.load(buf), InvalidEnumValueError);
    expect(err.region).toBe('fieldDefs');
    expect(err.value).toBe(12);
  });

  it('loads an image with every lump empty', () => {
    const p = Progs.load(buildProgs({}));
    expect(p.functions).toEqual([]);
    expect(p.strings.length).toBe(0);
    expect(p.globals.length).toBe(0);
  });
});
