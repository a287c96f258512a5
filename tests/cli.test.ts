import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createProgram } from '../src/commander';
import { Deps } from '../src/commander/types';
import { sampleProgs } from './helpers/sample';

function harness() {
  const out: string[] = [];
  const log: string[] = [];
  const codes: number[] = [];
  const deps: Deps = {
    out: { name: 'out', appendLine: (v) => { out.push(v); } },
    output: { name: 'log', appendLine: (v) => { log.push(v); } },
    setExitCode: (code) => { codes.push(code); },
  };
  const program = createProgram(deps).exitOverride();
  const run = (...args: string[]) => program.parseAsync(['node', 'progs', ...args]);
  return { out, log, codes, run };
}

describe('progs CLI', () => {
  let dir = '';
  let good = '';
  let bad = '';

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'progs-cli-'));
    good = join(dir, 'progs.dat');
    bad = join(dir, 'short.dat');
    await writeFile(good, sampleProgs());
    await writeFile(bad, sampleProgs().subarray(0, 20));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('dumps only the sections asked for', async () => {
    const h = harness();
    await h.run('dump', good, '--no-statements', '--no-globals');
    expect(h.out).toEqual(['print builtins.qc', 'main progs.qc']);
    expect(h.log).toEqual([]);
    expect(h.codes).toEqual([]);
  });

  it('adds the field section on request', async () => {
    const h = harness();
    await h.run('dump', good, '--no-functions', '--no-statements', '--no-globals', '--fields');
    expect(h.out).toEqual(['(VECTOR, velocity, 3)']);
  });

  it('logs load progress when verbose', async () => {
    const h = harness();
    await h.run('dump', good, '--no-functions', '--no-statements', '--no-globals', '-v');
    expect(h.log[0]).toBe(`[PROGS] open: ${good}`);
    expect(h.log).toHaveLength(4);
  });

  it('reports an unreadable file and sets exit status 1', async () => {
    const h = harness();
    await h.run('dump', bad);
    expect(h.out).toEqual([]);
    expect(h.log).toEqual([
      `[PROGS] unreadable: ${bad}: truncated input in header at offset 16: need 8 byte(s), 4 available`,
    ]);
    expect(h.codes).toEqual([1]);
  });

  it('prints the string table', async () => {
    const h = harness();
    await h.run('strings', good);
    expect(h.out).toHaveLength(1);
    expect(h.out[0].split('\n').slice(0, 2)).toEqual(['0\t', '1\tprint']);
  });
});
