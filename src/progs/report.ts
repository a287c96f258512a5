import { BadOffsetError } from './errors';
import { formatStatement } from './disasm';
import { Progs } from './model';
import { Definition, GlobalValue, ProgsFunction, Type } from './types';

export interface ReportOptions {
  functions?: boolean;
  statements?: boolean;
  globals?: boolean;
  fields?: boolean;
  strings?: boolean;
}

const DEFAULT_REPORT: Required<ReportOptions> = { functions: true, statements: true, globals: true, fields: false, strings: false };

export function formatGlobalValue(value: GlobalValue, nameOf?: (fn: ProgsFunction) => string): string {
  switch (value.kind) {
    case 'string': return JSON.stringify(value.value);
    case 'float': return String(value.value);
    case 'vector': return `(${value.value.join(', ')})`;
    case 'entity': return `entity ${value.value}`;
    case 'function': return nameOf ? `function ${value.index} ${nameOf(value.value)}` : `function ${value.index}`;
    case 'unrepresentable':
      return value.reason === 'function-out-of-range'
        ? `<invalid function ${value.index}>`
        : `<unhandled type ${Type[value.type]}>`;
  }
}

// A failed lookup becomes placeholder text; the rest of the report goes on.
function orPlaceholder(get: () => string): string {
  try {
    return get();
  } catch (e) {
    if (e instanceof BadOffsetError) return `<${e.message}>`;
    throw e;
  }
}

/**
 * Renders the dump report line by line.
 *
 * Sections, in order: functions (`name file`), statements with a
 * `// file : name` marker before each entry point, global definitions as
 * `(TYPE, name, ofs, value)`, then the opt-in field and string sections.
 */
export function dumpProgs(progs: Progs, options: ReportOptions = {}): string[] {
  const opts = { ...DEFAULT_REPORT, ...options };
  const lines: string[] = [];
  const nameOf = (fn: ProgsFunction) => orPlaceholder(() => progs.functionName(fn));
  const fileOf = (fn: ProgsFunction) => orPlaceholder(() => progs.functionFile(fn));
  const defName = (def: Definition) => orPlaceholder(() => progs.definitionName(def));

  if (opts.functions) {
    for (const fn of progs.functions) lines.push(`${nameOf(fn)} ${fileOf(fn)}`);
  }

  if (opts.statements) {
    const entries = progs.entryPoints();
    progs.statements.forEach((st, num) => {
      const fn = entries.get(num);
      if (fn) lines.push(`// ${fileOf(fn)} : ${nameOf(fn)}`);
      lines.push(formatStatement(st));
    });
  }

  if (opts.globals) {
    for (const def of progs.globalDefs) {
      const value = orPlaceholder(() => formatGlobalValue(progs.definitionValue(def), nameOf));
      lines.push(`(${Type[def.type]}, ${defName(def)}, ${def.ofs}, ${value})`);
    }
  }

  if (opts.fields) {
    for (const def of progs.fieldDefs) lines.push(`(${Type[def.type]}, ${defName(def)}, ${def.ofs})`);
  }

  if (opts.strings && progs.strings.length > 0) {
    lines.push(...progs.strings.dumpText().split('\n'));
  }
  return lines;
}
