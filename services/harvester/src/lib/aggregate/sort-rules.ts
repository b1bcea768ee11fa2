import { readFile } from 'node:fs/promises';
import type { LayerRow, SortRule } from '@geoharvest/shared';
import { z } from 'zod';
import { PROTOCOL_CODES, WMTS_PROTOCOL, isProtocol } from '../../constants.js';
import { ConfigError, errorMessage } from '../../errors.js';
import type { Logger } from '../../logger.js';

const SortRuleSchema = z.object({
  index: z.number().int(),
  types: z.array(z.string()),
  names: z.array(z.string()),
});
const SortRulesSchema = z.array(SortRuleSchema);

export const UNMATCHED_WMTS = 99;
export const UNMATCHED = 100;

interface CompiledRule {
  rule: SortRule;
  types: Set<string>;
  names: RegExp[];
}

export function parseSortRules(raw: unknown): SortRule[] {
  const parsed = SortRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid sort rules: ${issues}`);
  }
  for (const rule of parsed.data) compile(rule);
  return parsed.data;
}

export async function loadSortRules(path: string): Promise<SortRule[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (e) {
    throw new ConfigError(`cannot read sort rules ${path}: ${errorMessage(e)}`);
  }
  return parseSortRules(raw);
}

function compile(rule: SortRule): CompiledRule {
  const names = rule.names.map((pattern) => {
    try {
      return new RegExp(pattern, 'i');
    } catch (e) {
      throw new ConfigError(`invalid name pattern in sort rule ${rule.index}: ${errorMessage(e)}`);
    }
  });
  return { rule, types: new Set(rule.types.map((t) => t.toLowerCase())), names };
}

function typeKeys(protocol: string): string[] {
  const keys = [protocol.toLowerCase()];
  if (isProtocol(protocol)) keys.push(PROTOCOL_CODES[protocol]);
  return keys;
}

function sortValue(row: LayerRow, rules: readonly CompiledRule[]): number {
  const name = row.name.toLowerCase();
  const keys = typeKeys(row.serviceProtocol);
  for (const { rule, types, names } of rules) {
    if (keys.some((k) => types.has(k)) && names.some((re) => re.test(name))) return rule.index;
  }
  return row.serviceProtocol === WMTS_PROTOCOL ? UNMATCHED_WMTS : UNMATCHED;
}

/**
 * Orders rows by the index of the first matching rule (rules taken by
 * ascending index). Rows keep their relative order within one index.
 */
export function sortLayers(rows: readonly LayerRow[], rules: readonly SortRule[], logger?: Logger): LayerRow[] {
  const compiled = [...rules].sort((a, b) => a.index - b.index).map(compile);
  const keyed = rows.map((row) => ({ row, key: sortValue(row, compiled) }));
  const used = new Set(keyed.map((k) => k.key));
  for (const rule of rules) {
    if (!used.has(rule.index)) logger?.info({ msg: 'no layers matched sort rule', rule });
  }
  return keyed.sort((a, b) => a.key - b.key).map((k) => k.row);
}
