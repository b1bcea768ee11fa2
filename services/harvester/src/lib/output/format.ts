import { stringify as toYaml } from 'yaml';
import { applyKeyStyle, type KeyStyle } from './keys.js';

export type OutputFormat = 'json' | 'yaml';

export interface FormatOptions {
  format?: OutputFormat;
  pretty?: boolean;
  keyStyle?: KeyStyle;
  /** Adds an `updated` timestamp; pass a string to pin it. */
  updated?: boolean | string;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** ISO 8601 local time with offset, whole seconds: 2024-03-01T14:05:09+01:00 */
export function localTimestamp(date: Date = new Date()): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? '+' : '-';
  const abs = Math.abs(offset);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

export function contentType(format: OutputFormat): string {
  return format === 'yaml' ? 'application/yaml' : 'application/json';
}

/** Stamps an output document and serializes it. */
export function renderOutput(output: Record<string, unknown>, opts: FormatOptions = {}): string {
  const doc = { ...output };
  if (opts.updated !== false) doc.updated = typeof opts.updated === 'string' ? opts.updated : localTimestamp();
  const styled = applyKeyStyle(doc, opts.keyStyle ?? 'camel');
  if (opts.format === 'yaml') return toYaml(styled);
  return opts.pretty ? JSON.stringify(styled, null, 4) : JSON.stringify(styled);
}
