export type KeyStyle = 'camel' | 'snake';

export const toSnakeCase = (key: string) => key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Renames keys of plain objects at any depth; arrays are walked, other values kept. */
export function transformKeys(value: unknown, rename: (key: string) => string): unknown {
  if (Array.isArray(value)) return value.map((v) => transformKeys(v, rename));
  if (!isPlainObject(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [rename(k), transformKeys(v, rename)]));
}

export function applyKeyStyle(value: unknown, style: KeyStyle): unknown {
  return style === 'snake' ? transformKeys(value, toSnakeCase) : value;
}
