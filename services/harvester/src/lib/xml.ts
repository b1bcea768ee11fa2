import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { XmlParseError } from '../errors.js';

export type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true, // strip gmd:/ows:/wms: prefixes, attributes become @_href etc.
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

export function parseXml(xml: string): XmlNode {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new XmlParseError(`${valid.err.msg} (line ${valid.err.line})`);
  }
  const doc: unknown = parser.parse(xml);
  if (!isNode(doc)) throw new XmlParseError('empty document');
  return doc;
}

export function isNode(x: unknown): x is XmlNode {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function toArray<T>(x: T | T[] | undefined | null): T[] {
  if (x === undefined || x === null) return [];
  return Array.isArray(x) ? x : [x];
}

export function children(node: unknown, name: string): unknown[] {
  return isNode(node) ? toArray(node[name]) : [];
}

/** Descends a slash-separated element path, taking the first match at each step. */
export function pick(node: unknown, path: string): unknown {
  let current: unknown = node;
  for (const step of path.split('/')) {
    if (!step) continue;
    current = children(current, step)[0];
    if (current === undefined) return undefined;
  }
  return current;
}

/** Every element at `path`, fanning out over repeated elements at each step. */
export function pickAll(node: unknown, path: string): unknown[] {
  let current: unknown[] = [node];
  for (const step of path.split('/')) {
    if (!step) continue;
    current = current.flatMap((n) => children(n, step));
  }
  return current;
}

export function textOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return '';
}

export function textAt(node: unknown, path: string): string {
  return textOf(pick(node, path));
}

export function attr(node: unknown, name: string): string {
  return isNode(node) ? textOf(node[`@_${name}`]) : '';
}

/** Root element of a parsed document, ignoring the `?xml` declaration. */
export function rootElement(doc: XmlNode): { name: string; node: unknown } {
  const name = Object.keys(doc).find((k) => k !== '?xml' && !k.startsWith('#')) ?? '';
  return { name, node: doc[name] };
}
