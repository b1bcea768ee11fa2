import type { ServiceDescriptionRecord } from '@geoharvest/shared';
import { isProtocol } from '../../constants.js';

// Plain code-unit ordering, independent of the host locale.
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortByTitle<T extends { title: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compareText(a.title, b.title));
}

/**
 * Drops records without a service URL or with an unknown protocol, then keeps
 * one record per service URL. Records are walked title-descending into a
 * last-wins map, so the alphabetically first title survives.
 */
export function filterServiceRecords(
  records: readonly ServiceDescriptionRecord[],
): ServiceDescriptionRecord[] {
  const usable = records
    .filter((r) => r.serviceUrl !== '' && isProtocol(r.serviceProtocol))
    .sort((a, b) => compareText(b.title, a.title));
  const byUrl = new Map<string, ServiceDescriptionRecord>();
  for (const r of usable) byUrl.set(r.serviceUrl, r);
  return sortByTitle([...byUrl.values()]);
}
