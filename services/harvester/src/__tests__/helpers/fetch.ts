import { readFileSync } from 'node:fs';
import type { FetchLike } from '../../lib/http.js';

export type Reply = string | { status: number; body?: string };
export type Route = (url: URL) => Reply | Promise<Reply>;

/** In-process stand-in for undici's fetch; records every requested URL. */
export function fakeFetch(route: Route) {
  const calls: string[] = [];
  const fetch: FetchLike = async (url) => {
    calls.push(url);
    const reply = await route(new URL(url));
    const { status, body } = typeof reply === 'string' ? { status: 200, body: reply } : reply;
    return {
      ok: status >= 200 && status < 300,
      status,
      statusText: status === 200 ? 'OK' : 'Error',
      text: async () => body ?? '',
    };
  };
  return { fetch, calls };
}

/** Routes on the full URL; anything unlisted answers 404. */
export function routes(table: Record<string, Reply | (() => Reply)>): Route {
  return (url) => {
    const hit = table[url.toString()];
    if (hit === undefined) return { status: 404 };
    return typeof hit === 'function' ? hit() : hit;
  };
}

export const json = (doc: unknown): string => JSON.stringify(doc);

export function fixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');
}
