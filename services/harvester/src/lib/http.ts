import { fetch } from 'undici';
import { HttpError } from '../errors.js';

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init?: { headers?: Record<string, string>; signal?: AbortSignal },
) => Promise<FetchResponse>;

export interface HttpClientOptions {
  fetch?: FetchLike;
  userAgent?: string;
  timeoutMs?: number;
}

/** Plain GET transport shared by the catalogue client and protocol handlers. */
export class HttpClient {
  private readonly doFetch: FetchLike;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(opts: HttpClientOptions = {}) {
    this.doFetch = opts.fetch ?? fetch;
    this.userAgent = opts.userAgent ?? 'geoharvest/0.1.0';
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  async getText(url: string, accept = 'application/xml,text/xml;q=0.9,*/*;q=0.5'): Promise<string> {
    const r = await this.doFetch(url, {
      headers: { 'User-Agent': this.userAgent, Accept: accept },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!r.ok) throw new HttpError(r.status, url, r.statusText);
    return r.text();
  }

  async getJson(url: string): Promise<unknown> {
    const body = await this.getText(url, 'application/json');
    return JSON.parse(body);
  }
}
