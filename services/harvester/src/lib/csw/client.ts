import type {
  CatalogueListRecord,
  DatasetMetadataRecord,
  FilterMode,
  Protocol,
  ServiceDescriptionRecord,
} from '@geoharvest/shared';
import { MAX_PAGE_SIZE } from '../../constants.js';
import { CatalogueError, errorMessage } from '../../errors.js';
import { silentLogger, type Logger } from '../../logger.js';
import type { HttpClient } from '../http.js';
import { RetryPolicy } from '../retry.js';
import { filterServiceRecords, sortByTitle } from './filter.js';
import { getRecordByIdUrl, getRecordsUrl, identifierQuery, protocolQuery, type ElementSet } from './query.js';
import {
  parseDatasetRecord,
  parseRecordById,
  parseSearchResults,
  parseServiceRecord,
  parseSummaryRecord,
} from './records.js';

export interface CatalogueClientOptions {
  url: string;
  http: HttpClient;
  retry?: RetryPolicy;
  logger?: Logger;
}

interface PageRequest<T> {
  cql: string;
  maxResults: number;
  elementSet: ElementSet;
  element: string;
  parse: (node: unknown) => T;
  idOf: (record: T) => string;
}

/** Paginated CSW 2.0.2 client speaking GetRecords/GetRecordById over KVP. */
export class CatalogueClient {
  readonly url: string;
  private readonly http: HttpClient;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(opts: CatalogueClientOptions) {
    this.url = opts.url;
    this.http = opts.http;
    this.logger = opts.logger ?? silentLogger();
    this.retry = opts.retry ?? new RetryPolicy({ logger: this.logger });
  }

  async queryByProtocol(
    protocol: Protocol,
    owner: string,
    maxResults = 0,
    filterMode: FilterMode = 'filtered',
  ): Promise<ServiceDescriptionRecord[]> {
    const cql = protocolQuery(protocol, owner);
    this.logger.debug({ msg: 'catalogue query', cql });
    const records = await this.queryServices(cql, maxResults, filterMode);
    this.logger.info({ msg: 'service records found', protocol, count: records.length });
    return records;
  }

  /**
   * Runs the protocol queries one after another. A failing protocol contributes
   * nothing; a `CatalogueError` is thrown only when every protocol failed.
   */
  async queryByProtocols(
    protocols: readonly Protocol[],
    owner: string,
    maxResults = 0,
    filterMode: FilterMode = 'filtered',
  ): Promise<ServiceDescriptionRecord[]> {
    const all: ServiceDescriptionRecord[] = [];
    const failed: Protocol[] = [];
    for (const protocol of protocols) {
      try {
        all.push(...(await this.queryByProtocol(protocol, owner, maxResults, filterMode)));
      } catch (e) {
        failed.push(protocol);
        this.logger.error({ msg: 'catalogue query failed', protocol, error: errorMessage(e) });
      }
    }
    if (failed.length > 0 && failed.length === protocols.length) {
      throw new CatalogueError(`all protocol queries failed (${failed.join(', ')})`, this.url);
    }
    return all;
  }

  queryById(id: string, filterMode: FilterMode = 'filtered'): Promise<ServiceDescriptionRecord[]> {
    return this.queryServices(identifierQuery(id), 0, filterMode);
  }

  async fetchDatasetMetadata(id: string): Promise<DatasetMetadataRecord | undefined> {
    const url = getRecordByIdUrl(this.url, id);
    try {
      const md = await this.retry.run(
        async () => parseRecordById(await this.http.getText(url), url),
        `GetRecordById ${id}`,
      );
      if (md === undefined) {
        this.logger.warn({ msg: 'dataset metadata record not found', metadataId: id });
        return undefined;
      }
      return parseDatasetRecord(md, id);
    } catch (e) {
      this.logger.warn({ msg: 'dataset metadata lookup failed', metadataId: id, error: errorMessage(e) });
      return undefined;
    }
  }

  /** Summary search returning Dublin Core list records. */
  async searchRecords(cql: string, maxResults = 0): Promise<CatalogueListRecord[]> {
    const records = await this.paginate({
      cql,
      maxResults,
      elementSet: 'summary',
      element: 'SummaryRecord',
      parse: parseSummaryRecord,
      idOf: (r) => r.identifier,
    });
    return sortByTitle(records);
  }

  private async queryServices(
    cql: string,
    maxResults: number,
    filterMode: FilterMode,
  ): Promise<ServiceDescriptionRecord[]> {
    const records = await this.paginate({
      cql,
      maxResults,
      elementSet: 'full',
      element: 'MD_Metadata',
      parse: (node) => parseServiceRecord(node, this.logger),
      idOf: (r) => r.metadataId,
    });
    return filterMode === 'filtered' ? filterServiceRecords(records) : sortByTitle(records);
  }

  private async paginate<T>(req: PageRequest<T>): Promise<T[]> {
    const pageSize = req.maxResults > 0 ? Math.min(req.maxResults, MAX_PAGE_SIZE) : MAX_PAGE_SIZE;
    const seen = new Set<string>();
    const result: T[] = [];
    let start = 1;
    let expected: number | undefined;
    let maxPages = 1;

    for (let pageNo = 1; pageNo <= maxPages; pageNo++) {
      const url = getRecordsUrl(this.url, {
        cql: req.cql,
        startPosition: start,
        maxRecords: pageSize,
        elementSet: req.elementSet,
      });
      const page = await this.retry.run(
        async () => parseSearchResults(await this.http.getText(url), req.element, url),
        `GetRecords start=${start}`,
      );

      if (expected === undefined) {
        expected = page.matched;
        maxPages = Math.ceil(expected / pageSize) + 1;
      } else if (page.matched !== expected) {
        this.logger.warn({
          msg: 'match count changed during pagination, stopping',
          expected,
          matched: page.matched,
          collected: result.length,
        });
        break;
      }

      for (const node of page.records) {
        const record = req.parse(node);
        const id = req.idOf(record);
        if (id !== '') {
          if (seen.has(id)) continue;
          seen.add(id);
        }
        result.push(record);
      }

      if (req.maxResults > 0 && result.length >= req.maxResults) break;
      if (page.nextRecord === 0 || page.nextRecord > expected || page.nextRecord <= start) break;
      start = page.nextRecord;
    }

    return req.maxResults > 0 ? result.slice(0, req.maxResults) : result;
  }
}
