import type {
  AtomDataset,
  AtomDownload,
  AtomLink,
  AtomService,
  ServiceDescriptionRecord,
} from '@geoharvest/shared';
import { ATOM_PROTOCOL } from '../../constants.js';
import { errorMessage } from '../../errors.js';
import type { Logger } from '../../logger.js';
import type { HttpClient } from '../http.js';
import { metadataIdFromUrl, resolveHref } from '../url.js';
import { attr, children, textAt } from '../xml.js';
import { capabilitiesRoot, serviceFields } from './common.js';

const ATOM_ACCEPT = 'application/atom+xml,application/xml;q=0.9,*/*;q=0.5';
export const MAX_FEED_DEPTH = 3;

interface FeedContext {
  http: HttpClient;
  logger: Logger;
  /** Feed URLs already read while resolving this service. */
  visited: Set<string>;
  /** Downloads collected per feed URL, shared by datasets linking the same feed. */
  downloads: Map<string, AtomDownload[]>;
}

const isAtomType = (type: string) => type.toLowerCase().startsWith('application/atom+xml');

async function readFeed(http: HttpClient, url: string): Promise<unknown> {
  return capabilitiesRoot(await http.getText(url, ATOM_ACCEPT), ['feed']);
}

function atomLink(link: unknown, base: string): AtomLink {
  const href = attr(link, 'href');
  return {
    href: href && resolveHref(href, base),
    rel: attr(link, 'rel'),
    type: attr(link, 'type'),
    title: attr(link, 'title'),
    length: attr(link, 'length'),
  };
}

/** Links sharing an href keep their typed variants; untyped duplicates are dropped. */
export function dedupeLinks(links: readonly AtomLink[]): AtomLink[] {
  const typed = new Set(links.filter((l) => l.type).map((l) => l.href));
  const untyped = new Set<string>();
  return links.filter((l) => {
    if (l.type) return true;
    if (typed.has(l.href) || untyped.has(l.href)) return false;
    untyped.add(l.href);
    return true;
  });
}

function entryLinks(entry: unknown, base: string): AtomLink[] {
  return dedupeLinks(children(entry, 'link').map((l) => atomLink(l, base)));
}

function feedLink(links: readonly AtomLink[]): AtomLink | undefined {
  return links.find((l) => isAtomType(l.type) && (l.rel === 'alternate' || l.rel === ''));
}

function download(entry: unknown, links: AtomLink[]): AtomDownload {
  return {
    id: textAt(entry, 'id'),
    title: textAt(entry, 'title'),
    updated: textAt(entry, 'updated'),
    crs: children(entry, 'category')
      .map((c) => attr(c, 'term'))
      .filter(Boolean)
      .join(','),
    links,
  };
}

async function collectDownloads(ctx: FeedContext, feedUrl: string, depth: number): Promise<AtomDownload[]> {
  ctx.visited.add(feedUrl);
  const feed = await readFeed(ctx.http, feedUrl);
  const out: AtomDownload[] = [];
  for (const entry of children(feed, 'entry')) {
    const links = entryLinks(entry, feedUrl);
    const nested = feedLink(links);
    if (nested && depth < MAX_FEED_DEPTH && !ctx.visited.has(nested.href)) {
      try {
        out.push(...(await collectDownloads(ctx, nested.href, depth + 1)));
        continue;
      } catch (e) {
        ctx.logger.warn({ msg: 'nested atom feed unreadable', url: nested.href, error: errorMessage(e) });
      }
    }
    out.push(download(entry, links));
  }
  ctx.downloads.set(feedUrl, out);
  return out;
}

async function dataset(ctx: FeedContext, entry: unknown, base: string): Promise<AtomDataset> {
  const links = entryLinks(entry, base);
  const describedBy = links.find((l) => l.rel === 'describedby');
  const url = feedLink(links)?.href ?? '';
  let downloads: AtomDownload[] = [];
  const known = ctx.downloads.get(url);
  if (known) {
    downloads = [...known];
  } else if (url && ctx.visited.has(url)) {
    ctx.logger.warn({ msg: 'dataset feed already visited without downloads', url });
  } else if (url) {
    try {
      downloads = await collectDownloads(ctx, url, 1);
    } catch (e) {
      ctx.logger.warn({ msg: 'dataset feed unreadable', url, error: errorMessage(e) });
    }
  }
  return {
    title: textAt(entry, 'title'),
    abstract: textAt(entry, 'summary'),
    spatialDatasetIdentifierCode: textAt(entry, 'spatial_dataset_identifier_code'),
    spatialDatasetIdentifierNamespace: textAt(entry, 'spatial_dataset_identifier_namespace'),
    datasetMetadataId: describedBy ? metadataIdFromUrl(describedBy.href) : '',
    url,
    downloads,
  };
}

/**
 * Reads an INSPIRE download service feed and the dataset feeds it links to.
 * Only the service feed is required; unreadable dataset feeds leave their
 * dataset without downloads.
 */
export async function fetchAtomService(
  http: HttpClient,
  record: ServiceDescriptionRecord,
  logger: Logger,
): Promise<AtomService> {
  const ctx: FeedContext = { http, logger, visited: new Set([record.serviceUrl]), downloads: new Map() };
  const feed = await readFeed(http, record.serviceUrl);
  const datasets: AtomDataset[] = [];
  for (const entry of children(feed, 'entry')) {
    datasets.push(await dataset(ctx, entry, record.serviceUrl));
  }
  return {
    protocol: ATOM_PROTOCOL,
    ...serviceFields(record, {
      title: textAt(feed, 'title'),
      abstract: textAt(feed, 'subtitle'),
      // Feeds carry no keyword list; use the catalogue record's terms.
      keywords: Object.values(record.keywords).flat(),
    }),
    datasets,
  };
}
