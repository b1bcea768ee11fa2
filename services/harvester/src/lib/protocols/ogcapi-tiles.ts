import type {
  OatService,
  OatTileSet,
  ServiceDescriptionRecord,
  VectorTileStyle,
} from '@geoharvest/shared';
import type { z } from 'zod';
import { OAT_PROTOCOL } from '../../constants.js';
import type { HttpClient } from '../http.js';
import { resolveHref } from '../url.js';
import {
  StylesSchema,
  TileSetSchema,
  TilesSchema,
  findLink,
  getDocument,
  loadLandingPage,
  loadServiceDescription,
  tagNames,
  type Link,
  type OpenApiDocument,
} from './ogcapi.js';
import { serviceFields } from './common.js';

const TILE_PLACEHOLDERS = ['{tileMatrixSetId}', '{tileMatrix}', '{tileRow}', '{tileCol}'];

/** First server URL joined with the first path carrying every tile placeholder. */
export function tileRequestUrl(doc: OpenApiDocument): string {
  const server = doc.servers.find((s) => s.url !== '')?.url ?? '';
  const path = Object.keys(doc.paths).find((p) => TILE_PLACEHOLDERS.every((ph) => p.includes(ph)));
  return server && path ? `${server}${path}` : '';
}

export function vectorStyles(doc: z.output<typeof StylesSchema>, base: string): VectorTileStyle[] {
  const styles: VectorTileStyle[] = [];
  for (const s of doc.styles) {
    const sheet = s.links.find((l) => l.rel === 'stylesheet');
    const style = { id: s.id, name: s.title, url: sheet ? resolveHref(sheet.href, base) : '' };
    // default style goes first
    if (doc.default !== '' && (s.title === doc.default || s.id === doc.default)) styles.unshift(style);
    else styles.push(style);
  }
  return styles;
}

export function maxZoomLevel(doc: z.output<typeof TileSetSchema>): string {
  const levels = doc.tileMatrixSetLimits.map((l) => Number.parseInt(l.tileMatrix, 10)).filter((n) => !Number.isNaN(n));
  return levels.length > 0 ? String(Math.max(...levels)) : '';
}

function selfLink(list: readonly Link[]): Link | undefined {
  return list.find((l) => l.rel === 'self') ?? list[0];
}

async function tilesets(http: HttpClient, doc: z.output<typeof TilesSchema>, base: string): Promise<OatTileSet[]> {
  const out: OatTileSet[] = [];
  for (const ts of doc.tilesets) {
    const link = selfLink(ts.links);
    const zoom = link?.href
      ? maxZoomLevel(await getDocument(http, resolveHref(link.href, base), TileSetSchema))
      : '';
    out.push({ tilesetId: ts.tileMatrixSetId, tilesetCrs: ts.crs, tilesetMaxZoomlevel: zoom });
  }
  return out;
}

export async function fetchOatService(http: HttpClient, record: ServiceDescriptionRecord): Promise<OatService> {
  const landing = await loadLandingPage(http, record.serviceUrl);
  const desc = await loadServiceDescription(http, landing);
  const stylesLink = findLink(landing.links, (rel) => rel.endsWith('styles'));
  const tilesLink = findLink(landing.links, (rel) => rel === 'tiles' || rel.endsWith('tilesets-vector'));

  const styles = stylesLink ? vectorStyles(await getDocument(http, stylesLink.href, StylesSchema), stylesLink.href) : [];
  const layers: OatService['layers'] = [];
  if (tilesLink) {
    const tiles = await getDocument(http, tilesLink.href, TilesSchema);
    layers.push({
      name: tiles.title,
      title: tiles.title,
      abstract: tiles.description,
      datasetMetadataId: record.datasetMetadataId,
      styles,
      tiles: [{ title: tiles.title, abstract: tiles.description, tilesets: await tilesets(http, tiles, tilesLink.href) }],
    });
  }

  return {
    protocol: OAT_PROTOCOL,
    ...serviceFields(record, {
      title: landing.title || desc.info.title,
      abstract: landing.description || desc.info.description,
      keywords: tagNames(desc),
    }),
    url: tileRequestUrl(desc) || record.serviceUrl,
    layers,
  };
}
