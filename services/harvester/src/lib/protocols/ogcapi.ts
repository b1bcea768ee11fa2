import { z } from 'zod';
import type { HttpClient } from '../http.js';
import { resolveHref, withQueryParams } from '../url.js';

// Lenient readers: a missing or mistyped field becomes an empty value.
const text = z.string().catch('');

export const LinkSchema = z.object({ rel: text, href: text, type: text });
export type Link = z.infer<typeof LinkSchema>;
const links = z.array(LinkSchema).catch([]);

export const LandingPageSchema = z.object({ title: text, description: text, links });

export const OpenApiSchema = z.object({
  info: z
    .object({ title: text, description: text, version: text })
    .catch({ title: '', description: '', version: '' }),
  tags: z.array(z.object({ name: text })).catch([]),
  servers: z.array(z.object({ url: text })).catch([]),
  paths: z.record(z.unknown()).catch({}),
});
export type OpenApiDocument = z.infer<typeof OpenApiSchema>;

export const StylesSchema = z.object({
  default: text,
  styles: z.array(z.object({ id: text, title: text, links })).catch([]),
});

export const TilesSchema = z.object({
  title: text,
  description: text,
  tilesets: z
    .array(
      z.object({
        tileMatrixSetId: text,
        // plain URI, or `{ uri }` in later drafts
        crs: z.union([z.string(), z.object({ uri: z.string() }).transform((c) => c.uri)]).catch(''),
        links,
      }),
    )
    .catch([]),
});

export const TileSetSchema = z.object({
  tileMatrixSetLimits: z
    .array(z.object({ tileMatrix: z.union([z.string(), z.number()]).transform(String).catch('') }))
    .catch([]),
});

export const CollectionsSchema = z.object({
  collections: z.array(z.object({ id: text, title: text, description: text })).catch([]),
});

export interface LandingPage {
  url: string;
  title: string;
  description: string;
  links: Link[];
}

/** Fetches a JSON document and reads it through `schema`. Link hrefs stay as published. */
export async function getDocument<S extends z.ZodTypeAny>(
  http: HttpClient,
  url: string,
  schema: S,
): Promise<z.output<S>> {
  return schema.parse(await http.getJson(url));
}

export async function loadLandingPage(http: HttpClient, url: string): Promise<LandingPage> {
  const page = await getDocument(http, withQueryParams(url, { f: 'json' }), LandingPageSchema);
  return {
    url,
    title: page.title,
    description: page.description,
    links: page.links.map((l) => ({ ...l, href: l.href && resolveHref(l.href, url) })),
  };
}

export function findLink(list: readonly Link[], match: (rel: string) => boolean): Link | undefined {
  return list.find((l) => l.href !== '' && match(l.rel));
}

export const emptyOpenApi = (): OpenApiDocument => OpenApiSchema.parse({});

export async function loadServiceDescription(http: HttpClient, landing: LandingPage): Promise<OpenApiDocument> {
  const link = findLink(landing.links, (rel) => rel === 'service-desc');
  return link ? getDocument(http, link.href, OpenApiSchema) : emptyOpenApi();
}

export function tagNames(doc: OpenApiDocument): string[] {
  return doc.tags.map((t) => t.name).filter(Boolean);
}
