import {
  ATOM_PROTOCOL,
  CAPABILITIES_VERSIONS,
  LEGACY_WMTS_ENDPOINT,
  OAF_PROTOCOL,
  OAT_PROTOCOL,
  WMTS_PROTOCOL,
  isProtocol,
} from '../constants.js';

/**
 * Metadata record id from a metadata URL query string; a non-empty `uuid` wins over `id`.
 * Parameter names are matched case-insensitively.
 */
export function metadataIdFromUrl(url: string): string {
  const query = url.split('?')[1];
  if (!query) return '';
  const params = new Map<string, string>();
  for (const [k, v] of new URLSearchParams(query.split('#')[0])) {
    const key = k.toLowerCase();
    if (!params.has(key)) params.set(key, v);
  }
  return params.get('uuid') || params.get('id') || '';
}

/** Dataset id referenced by a service record's operatesOn link. */
export function datasetIdFromOperatesOn(operatesOn: string): string {
  return metadataIdFromUrl(operatesOn.toLowerCase());
}

/**
 * Canonical capabilities URL for a catalogue service URL. Feeds are used
 * as-is, OGC API landing pages only lose their query string.
 */
export function toCapabilitiesUrl(serviceUrl: string, protocol: string): string {
  if (!serviceUrl || !isProtocol(protocol) || protocol === ATOM_PROTOCOL) return serviceUrl;
  let base = serviceUrl.split('?')[0];
  if (protocol === OAT_PROTOCOL || protocol === OAF_PROTOCOL) return base;
  if (protocol === WMTS_PROTOCOL) {
    if (base.includes(LEGACY_WMTS_ENDPOINT)) base = LEGACY_WMTS_ENDPOINT;
    if (base.endsWith('/WMTSCapabilities.xml')) base = base.slice(0, -'/WMTSCapabilities.xml'.length);
  }
  const serviceType = protocol.split(':')[1];
  return `${base}?request=GetCapabilities&service=${serviceType}`;
}

export function withQueryParams(url: string, params: Record<string, string>): string {
  const u = new URL(url);
  for (const [k, v] of Object.entries(params)) u.searchParams.set(k, v);
  return u.toString();
}

export function capabilitiesRequestUrl(url: string, protocol: keyof typeof CAPABILITIES_VERSIONS): string {
  return withQueryParams(url, { version: CAPABILITIES_VERSIONS[protocol] });
}

// Endpoints behind an access gate are published as https://secure...
export function isSecureUrl(url: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\/secure/i.test(url);
}

export function resolveHref(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}
