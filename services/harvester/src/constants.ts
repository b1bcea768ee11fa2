import type { Protocol } from '@geoharvest/shared';

export const DEFAULT_CSW_URL = 'https://nationaalgeoregister.nl/geonetwork/srv/dut/csw';
export const DEFAULT_SERVICE_OWNER = 'Beheer PDOK';

export const WMS_PROTOCOL = 'OGC:WMS';
export const WFS_PROTOCOL = 'OGC:WFS';
export const WCS_PROTOCOL = 'OGC:WCS';
export const WMTS_PROTOCOL = 'OGC:WMTS';
export const ATOM_PROTOCOL = 'INSPIRE Atom';
export const OAT_PROTOCOL = 'OGC:API tiles';
export const OAF_PROTOCOL = 'OGC:API features';

export const PROTOCOLS: readonly Protocol[] = [
  WFS_PROTOCOL,
  WMS_PROTOCOL,
  WCS_PROTOCOL,
  WMTS_PROTOCOL,
  ATOM_PROTOCOL,
  OAT_PROTOCOL,
  OAF_PROTOCOL,
];

export const PROTOCOL_CODES: Record<Protocol, string> = {
  [WMS_PROTOCOL]: 'wms',
  [WFS_PROTOCOL]: 'wfs',
  [WCS_PROTOCOL]: 'wcs',
  [WMTS_PROTOCOL]: 'wmts',
  [ATOM_PROTOCOL]: 'atom',
  [OAT_PROTOCOL]: 'oat',
  [OAF_PROTOCOL]: 'oaf',
};

// Capability document versions requested per OGC protocol
export const CAPABILITIES_VERSIONS = {
  [WMS_PROTOCOL]: '1.3.0',
  [WFS_PROTOCOL]: '2.0.0',
  [WCS_PROTOCOL]: '1.1.0',
  [WMTS_PROTOCOL]: '1.0.0',
} as const;

export const ISO_GMD_SCHEMA = 'http://www.isotc211.org/2005/gmd';
export const CSW_RECORD_SCHEMA = 'http://www.opengis.net/cat/csw/2.0.2';
export const MAX_PAGE_SIZE = 100;

// Legacy WMTS endpoint whose catalogue URLs carry redundant path elements.
export const LEGACY_WMTS_ENDPOINT = 'https://geodata.nationaalgeoregister.nl/tiles/service/wmts';

export function isProtocol(value: string): value is Protocol {
  return PROTOCOLS.some((p) => p === value);
}
