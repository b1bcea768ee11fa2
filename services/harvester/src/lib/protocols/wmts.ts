import type { ServiceDescriptionRecord, WmtsLayer, WmtsService } from '@geoharvest/shared';
import { WMTS_PROTOCOL } from '../../constants.js';
import type { HttpClient } from '../http.js';
import { capabilitiesRequestUrl } from '../url.js';
import { children, pickAll, textAt, textOf } from '../xml.js';
import { capabilitiesRoot, owsIdentification, parseStyle, serviceFields } from './common.js';

function wmtsLayer(layer: unknown, record: ServiceDescriptionRecord): WmtsLayer {
  return {
    name: textAt(layer, 'Identifier'),
    title: textAt(layer, 'Title'),
    abstract: textAt(layer, 'Abstract'),
    datasetMetadataId: record.datasetMetadataId,
    styles: children(layer, 'Style').map(parseStyle),
    tilematrixsets: pickAll(layer, 'TileMatrixSetLink/TileMatrixSet').map(textOf).join(','),
    imgformats: children(layer, 'Format').map(textOf).join(','),
  };
}

export function parseWmtsCapabilities(xml: string, record: ServiceDescriptionRecord): WmtsService {
  const root = capabilitiesRoot(xml, ['Capabilities']);
  return {
    protocol: WMTS_PROTOCOL,
    ...serviceFields(record, owsIdentification(root)),
    layers: pickAll(root, 'Contents/Layer').map((l) => wmtsLayer(l, record)),
  };
}

export async function fetchWmtsService(http: HttpClient, record: ServiceDescriptionRecord): Promise<WmtsService> {
  const url = capabilitiesRequestUrl(record.serviceUrl, WMTS_PROTOCOL);
  return parseWmtsCapabilities(await http.getText(url), record);
}
