import type { ServiceDescriptionRecord, Style, WmsLayer, WmsService } from '@geoharvest/shared';
import { WMS_PROTOCOL } from '../../constants.js';
import type { HttpClient } from '../http.js';
import { capabilitiesRequestUrl, metadataIdFromUrl } from '../url.js';
import { attr, children, pick, pickAll, textAt, textOf } from '../xml.js';
import { capabilitiesRoot, parseStyle, serviceFields } from './common.js';

const DATASET_METADATA_TYPES = ['TC211', 'ISO19115:2003'];

interface Inherited {
  crs: string[];
  styles: Style[];
  minscale: string;
  maxscale: string;
}

function layerMetadataId(layer: unknown): string {
  const metadataUrl = children(layer, 'MetadataURL').find((m) => DATASET_METADATA_TYPES.includes(attr(m, 'type')));
  if (metadataUrl === undefined) return '';
  return metadataIdFromUrl(attr(pick(metadataUrl, 'OnlineResource'), 'href'));
}

// Depth-first, document order. CRS, styles and scale denominators carry down to child layers.
function collectLayers(layer: unknown, parent: Inherited, out: WmsLayer[]): void {
  const ownCrs = [...children(layer, 'CRS'), ...children(layer, 'SRS')]
    .flatMap((c) => textOf(c).split(/\s+/))
    .filter(Boolean);
  const ownStyles = children(layer, 'Style').map(parseStyle);
  const current: Inherited = {
    crs: [...new Set([...parent.crs, ...ownCrs])],
    styles: [...parent.styles.filter((s) => !ownStyles.some((o) => o.name === s.name)), ...ownStyles],
    minscale: textAt(layer, 'MinScaleDenominator') || parent.minscale,
    maxscale: textAt(layer, 'MaxScaleDenominator') || parent.maxscale,
  };

  const name = textAt(layer, 'Name');
  if (name) {
    out.push({
      name,
      title: textAt(layer, 'Title'),
      abstract: textAt(layer, 'Abstract'),
      datasetMetadataId: layerMetadataId(layer),
      styles: current.styles,
      crs: current.crs.join(','),
      minscale: current.minscale,
      maxscale: current.maxscale,
    });
  }
  for (const child of children(layer, 'Layer')) collectLayers(child, current, out);
}

export function parseWmsCapabilities(xml: string, record: ServiceDescriptionRecord): WmsService {
  const root = capabilitiesRoot(xml, ['WMS_Capabilities', 'WMT_MS_Capabilities']);
  const service = pick(root, 'Service');
  const layers: WmsLayer[] = [];
  const top: Inherited = { crs: [], styles: [], minscale: '', maxscale: '' };
  for (const layer of pickAll(root, 'Capability/Layer')) collectLayers(layer, top, layers);

  return {
    protocol: WMS_PROTOCOL,
    ...serviceFields(record, {
      title: textAt(service, 'Title'),
      abstract: textAt(service, 'Abstract'),
      keywords: pickAll(service, 'KeywordList/Keyword').map(textOf).filter(Boolean),
    }),
    imgformats: pickAll(root, 'Capability/Request/GetMap/Format').map(textOf).join(','),
    layers,
  };
}

export async function fetchWmsService(http: HttpClient, record: ServiceDescriptionRecord): Promise<WmsService> {
  const url = capabilitiesRequestUrl(record.serviceUrl, WMS_PROTOCOL);
  return parseWmsCapabilities(await http.getText(url), record);
}
