import type { Featuretype, ServiceDescriptionRecord, WfsService } from '@geoharvest/shared';
import { WFS_PROTOCOL } from '../../constants.js';
import type { HttpClient } from '../http.js';
import { capabilitiesRequestUrl, metadataIdFromUrl } from '../url.js';
import { attr, children, pick, pickAll, textAt, textOf } from '../xml.js';
import { capabilitiesRoot, owsIdentification, serviceFields } from './common.js';

// WFS 2.0 lists values under AllowedValues, 1.1 directly under Parameter.
function parameterValues(scope: unknown, name: string): string[] {
  const param = children(scope, 'Parameter').find((p) => attr(p, 'name') === name);
  if (param === undefined) return [];
  return [...pickAll(param, 'AllowedValues/Value'), ...children(param, 'Value')].map(textOf).filter(Boolean);
}

function outputFormats(root: unknown): string {
  const ops = pick(root, 'OperationsMetadata');
  const getFeature = children(ops, 'Operation').find((o) => attr(o, 'name') === 'GetFeature');
  const own = parameterValues(getFeature, 'outputFormat');
  return (own.length > 0 ? own : parameterValues(ops, 'outputFormat')).join(',');
}

function featuretype(ft: unknown, record: ServiceDescriptionRecord): Featuretype {
  const metadataUrl = pick(ft, 'MetadataURL');
  const href = attr(metadataUrl, 'href') || textOf(metadataUrl);
  return {
    name: textAt(ft, 'Name'),
    title: textAt(ft, 'Title'),
    abstract: textAt(ft, 'Abstract'),
    datasetMetadataId: (href && metadataIdFromUrl(href)) || record.datasetMetadataId,
  };
}

export function parseWfsCapabilities(xml: string, record: ServiceDescriptionRecord): WfsService {
  const root = capabilitiesRoot(xml, ['WFS_Capabilities']);
  return {
    protocol: WFS_PROTOCOL,
    ...serviceFields(record, owsIdentification(root)),
    outputFormats: outputFormats(root),
    featuretypes: pickAll(root, 'FeatureTypeList/FeatureType').map((ft) => featuretype(ft, record)),
  };
}

export async function fetchWfsService(http: HttpClient, record: ServiceDescriptionRecord): Promise<WfsService> {
  const url = capabilitiesRequestUrl(record.serviceUrl, WFS_PROTOCOL);
  return parseWfsCapabilities(await http.getText(url), record);
}
