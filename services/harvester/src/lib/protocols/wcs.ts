import type { Coverage, ServiceDescriptionRecord, WcsService } from '@geoharvest/shared';
import { WCS_PROTOCOL } from '../../constants.js';
import type { HttpClient } from '../http.js';
import { capabilitiesRequestUrl } from '../url.js';
import { pickAll, textAt } from '../xml.js';
import { capabilitiesRoot, owsIdentification, serviceFields } from './common.js';

export function parseWcsCapabilities(xml: string, record: ServiceDescriptionRecord): WcsService {
  // Namespace prefixes are dropped on parse, so 1.1 documents declaring the
  // older OWS namespace read the same as conforming ones.
  const root = capabilitiesRoot(xml, ['Capabilities']);
  const coverages: Coverage[] = pickAll(root, 'Contents/CoverageSummary').map((c) => ({
    name: textAt(c, 'Identifier') || textAt(c, 'CoverageId'),
    title: textAt(c, 'Title'),
    abstract: textAt(c, 'Abstract'),
    datasetMetadataId: record.datasetMetadataId,
  }));
  return {
    protocol: WCS_PROTOCOL,
    ...serviceFields(record, owsIdentification(root)),
    coverages,
  };
}

export async function fetchWcsService(http: HttpClient, record: ServiceDescriptionRecord): Promise<WcsService> {
  const url = capabilitiesRequestUrl(record.serviceUrl, WCS_PROTOCOL);
  return parseWcsCapabilities(await http.getText(url), record);
}
