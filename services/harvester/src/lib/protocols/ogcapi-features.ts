import type { OafService, ServiceDescriptionRecord } from '@geoharvest/shared';
import { OAF_PROTOCOL } from '../../constants.js';
import type { HttpClient } from '../http.js';
import { serviceFields } from './common.js';
import {
  CollectionsSchema,
  findLink,
  getDocument,
  loadLandingPage,
  loadServiceDescription,
  tagNames,
} from './ogcapi.js';

export async function fetchOafService(http: HttpClient, record: ServiceDescriptionRecord): Promise<OafService> {
  const landing = await loadLandingPage(http, record.serviceUrl);
  const desc = await loadServiceDescription(http, landing);
  const dataLink = findLink(landing.links, (rel) => rel === 'data' || rel.endsWith('/data'));
  const collections = dataLink ? (await getDocument(http, dataLink.href, CollectionsSchema)).collections : [];

  return {
    protocol: OAF_PROTOCOL,
    ...serviceFields(record, {
      title: landing.title || desc.info.title,
      abstract: landing.description || desc.info.description,
      keywords: tagNames(desc),
    }),
    featuretypes: collections.map((c) => ({
      name: c.id,
      title: c.title,
      abstract: c.description,
      datasetMetadataId: record.datasetMetadataId,
    })),
  };
}
