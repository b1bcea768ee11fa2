import type {
  CatalogueListRecord,
  DatasetMetadataRecord,
  ServiceDescriptionRecord,
} from '@geoharvest/shared';
import { CatalogueError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { datasetIdFromOperatesOn, toCapabilitiesUrl } from '../url.js';
import { attr, children, isNode, parseXml, pick, pickAll, rootElement, textAt, textOf } from '../xml.js';

const ONLINE_RESOURCE =
  'distributionInfo/MD_Distribution/transferOptions/MD_DigitalTransferOptions/onLine/CI_OnlineResource';

export interface SearchPage {
  matched: number;
  returned: number;
  nextRecord: number;
  /** Record elements of the requested kind, in response order. */
  records: unknown[];
}

function toInt(value: string): number {
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? 0 : n;
}

function exceptionText(report: unknown): string {
  const texts = pickAll(report, 'Exception/ExceptionText').map(textOf).filter(Boolean);
  return texts.join('; ') || 'exception report without text';
}

/** Reads a GetRecords response; `element` is `MD_Metadata` or `SummaryRecord`. */
export function parseSearchResults(xml: string, element: string, url: string): SearchPage {
  const root = rootElement(parseXml(xml));
  if (root.name === 'ExceptionReport') throw new CatalogueError(exceptionText(root.node), url);
  if (root.name !== 'GetRecordsResponse') {
    throw new CatalogueError(`unexpected response element ${root.name || '(none)'}`, url);
  }
  const results = pick(root.node, 'SearchResults');
  if (!isNode(results)) throw new CatalogueError('response without SearchResults', url);
  return {
    matched: toInt(attr(results, 'numberOfRecordsMatched')),
    returned: toInt(attr(results, 'numberOfRecordsReturned')),
    nextRecord: toInt(attr(results, 'nextRecord')),
    records: children(results, element),
  };
}

/** First `MD_Metadata` of a GetRecordById response, if the catalogue returned one. */
export function parseRecordById(xml: string, url: string): unknown {
  const root = rootElement(parseXml(xml));
  if (root.name === 'ExceptionReport') throw new CatalogueError(exceptionText(root.node), url);
  return children(root.node, 'MD_Metadata')[0];
}

function keywordsOf(identification: unknown, metadataId: string, logger?: Logger) {
  const keywords: Record<string, string[]> = {};
  const add = (ns: string, term: string) => {
    (keywords[ns] ??= []).push(term);
  };
  for (const kw of pickAll(identification, 'descriptiveKeywords/MD_Keywords/keyword')) {
    const free = pick(kw, 'CharacterString');
    if (free !== undefined) {
      add('', textOf(free));
      continue;
    }
    const anchor = pick(kw, 'Anchor');
    if (anchor !== undefined) {
      add(attr(anchor, 'href'), textOf(anchor));
      continue;
    }
    logger?.error({ msg: 'keyword without text', metadataId });
  }
  return keywords;
}

export function parseServiceRecord(md: unknown, logger?: Logger): ServiceDescriptionRecord {
  const metadataId = textAt(md, 'fileIdentifier/CharacterString');
  const sv = pickAll(md, 'identificationInfo/SV_ServiceIdentification')[0];
  const resource = pickAll(md, ONLINE_RESOURCE)[0];
  const operatesOnRef = attr(pick(sv, 'operatesOn'), 'href');
  const serviceProtocol =
    textAt(resource, 'protocol/Anchor') || textAt(resource, 'protocol/CharacterString');

  return {
    metadataId,
    title: textAt(sv, 'citation/CI_Citation/title/CharacterString'),
    abstract: textAt(sv, 'abstract/CharacterString'),
    useLimitation: textAt(sv, 'resourceConstraints/MD_Constraints/useLimitation/CharacterString'),
    keywords: keywordsOf(sv, metadataId, logger),
    operatesOnRef,
    datasetMetadataId: datasetIdFromOperatesOn(operatesOnRef),
    serviceUrl: toCapabilitiesUrl(textAt(resource, 'linkage/URL'), serviceProtocol),
    serviceProtocol,
    serviceDescription: textAt(resource, 'description/Anchor'),
  };
}

export function parseDatasetRecord(md: unknown, requestedId: string): DatasetMetadataRecord {
  const ident = pickAll(md, 'identificationInfo/MD_DataIdentification')[0];
  return {
    title: textAt(ident, 'citation/CI_Citation/title/CharacterString'),
    abstract: textAt(ident, 'abstract/CharacterString'),
    metadataId: textAt(md, 'fileIdentifier/CharacterString') || requestedId,
  };
}

// Dublin Core summary record (prefixes dc:/dct: removed by the parser)
export function parseSummaryRecord(record: unknown): CatalogueListRecord {
  return {
    title: textAt(record, 'title'),
    abstract: textAt(record, 'abstract'),
    recordType: textAt(record, 'type'),
    identifier: textAt(record, 'identifier'),
    keywords: children(record, 'subject').map(textOf).filter(Boolean),
    modifiedDate: textAt(record, 'modified'),
  };
}
