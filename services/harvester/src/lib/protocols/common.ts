import type { ServiceDescriptionRecord, Style } from '@geoharvest/shared';
import { XmlParseError } from '../../errors.js';
import { attr, parseXml, pick, pickAll, rootElement, textAt, textOf } from '../xml.js';

/** Parses a capabilities document and checks its root element. */
export function capabilitiesRoot(xml: string, accepted: readonly string[]): unknown {
  const root = rootElement(parseXml(xml));
  if (!accepted.includes(root.name)) {
    throw new XmlParseError(`expected ${accepted.join(' or ')}, got ${root.name || 'no root element'}`);
  }
  return root.node;
}

export interface Identification {
  title: string;
  abstract: string;
  keywords: string[];
}

// OWS 1.1 ServiceIdentification block shared by WFS 2.0, WCS 1.1 and WMTS 1.0
export function owsIdentification(root: unknown): Identification {
  const ident = pick(root, 'ServiceIdentification');
  return {
    title: textAt(ident, 'Title'),
    abstract: textAt(ident, 'Abstract'),
    keywords: pickAll(ident, 'Keywords/Keyword').map(textOf).filter(Boolean),
  };
}

export function serviceFields(record: ServiceDescriptionRecord, ident: Identification) {
  return {
    title: ident.title,
    abstract: ident.abstract,
    metadataId: record.metadataId,
    datasetMetadataId: record.datasetMetadataId,
    url: record.serviceUrl,
    keywords: ident.keywords,
  };
}

/** WMS and WMTS style elements; WMTS identifies styles by `Identifier`. */
export function parseStyle(style: unknown): Style {
  return {
    title: textAt(style, 'Title'),
    name: textAt(style, 'Name') || textAt(style, 'Identifier'),
    legendUrl: attr(pick(style, 'LegendURL/OnlineResource'), 'href') || attr(pick(style, 'LegendURL'), 'href'),
  };
}
