import { CSW_RECORD_SCHEMA, ISO_GMD_SCHEMA, OAT_PROTOCOL } from '../../constants.js';
import { withQueryParams } from '../url.js';

export function cqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function protocolQuery(protocol: string, owner: string): string {
  // The catalogue does not index OGC API tiles as a protocol value.
  const key = protocol === OAT_PROTOCOL ? 'anyText' : 'protocol';
  return `type='service' AND organisationName=${cqlLiteral(owner)} AND ${key}=${cqlLiteral(protocol)}`;
}

export function identifierQuery(id: string): string {
  return `identifier=${cqlLiteral(id)}`;
}

export type ElementSet = 'full' | 'summary';

export interface GetRecordsParams {
  cql: string;
  startPosition: number;
  maxRecords: number;
  elementSet?: ElementSet;
}

export function getRecordsUrl(base: string, p: GetRecordsParams): string {
  const full = (p.elementSet ?? 'full') === 'full';
  return withQueryParams(base, {
    service: 'CSW',
    version: '2.0.2',
    request: 'GetRecords',
    resultType: 'results',
    typeNames: full ? 'gmd:MD_Metadata' : 'csw:Record',
    elementSetName: full ? 'full' : 'summary',
    outputSchema: full ? ISO_GMD_SCHEMA : CSW_RECORD_SCHEMA,
    constraintLanguage: 'CQL_TEXT',
    constraint_language_version: '1.1.0',
    constraint: p.cql,
    startPosition: String(p.startPosition),
    maxRecords: String(p.maxRecords),
  });
}

export function getRecordByIdUrl(base: string, id: string): string {
  return withQueryParams(base, {
    service: 'CSW',
    version: '2.0.2',
    request: 'GetRecordById',
    id,
    elementSetName: 'full',
    outputSchema: ISO_GMD_SCHEMA,
  });
}
