import type {
  DatasetGroup,
  DatasetMetadataRecord,
  DistributiveOmit,
  Service,
} from '@geoharvest/shared';
import { ATOM_PROTOCOL } from '../../constants.js';
import { UnsupportedModeError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import { sortByTitle } from '../csw/filter.js';
import type { FetchPool } from '../pool.js';

export type DatasetLookup = (metadataId: string) => Promise<DatasetMetadataRecord | undefined>;

function withoutDatasetId(service: Service): DistributiveOmit<Service, 'datasetMetadataId'> {
  const { datasetMetadataId: _dropped, ...rest } = service;
  return rest;
}

/** Distinct non-empty dataset ids in first-seen order. */
export function datasetIds(services: readonly Service[]): string[] {
  return [...new Set(services.map((s) => s.datasetMetadataId).filter(Boolean))];
}

export function assertDatasetCapable(services: readonly Service[]): void {
  const atom = services.find((s) => s.protocol === ATOM_PROTOCOL);
  if (atom) throw new UnsupportedModeError('datasets', atom.protocol);
}

/**
 * Groups services under the dataset metadata record they operate on.
 * Datasets whose record cannot be found are left out.
 */
export async function groupByDataset(
  services: readonly Service[],
  lookup: DatasetLookup,
  pool: FetchPool,
  logger?: Logger,
): Promise<DatasetGroup[]> {
  assertDatasetCapable(services);
  const ids = datasetIds(services);
  const records = await pool.map(ids, (id) => lookup(id), () => undefined);

  const groups: DatasetGroup[] = [];
  records.forEach((record, i) => {
    if (record === undefined) {
      logger?.warn({ msg: 'dataset left out, metadata record unavailable', metadataId: ids[i] });
      return;
    }
    groups.push({
      ...record,
      services: services.filter((s) => s.datasetMetadataId === ids[i]).map(withoutDatasetId),
    });
  });
  return sortByTitle(groups);
}
