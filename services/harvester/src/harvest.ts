import type {
  FilterMode,
  HarvestOutput,
  HarvestSummary,
  LayersMode,
  Protocol,
  Service,
  ServiceDescriptionRecord,
  SortRule,
} from '@geoharvest/shared';
import { ATOM_PROTOCOL } from './constants.js';
import { UnsupportedModeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { groupByDataset } from './lib/aggregate/datasets.js';
import { flattenServices } from './lib/aggregate/flatten.js';
import { dedupeServices, partitionResults, summarizeResults } from './lib/aggregate/results.js';
import { sortLayers } from './lib/aggregate/sort-rules.js';
import type { CatalogueClient } from './lib/csw/client.js';
import type { FetchPool } from './lib/pool.js';
import { serviceError, type ServiceResolver } from './lib/protocols/resolver.js';

export interface HarvestRequest {
  mode: LayersMode;
  protocols: readonly Protocol[];
  owner: string;
  /** Records per protocol, 0 for all */
  maxResults?: number;
  filterMode?: FilterMode;
  /** Harvest one service record instead of querying by protocol */
  id?: string;
  sortRules?: readonly SortRule[];
}

export interface HarvestResult {
  output: HarvestOutput;
  summary: HarvestSummary;
}

export interface HarvesterDeps {
  catalogue: CatalogueClient;
  resolver: ServiceResolver;
  pool: FetchPool;
  logger?: Logger;
}

/** Rejects output modes a requested protocol cannot be shaped into. */
export function assertModeSupported(mode: LayersMode, protocols: readonly string[]): void {
  if (mode !== 'services' && protocols.includes(ATOM_PROTOCOL)) {
    throw new UnsupportedModeError(mode, ATOM_PROTOCOL);
  }
}

/**
 * Catalogue query, service resolution and dataset resolution run one after
 * the other; each network batch goes through the pool.
 */
export class Harvester {
  private readonly catalogue: CatalogueClient;
  private readonly resolver: ServiceResolver;
  private readonly pool: FetchPool;
  private readonly logger: Logger;

  constructor(deps: HarvesterDeps) {
    this.catalogue = deps.catalogue;
    this.resolver = deps.resolver;
    this.pool = deps.pool;
    this.logger = deps.logger ?? silentLogger();
  }

  async harvest(req: HarvestRequest): Promise<HarvestResult> {
    if (!req.id) assertModeSupported(req.mode, req.protocols);

    const records = await this.collectRecords(req);
    assertModeSupported(req.mode, records.map((r) => r.serviceProtocol));
    const results = await this.pool.map(
      records,
      (record) => this.resolver.resolve(record),
      (_error, record) => serviceError(record),
    );
    const summary = summarizeResults(records, results, this.logger);
    const { services: resolved } = partitionResults(results);
    const services = (req.filterMode ?? 'filtered') === 'filtered' ? dedupeServices(resolved) : resolved;

    return { output: await this.shape(req, services), summary };
  }

  private collectRecords(req: HarvestRequest): Promise<ServiceDescriptionRecord[]> {
    const filterMode = req.filterMode ?? 'filtered';
    if (req.id) return this.catalogue.queryById(req.id, filterMode);
    return this.catalogue.queryByProtocols(req.protocols, req.owner, req.maxResults ?? 0, filterMode);
  }

  private async shape(req: HarvestRequest, services: Service[]): Promise<HarvestOutput> {
    switch (req.mode) {
      case 'services':
        return { services };
      case 'datasets':
        return {
          datasets: await groupByDataset(
            services,
            (id) => this.catalogue.fetchDatasetMetadata(id),
            this.pool,
            this.logger,
          ),
        };
      case 'flat': {
        const rows = flattenServices(services);
        return { layers: req.sortRules ? sortLayers(rows, req.sortRules, this.logger) : rows };
      }
    }
  }
}
