export { CatalogueClient, type CatalogueClientOptions } from './lib/csw/client.js';
export { filterServiceRecords } from './lib/csw/filter.js';
export { FetchPool, type FetchPoolOptions, type Outcome } from './lib/pool.js';
export { RetryPolicy, type RetryConfig } from './lib/retry.js';
export { HttpClient, type FetchLike, type FetchResponse } from './lib/http.js';
export { ServiceResolver, type ServiceResolverOptions } from './lib/protocols/resolver.js';
export { dedupeServices, partitionResults, summarizeResults } from './lib/aggregate/results.js';
export { groupByDataset } from './lib/aggregate/datasets.js';
export { flattenService, flattenServices } from './lib/aggregate/flatten.js';
export { loadSortRules, parseSortRules, sortLayers } from './lib/aggregate/sort-rules.js';
export { renderOutput, localTimestamp } from './lib/output/format.js';
export { writeOutput, S3ObjectStore, type ObjectStore } from './lib/output/sink.js';
export { Harvester, assertModeSupported, type HarvestRequest, type HarvestResult } from './harvest.js';
export { loadSettings, type Settings } from './config/settings.js';
export { createLogger } from './logger.js';
export * from './errors.js';
export * from './constants.js';
