import type {
  HarvestSummary,
  ProtocolSummary,
  Service,
  ServiceDescriptionRecord,
  ServiceError,
  ServiceResult,
} from '@geoharvest/shared';
import type { Logger } from '../../logger.js';
import { sortByTitle } from '../csw/filter.js';

export function isServiceError(result: ServiceResult): result is ServiceError {
  return 'failed' in result;
}

export function partitionResults(results: readonly ServiceResult[]): {
  services: Service[];
  failures: ServiceError[];
} {
  const services: Service[] = [];
  const failures: ServiceError[] = [];
  for (const r of results) {
    if (isServiceError(r)) failures.push(r);
    else services.push(r);
  }
  return { services, failures };
}

/** Keeps the last service per capabilities URL, ordered by title. */
export function dedupeServices(services: readonly Service[]): Service[] {
  const byUrl = new Map<string, Service>();
  for (const s of services) byUrl.set(s.url, s);
  return sortByTitle([...byUrl.values()]);
}

export function summarizeResults(
  records: readonly ServiceDescriptionRecord[],
  results: readonly ServiceResult[],
  logger?: Logger,
): HarvestSummary {
  const byProtocol: Record<string, ProtocolSummary> = {};
  const entry = (protocol: string) => (byProtocol[protocol] ??= { records: 0, resolved: 0, failed: 0 });
  for (const r of records) entry(r.serviceProtocol).records++;

  const failedUrls: string[] = [];
  for (const r of results) {
    if (isServiceError(r)) {
      entry(r.protocol).failed++;
      failedUrls.push(r.url);
    } else {
      entry(r.protocol).resolved++;
    }
  }

  const summary: HarvestSummary = {
    total: {
      records: records.length,
      resolved: results.length - failedUrls.length,
      failed: failedUrls.length,
    },
    byProtocol,
    failedUrls,
  };
  logger?.info({ msg: 'harvest summary', ...summary.total, byProtocol });
  if (failedUrls.length > 0) logger?.warn({ msg: 'services not resolved', urls: failedUrls });
  return summary;
}
