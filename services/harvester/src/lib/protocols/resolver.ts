import type { Service, ServiceDescriptionRecord, ServiceError, ServiceResult } from '@geoharvest/shared';
import {
  ATOM_PROTOCOL,
  OAF_PROTOCOL,
  OAT_PROTOCOL,
  WCS_PROTOCOL,
  WFS_PROTOCOL,
  WMS_PROTOCOL,
  WMTS_PROTOCOL,
} from '../../constants.js';
import { errorMessage } from '../../errors.js';
import { silentLogger, type Logger } from '../../logger.js';
import type { HttpClient } from '../http.js';
import { RetryPolicy } from '../retry.js';
import { isSecureUrl } from '../url.js';
import { fetchAtomService } from './atom.js';
import { fetchOafService } from './ogcapi-features.js';
import { fetchOatService } from './ogcapi-tiles.js';
import { fetchWcsService } from './wcs.js';
import { fetchWfsService } from './wfs.js';
import { fetchWmsService } from './wms.js';
import { fetchWmtsService } from './wmts.js';

export interface ServiceResolverOptions {
  http: HttpClient;
  retry?: RetryPolicy;
  logger?: Logger;
}

export function serviceError(record: ServiceDescriptionRecord): ServiceError {
  return {
    failed: true,
    url: record.serviceUrl,
    metadataId: record.metadataId,
    protocol: record.serviceProtocol,
  };
}

/**
 * Turns a catalogue service record into a normalized Service. Never rejects:
 * every failure comes back as a ServiceError value.
 */
export class ServiceResolver {
  private readonly http: HttpClient;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(opts: ServiceResolverOptions) {
    this.http = opts.http;
    this.logger = opts.logger ?? silentLogger();
    this.retry = opts.retry ?? new RetryPolicy({ logger: this.logger });
  }

  async resolve(record: ServiceDescriptionRecord): Promise<ServiceResult> {
    const { serviceUrl: url, metadataId } = record;
    if (isSecureUrl(url)) {
      this.logger.info({ msg: 'skipping access-restricted service', url, metadataId });
      return serviceError(record);
    }
    this.logger.info({ msg: 'resolving service', protocol: record.serviceProtocol, url, metadataId });
    try {
      return await this.dispatch(record);
    } catch (e) {
      this.logger.error({ msg: 'service resolution failed', url, metadataId, error: errorMessage(e) });
      return serviceError(record);
    }
  }

  private dispatch(record: ServiceDescriptionRecord): Promise<Service | ServiceError> {
    const withRetry = (fetchService: () => Promise<Service>) =>
      this.retry.run(fetchService, `${record.serviceProtocol} ${record.serviceUrl}`);

    switch (record.serviceProtocol) {
      case WMS_PROTOCOL:
        return withRetry(() => fetchWmsService(this.http, record));
      case WFS_PROTOCOL:
        return withRetry(() => fetchWfsService(this.http, record));
      case WCS_PROTOCOL:
        return withRetry(() => fetchWcsService(this.http, record));
      case WMTS_PROTOCOL:
        return withRetry(() => fetchWmtsService(this.http, record));
      case OAT_PROTOCOL:
        return withRetry(() => fetchOatService(this.http, record));
      case OAF_PROTOCOL:
        return withRetry(() => fetchOafService(this.http, record));
      case ATOM_PROTOCOL:
        // single attempt
        return fetchAtomService(this.http, record, this.logger);
      default:
        this.logger.warn({ msg: 'unsupported service protocol', protocol: record.serviceProtocol });
        return Promise.resolve(serviceError(record));
    }
  }
}
