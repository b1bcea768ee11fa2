import type { Layer, LayerRow, OatLayer, Service, WmtsLayer } from '@geoharvest/shared';
import {
  ATOM_PROTOCOL,
  OAF_PROTOCOL,
  OAT_PROTOCOL,
  WCS_PROTOCOL,
  WFS_PROTOCOL,
  WMS_PROTOCOL,
  WMTS_PROTOCOL,
} from '../../constants.js';
import { UnsupportedModeError } from '../../errors.js';

function serviceColumns(service: Service) {
  return {
    serviceUrl: service.url,
    serviceTitle: service.title,
    serviceAbstract: service.abstract,
    serviceProtocol: service.protocol,
    serviceMetadataId: service.metadataId,
  };
}

const rows = <L extends Layer>(entities: readonly L[], service: Service): LayerRow[] =>
  entities.map((e) => ({ ...e, ...serviceColumns(service) }));

/** One row per layer, feature type or coverage, carrying its service's columns. */
export function flattenService(service: Service): LayerRow[] {
  switch (service.protocol) {
    case WMS_PROTOCOL:
      return service.layers.map((l) => ({ ...l, imgformats: service.imgformats, ...serviceColumns(service) }));
    case WFS_PROTOCOL:
    case OAF_PROTOCOL:
      return rows(service.featuretypes, service);
    case WCS_PROTOCOL:
      return rows(service.coverages, service);
    case WMTS_PROTOCOL:
    case OAT_PROTOCOL:
      return rows<WmtsLayer | OatLayer>(service.layers, service);
    case ATOM_PROTOCOL:
      throw new UnsupportedModeError('flat', service.protocol);
  }
}

export function flattenServices(services: readonly Service[]): LayerRow[] {
  const atom = services.find((s) => s.protocol === ATOM_PROTOCOL);
  if (atom) throw new UnsupportedModeError('flat', atom.protocol);
  return services.flatMap(flattenService);
}
