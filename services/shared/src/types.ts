export type Protocol =
  | 'OGC:WMS'
  | 'OGC:WFS'
  | 'OGC:WCS'
  | 'OGC:WMTS'
  | 'INSPIRE Atom'
  | 'OGC:API tiles'
  | 'OGC:API features';

export type LayersMode = 'services' | 'datasets' | 'flat';
export type FilterMode = 'filtered' | 'raw';

// Summary search result (Dublin Core); identifier joins to the full record.
export type CatalogueListRecord = {
  title: string;
  abstract: string;
  recordType: string;
  identifier: string;
  keywords: string[];
  modifiedDate: string;
};

export type ServiceDescriptionRecord = {
  metadataId: string;
  title: string;
  abstract: string;
  useLimitation: string;
  /** Terms keyed by thesaurus namespace; free keywords live under "". */
  keywords: Record<string, string[]>;
  operatesOnRef: string;
  datasetMetadataId: string;
  serviceUrl: string;
  serviceProtocol: string;
  serviceDescription: string;
};

export type DatasetMetadataRecord = { title: string; abstract: string; metadataId: string };

export type Style = { title: string; name: string; legendUrl: string };
export type VectorTileStyle = { id: string; name: string; url: string };

export type Layer = {
  name: string;
  title: string;
  abstract: string;
  datasetMetadataId: string;
};
export type Featuretype = Layer;
export type Coverage = Layer;

export type WmsLayer = Layer & {
  styles: Style[];
  crs: string;
  minscale: string;
  maxscale: string;
};

export type WmtsLayer = Layer & {
  styles: Style[];
  tilematrixsets: string;
  imgformats: string;
};

export type OatTileSet = { tilesetId: string; tilesetCrs: string; tilesetMaxZoomlevel: string };
export type OatTiles = { title: string; abstract: string; tilesets: OatTileSet[] };
export type OatLayer = Layer & { styles: VectorTileStyle[]; tiles: OatTiles[] };

export type AtomLink = { href: string; rel: string; type: string; title: string; length: string };
export type AtomDownload = {
  id: string;
  title: string;
  updated: string;
  crs: string;
  links: AtomLink[];
};
export type AtomDataset = {
  title: string;
  abstract: string;
  spatialDatasetIdentifierCode: string;
  spatialDatasetIdentifierNamespace: string;
  datasetMetadataId: string;
  url: string;
  downloads: AtomDownload[];
};

type ServiceBase = {
  title: string;
  abstract: string;
  metadataId: string;
  datasetMetadataId: string;
  url: string;
  keywords: string[];
};

export type WmsService = ServiceBase & { protocol: 'OGC:WMS'; imgformats: string; layers: WmsLayer[] };
export type WfsService = ServiceBase & {
  protocol: 'OGC:WFS';
  outputFormats: string;
  featuretypes: Featuretype[];
};
export type WcsService = ServiceBase & { protocol: 'OGC:WCS'; coverages: Coverage[] };
export type WmtsService = ServiceBase & { protocol: 'OGC:WMTS'; layers: WmtsLayer[] };
export type AtomService = ServiceBase & { protocol: 'INSPIRE Atom'; datasets: AtomDataset[] };
export type OatService = ServiceBase & { protocol: 'OGC:API tiles'; layers: OatLayer[] };
export type OafService = ServiceBase & { protocol: 'OGC:API features'; featuretypes: Featuretype[] };

export type Service =
  | WmsService
  | WfsService
  | WcsService
  | WmtsService
  | AtomService
  | OatService
  | OafService;

export type ServiceError = { failed: true; url: string; metadataId: string; protocol: string };
export type ServiceResult = Service | ServiceError;

export type DatasetGroup = DatasetMetadataRecord & {
  services: DistributiveOmit<Service, 'datasetMetadataId'>[];
};

export type LayerRow = Record<string, unknown> & {
  name: string;
  serviceUrl: string;
  serviceTitle: string;
  serviceAbstract: string;
  serviceProtocol: Protocol;
  serviceMetadataId: string;
};

export type SortRule = { index: number; types: string[]; names: string[] };

export type ProtocolSummary = { records: number; resolved: number; failed: number };
export type HarvestSummary = {
  total: { records: number; resolved: number; failed: number };
  byProtocol: Record<string, ProtocolSummary>;
  failedUrls: string[];
};

export type HarvestOutput =
  | { services: Service[]; updated?: string }
  | { datasets: DatasetGroup[]; updated?: string }
  | { layers: LayerRow[]; updated?: string };

export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
