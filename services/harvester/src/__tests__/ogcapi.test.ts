import { describe, it, expect } from 'vitest';
import { HttpClient } from '../lib/http.js';
import { fetchOafService } from '../lib/protocols/ogcapi-features.js';
import { fetchOatService, maxZoomLevel, tileRequestUrl } from '../lib/protocols/ogcapi-tiles.js';
import { OpenApiSchema, TileSetSchema } from '../lib/protocols/ogcapi.js';
import { serviceRecord } from './helpers/csw.js';
import { fakeFetch, json, routes } from './helpers/fetch.js';

const TILES = 'https://api.example.org/tiles/v1';
const FEATURES = 'https://api.example.org/features/v1';

const tilesApi = routes({
  [`${TILES}?f=json`]: json({
    title: 'Example vector tiles',
    description: 'Vector tiles for testing',
    links: [
      { rel: 'service-desc', href: `${TILES}/api?f=json`, type: 'application/vnd.oai.openapi+json;version=3.0' },
      { rel: 'http://www.opengis.net/def/rel/ogc/1.0/tilesets-vector', href: `${TILES}/tiles?f=json` },
      { rel: 'http://www.opengis.net/def/rel/ogc/1.0/styles', href: `${TILES}/styles?f=json` },
    ],
  }),
  [`${TILES}/api?f=json`]: json({
    info: { title: 'Tiles API', description: 'OpenAPI description', version: '1.0.0' },
    tags: [{ name: 'Tiles' }, { name: 'Styles' }],
    servers: [{ url: '' }, { url: TILES }],
    paths: {
      '/tiles': {},
      '/tiles/{tileMatrixSetId}/{tileMatrix}/{tileRow}/{tileCol}': {},
    },
  }),
  [`${TILES}/styles?f=json`]: json({
    default: 'Standard',
    styles: [
      { id: 'dark', title: 'Dark', links: [{ rel: 'stylesheet', href: 'https://api.example.org/styles/dark.json' }] },
      { id: 'standard', title: 'Standard', links: [{ rel: 'stylesheet', href: 'https://api.example.org/styles/standard.json' }] },
    ],
  }),
  [`${TILES}/tiles?f=json`]: json({
    title: 'Topography tiles',
    description: 'All topography layers',
    tilesets: [
      {
        tileMatrixSetId: 'NetherlandsRDNewQuad',
        crs: 'http://www.opengis.net/def/crs/EPSG/0/28992',
        links: [{ rel: 'self', href: `${TILES}/tiles/NetherlandsRDNewQuad?f=json` }],
      },
      { tileMatrixSetId: 'WebMercatorQuad', crs: { uri: 'http://www.opengis.net/def/crs/EPSG/0/3857' }, links: [] },
    ],
  }),
  [`${TILES}/tiles/NetherlandsRDNewQuad?f=json`]: json({
    tileMatrixSetLimits: [{ tileMatrix: '0' }, { tileMatrix: '12' }, { tileMatrix: 5 }],
  }),
});

describe('OGC API tiles', () => {
  const record = serviceRecord({ serviceProtocol: 'OGC:API tiles', serviceUrl: TILES, datasetMetadataId: 'ds-topo' });

  it('builds one layer from the tiles document', async () => {
    const { fetch } = fakeFetch(tilesApi);
    const service = await fetchOatService(new HttpClient({ fetch }), record);

    expect(service).toMatchObject({
      protocol: 'OGC:API tiles',
      title: 'Example vector tiles',
      abstract: 'Vector tiles for testing',
      keywords: ['Tiles', 'Styles'],
      url: `${TILES}/tiles/{tileMatrixSetId}/{tileMatrix}/{tileRow}/{tileCol}`,
    });
    expect(service.layers).toHaveLength(1);
    const [layer] = service.layers;
    expect(layer.styles).toEqual([
      { id: 'standard', name: 'Standard', url: 'https://api.example.org/styles/standard.json' },
      { id: 'dark', name: 'Dark', url: 'https://api.example.org/styles/dark.json' },
    ]);
    expect(layer.tiles).toEqual([
      {
        title: 'Topography tiles',
        abstract: 'All topography layers',
        tilesets: [
          {
            tilesetId: 'NetherlandsRDNewQuad',
            tilesetCrs: 'http://www.opengis.net/def/crs/EPSG/0/28992',
            tilesetMaxZoomlevel: '12',
          },
          { tilesetId: 'WebMercatorQuad', tilesetCrs: 'http://www.opengis.net/def/crs/EPSG/0/3857', tilesetMaxZoomlevel: '' },
        ],
      },
    ]);
  });

  it('keeps the record URL when the API publishes no tile path', () => {
    expect(tileRequestUrl(OpenApiSchema.parse({ servers: [{ url: TILES }], paths: { '/tiles': {} } }))).toBe('');
  });

  it('reads numeric and string tile matrix ids', () => {
    expect(maxZoomLevel(TileSetSchema.parse({ tileMatrixSetLimits: [{ tileMatrix: 3 }, { tileMatrix: '14' }] }))).toBe('14');
    expect(maxZoomLevel(TileSetSchema.parse({}))).toBe('');
  });
});

describe('OGC API features', () => {
  it('lists collections as feature types', async () => {
    const { fetch, calls } = fakeFetch(
      routes({
        [`${FEATURES}?f=json`]: json({
          title: 'Example features',
          description: 'Feature collections for testing',
          links: [{ rel: 'data', href: `${FEATURES}/collections?f=json` }],
        }),
        [`${FEATURES}/collections?f=json`]: json({
          collections: [
            { id: 'buildings', title: 'Buildings', description: 'Footprints' },
            { id: 'roads', title: 'Roads' },
          ],
        }),
      }),
    );
    const record = serviceRecord({ serviceProtocol: 'OGC:API features', serviceUrl: FEATURES, datasetMetadataId: 'ds-bag' });
    const service = await fetchOafService(new HttpClient({ fetch }), record);

    expect(calls).toEqual([`${FEATURES}?f=json`, `${FEATURES}/collections?f=json`]);
    expect(service.title).toBe('Example features');
    expect(service.keywords).toEqual([]);
    expect(service.url).toBe(FEATURES);
    expect(service.featuretypes).toEqual([
      { name: 'buildings', title: 'Buildings', abstract: 'Footprints', datasetMetadataId: 'ds-bag' },
      { name: 'roads', title: 'Roads', abstract: '', datasetMetadataId: 'ds-bag' },
    ]);
  });
});
