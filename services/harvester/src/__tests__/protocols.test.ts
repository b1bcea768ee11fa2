import { describe, it, expect } from 'vitest';
import { parseWcsCapabilities } from '../lib/protocols/wcs.js';
import { parseWfsCapabilities } from '../lib/protocols/wfs.js';
import { parseWmsCapabilities } from '../lib/protocols/wms.js';
import { parseWmtsCapabilities } from '../lib/protocols/wmts.js';
import { XmlParseError } from '../errors.js';
import { serviceRecord } from './helpers/csw.js';
import { fixture } from './helpers/fetch.js';

describe('WMS capabilities', () => {
  const record = serviceRecord({ metadataId: 'svc-wms', datasetMetadataId: 'ds-topo' });
  const service = parseWmsCapabilities(fixture('wms-capabilities.xml'), record);

  it('reads service fields from the document and the record', () => {
    expect(service).toMatchObject({
      protocol: 'OGC:WMS',
      title: 'Example topography WMS',
      abstract: 'Topographic layers for testing',
      keywords: ['topography', 'infrastructure'],
      metadataId: 'svc-wms',
      datasetMetadataId: 'ds-topo',
      url: record.serviceUrl,
      imgformats: 'image/png,image/jpeg',
    });
  });

  it('emits named layers only, depth first', () => {
    expect(service.layers.map((l) => l.name)).toEqual(['roads', 'transport', 'rail']);
  });

  it('inherits CRS, styles and scale denominators from parent layers', () => {
    const [roads, transport, rail] = service.layers;
    expect(roads.crs).toBe('EPSG:28992,EPSG:3857,EPSG:4326');
    expect(roads.styles).toEqual([
      { title: 'Default style', name: 'default', legendUrl: 'https://service.example.org/legend/default.png' },
    ]);
    expect(roads.minscale).toBe('');
    expect(roads.maxscale).toBe('50000');

    expect(transport.crs).toBe('EPSG:28992,EPSG:3857');
    expect(transport.styles.map((s) => s.name)).toEqual(['default', 'dark']);
    expect(transport.minscale).toBe('1000');

    expect(rail.styles.map((s) => s.name)).toEqual(['default', 'dark']);
    expect(rail.minscale).toBe('1000');
    expect(rail.maxscale).toBe('25000');
  });

  it('reads layer dataset ids from ISO metadata URLs', () => {
    expect(service.layers.map((l) => l.datasetMetadataId)).toEqual(['ds-roads', '', 'ds-rail-uuid']);
  });

  it('rejects a document with another root element', () => {
    expect(() => parseWmsCapabilities('<ServiceExceptionReport/>', record)).toThrow(XmlParseError);
  });
});

describe('WFS capabilities', () => {
  const record = serviceRecord({
    serviceProtocol: 'OGC:WFS',
    serviceUrl: 'https://service.example.org/wfs?request=GetCapabilities&service=WFS',
    datasetMetadataId: 'ds-fallback',
  });

  it('reads feature types and GetFeature output formats', () => {
    const service = parseWfsCapabilities(fixture('wfs-capabilities.xml'), record);
    expect(service.title).toBe('Example buildings WFS');
    expect(service.keywords).toEqual(['buildings']);
    expect(service.outputFormats).toBe('application/gml+xml; version=3.2,application/json');
    expect(service.featuretypes).toEqual([
      { name: 'bld:building', title: 'Buildings', abstract: 'Footprints', datasetMetadataId: 'ds-buildings' },
      { name: 'bld:unit', title: 'Units', abstract: '', datasetMetadataId: 'ds-fallback' },
    ]);
  });

  it('falls back to the service-wide outputFormat parameter', () => {
    const xml = `<WFS_Capabilities version="1.1.0">
      <OperationsMetadata>
        <Operation name="GetFeature"/>
        <Parameter name="outputFormat"><Value>text/xml; subtype=gml/3.1.1</Value></Parameter>
      </OperationsMetadata>
      <FeatureTypeList><FeatureType><Name>one</Name><Title>One</Title></FeatureType></FeatureTypeList>
    </WFS_Capabilities>`;
    const service = parseWfsCapabilities(xml, record);
    expect(service.outputFormats).toBe('text/xml; subtype=gml/3.1.1');
    expect(service.featuretypes).toHaveLength(1);
  });
});

describe('WCS capabilities', () => {
  it('reads coverage summaries', () => {
    const record = serviceRecord({ serviceProtocol: 'OGC:WCS', datasetMetadataId: 'ds-elevation' });
    const service = parseWcsCapabilities(fixture('wcs-capabilities.xml'), record);
    expect(service.title).toBe('Example elevation WCS');
    expect(service.coverages).toEqual([
      { name: 'dtm_05m', title: 'DTM 0.5m', abstract: 'Terrain model', datasetMetadataId: 'ds-elevation' },
      { name: 'dsm_05m', title: 'DSM 0.5m', abstract: '', datasetMetadataId: 'ds-elevation' },
    ]);
  });
});

describe('WMTS capabilities', () => {
  it('reads layers with their tile matrix sets and formats', () => {
    const record = serviceRecord({ serviceProtocol: 'OGC:WMTS' });
    const service = parseWmtsCapabilities(fixture('wmts-capabilities.xml'), record);
    expect(service.keywords).toEqual(['basemap']);
    expect(service.layers).toHaveLength(2);
    expect(service.layers[0]).toEqual({
      name: 'base',
      title: 'Base map',
      abstract: 'Standard base map',
      datasetMetadataId: 'ds-1',
      styles: [{ title: 'Default', name: 'default', legendUrl: 'https://service.example.org/legend/base.png' }],
      tilematrixsets: 'EPSG:28992,EPSG:3857',
      imgformats: 'image/png,image/jpeg',
    });
    expect(service.layers[1].tilematrixsets).toBe('EPSG:28992');
  });
});
