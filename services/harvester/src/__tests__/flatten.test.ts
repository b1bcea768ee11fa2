import { describe, it, expect } from 'vitest';
import { UnsupportedModeError } from '../errors.js';
import { flattenService, flattenServices } from '../lib/aggregate/flatten.js';
import { atomService, wcsService, wfsService, wmsService, wmtsService } from './helpers/services.js';

describe('flattenServices', () => {
  it('adds service columns and the WMS image formats to each layer', () => {
    const [row] = flattenService(wmsService('topo', ['roads']));
    expect(row).toEqual({
      name: 'roads',
      title: 'roads',
      abstract: '',
      datasetMetadataId: '',
      styles: [],
      crs: 'EPSG:28992',
      minscale: '',
      maxscale: '',
      imgformats: 'image/png',
      serviceUrl: 'https://service.example.org/topo',
      serviceTitle: 'topo service',
      serviceAbstract: 'About topo',
      serviceProtocol: 'OGC:WMS',
      serviceMetadataId: 'svc-topo',
    });
  });

  it('emits one row per layer, feature type and coverage in service order', () => {
    const rows = flattenServices([
      wfsService('bld', ['building', 'unit']),
      wcsService('dtm', ['dtm_05m']),
      wmtsService('base', ['base', 'grey']),
    ]);
    expect(rows.map((r) => `${r.serviceProtocol}/${r.name}`)).toEqual([
      'OGC:WFS/building',
      'OGC:WFS/unit',
      'OGC:WCS/dtm_05m',
      'OGC:WMTS/base',
      'OGC:WMTS/grey',
    ]);
  });

  it('rejects Atom services', () => {
    expect(() => flattenServices([wmsService('a', ['x']), atomService('feed')])).toThrow(
      'flat output for INSPIRE Atom services has not been implemented',
    );
    expect(() => flattenService(atomService('feed'))).toThrow(UnsupportedModeError);
  });
});
