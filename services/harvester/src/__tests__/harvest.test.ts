import { describe, it, expect, vi } from 'vitest';
import { UnsupportedModeError } from '../errors.js';
import { Harvester } from '../harvest.js';
import { CatalogueClient } from '../lib/csw/client.js';
import { HttpClient } from '../lib/http.js';
import { FetchPool } from '../lib/pool.js';
import { ServiceResolver } from '../lib/protocols/resolver.js';
import { RetryPolicy } from '../lib/retry.js';
import { CSW_URL, catalogue, datasetMd, serviceMd } from './helpers/csw.js';
import { fakeFetch, fixture, type Route } from './helpers/fetch.js';

const wmsMd = serviceMd({
  id: 'svc-wms',
  title: 'Topography WMS',
  url: 'https://service.example.org/wms',
  protocol: 'OGC:WMS',
  operatesOn: 'https://catalogue.example.org/csw?request=GetRecordById&id=DS-TOPO',
});
const secureMd = serviceMd({
  id: 'svc-secure',
  title: 'Restricted WMS',
  url: 'https://secure.example.org/wms',
  protocol: 'OGC:WMS',
});
const wcsMd = serviceMd({
  id: 'svc-wcs',
  title: 'Elevation WCS',
  url: 'https://service.example.org/wcs',
  protocol: 'OGC:WCS',
  operatesOn: 'https://catalogue.example.org/csw?request=GetRecordById&id=ds-elevation',
});
const atomMd = serviceMd({
  id: 'svc-atom',
  title: 'Downloads',
  url: 'https://service.example.org/atom/index.xml',
  protocol: 'INSPIRE Atom',
});

const byProtocol: Record<string, string[]> = {
  'OGC:WMS': [wmsMd, secureMd],
  'OGC:WCS': [wcsMd],
  'INSPIRE Atom': [atomMd],
};

const route: Route = (url) => {
  if (url.hostname === 'service.example.org') {
    return url.searchParams.get('service') === 'WMS' ? fixture('wms-capabilities.xml') : fixture('wcs-capabilities.xml');
  }
  const constraint = url.searchParams.get('constraint') ?? '';
  const protocol = Object.keys(byProtocol).find((p) => constraint.includes(`'${p}'`));
  const records = protocol ? byProtocol[protocol] : constraint === "identifier='svc-atom'" ? [atomMd] : [];
  return catalogue(records, { 'ds-topo': datasetMd('ds-topo', 'Topography') })(url);
};

function harvester() {
  const { fetch, calls } = fakeFetch(route);
  const http = new HttpClient({ fetch });
  const retry = new RetryPolicy({ sleep: vi.fn(async () => undefined) });
  const h = new Harvester({
    catalogue: new CatalogueClient({ url: CSW_URL, http, retry }),
    resolver: new ServiceResolver({ http, retry }),
    pool: new FetchPool({ concurrency: 2 }),
  });
  return { harvester: h, calls };
}

const OWNER = 'Example Org';

describe('Harvester', () => {
  it('resolves services per protocol and reports failures in the summary', async () => {
    const { harvester: h } = harvester();
    const { output, summary } = await h.harvest({ mode: 'services', protocols: ['OGC:WMS', 'OGC:WCS'], owner: OWNER });

    expect('services' in output && output.services.map((s) => s.title)).toEqual([
      'Example elevation WCS',
      'Example topography WMS',
    ]);
    expect(summary).toEqual({
      total: { records: 3, resolved: 2, failed: 1 },
      byProtocol: {
        'OGC:WMS': { records: 2, resolved: 1, failed: 1 },
        'OGC:WCS': { records: 1, resolved: 1, failed: 0 },
      },
      failedUrls: ['https://secure.example.org/wms?request=GetCapabilities&service=WMS'],
    });
  });

  it('groups services by dataset, leaving out datasets the catalogue lacks', async () => {
    const { harvester: h } = harvester();
    const { output } = await h.harvest({ mode: 'datasets', protocols: ['OGC:WMS', 'OGC:WCS'], owner: OWNER });

    if (!('datasets' in output)) throw new Error('expected datasets output');
    expect(output.datasets).toHaveLength(1);
    expect(output.datasets[0]).toMatchObject({ title: 'Topography', abstract: 'About Topography', metadataId: 'ds-topo' });
    expect(output.datasets[0].services.map((s) => s.metadataId)).toEqual(['svc-wms']);
  });

  it('flattens layers and applies sort rules', async () => {
    const { harvester: h } = harvester();
    const { output } = await h.harvest({
      mode: 'flat',
      protocols: ['OGC:WMS', 'OGC:WCS'],
      owner: OWNER,
      sortRules: [{ index: 0, types: ['wcs'], names: ['^dsm'] }],
    });

    if (!('layers' in output)) throw new Error('expected layers output');
    expect(output.layers.map((r) => r.name)).toEqual(['dsm_05m', 'dtm_05m', 'roads', 'transport', 'rail']);
  });

  it('rejects datasets mode with Atom before any request', async () => {
    const { harvester: h, calls } = harvester();
    await expect(
      h.harvest({ mode: 'datasets', protocols: ['OGC:WMS', 'INSPIRE Atom'], owner: OWNER }),
    ).rejects.toThrow(UnsupportedModeError);
    expect(calls).toHaveLength(0);
  });

  it('rejects an Atom record fetched by id before resolving it', async () => {
    const { harvester: h, calls } = harvester();
    await expect(h.harvest({ mode: 'flat', protocols: [], owner: OWNER, id: 'svc-atom' })).rejects.toThrow(
      'flat output for INSPIRE Atom services has not been implemented',
    );
    expect(calls).toHaveLength(1);
  });
});
