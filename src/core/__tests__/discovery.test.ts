/**
 * Unit tests for service discovery and health probes.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  checkServiceHealth,
  checkServicesHealth,
  findLayerByName,
  getLayerSchema,
  listDirectoryServices,
  listServiceLayers,
  resolveWkid,
  type ServiceLayer,
} from '../discovery.js';
import { DownloadCancelledError, TransportError } from '../errors.js';
import { MemoryHealthCache, type HealthCache } from '../health-cache.js';
import type { FetchFn } from '../transport.js';
import { jsonResponse, routedFetch, textResponse } from '../../test-utils/fetch-mocks.js';

afterEach(() => {
  vi.useRealTimers();
});

const ROOT = 'https://gis.example.test/arcgis/rest/services';
const SERVICE = `${ROOT}/Planning/Parcels/MapServer`;

const SERVICE_BODY = {
  layers: [
    { id: 0, name: 'Property', type: 'Group Layer', subLayerIds: [1, 2] },
    {
      id: 1,
      name: 'Tax Parcels',
      type: 'Feature Layer',
      geometryType: 'esriGeometryPolygon',
      parentLayerId: 0,
      minScale: 20_000,
    },
    { id: 2, name: 'Parcel Labels', type: 'Annotation Layer', parentLayerId: 0 },
  ],
};

describe('listDirectoryServices', () => {
  it('keeps map and feature services, composes URLs and sorts by display name', async () => {
    const fetchFn = vi.fn<FetchFn>(() =>
      Promise.resolve(
        jsonResponse({
          folders: ['Planning'],
          services: [
            { name: 'Planning/Parcels', type: 'MapServer' },
            { name: 'Aerials2023', type: 'ImageServer' },
            { name: 'Zoning', type: 'FeatureServer' },
            { name: 'addresses', type: 'MapServer' },
            { name: 'Geocoder', type: 'GeocodeServer' },
          ],
        })
      )
    );

    const services = await listDirectoryServices(`${ROOT}/`, { fetchFn });

    expect(fetchFn.mock.calls[0][0]).toBe(`${ROOT}?f=json`);
    expect(services).toEqual([
      { name: 'addresses', displayName: 'addresses', type: 'MapServer', url: `${ROOT}/addresses/MapServer` },
      {
        name: 'Planning/Parcels',
        displayName: 'Parcels',
        type: 'MapServer',
        url: `${ROOT}/Planning/Parcels/MapServer`,
      },
      { name: 'Zoning', displayName: 'Zoning', type: 'FeatureServer', url: `${ROOT}/Zoning/FeatureServer` },
    ]);
  });

  it('propagates transport failures', async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(textResponse('Forbidden', 403)));
    await expect(listDirectoryServices(ROOT, { fetchFn })).rejects.toBeInstanceOf(TransportError);
  });
});

describe('listServiceLayers', () => {
  it('reads layers with defaults filled in', async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(jsonResponse(SERVICE_BODY)));

    const layers = await listServiceLayers(SERVICE, { fetchFn });

    expect(layers).toHaveLength(3);
    expect(layers[0]).toEqual({
      id: 0,
      name: 'Property',
      type: 'Group Layer',
      geometryKind: null,
      parentId: -1,
      subLayerIds: [1, 2],
      minScale: 0,
      maxScale: 0,
      defaultVisibility: true,
    });
    expect(layers[1]).toMatchObject({ geometryKind: 'polygon', parentId: 0, minScale: 20_000 });
  });
});

describe('getLayerSchema', () => {
  it('reads fields, geometry kind and spatial reference', async () => {
    const fetchFn = vi.fn<FetchFn>(() =>
      Promise.resolve(
        jsonResponse({
          id: 1,
          name: 'Tax Parcels',
          geometryType: 'esriGeometryPolygon',
          fields: [
            { name: 'FID', type: 'esriFieldTypeOID', alias: 'FID' },
            { name: 'PIN', type: 'esriFieldTypeString', alias: 'Parcel ID', length: 20 },
          ],
          extent: {
            xmin: 1_900_000,
            ymin: 700_000,
            xmax: 2_000_000,
            ymax: 800_000,
            spatialReference: { wkid: 102733, latestWkid: 2273 },
          },
          maxRecordCount: 1000,
        })
      )
    );

    const schema = await getLayerSchema(SERVICE, 1, { fetchFn });

    expect(fetchFn.mock.calls[0][0]).toBe(`${SERVICE}/1?f=json`);
    expect(schema.geometryKind).toBe('polygon');
    expect(schema.objectIdField).toBe('FID');
    expect(schema.fields.map((f) => [f.name, f.kind])).toEqual([
      ['FID', 'integer'],
      ['PIN', 'text'],
    ]);
    expect(resolveWkid(schema.spatialReference)).toBe(2273);
    expect(schema.maxRecordCount).toBe(1000);
  });

  it('falls back for sparse layers', async () => {
    const fetchFn = vi.fn<FetchFn>(() =>
      Promise.resolve(jsonResponse({ fields: null, extent: { xmin: 'NaN' } }))
    );

    const schema = await getLayerSchema(SERVICE, 7, { fetchFn });

    expect(schema).toMatchObject({
      id: 7,
      name: 'Layer 7',
      geometryKind: 'polygon',
      objectIdField: 'OBJECTID',
      fields: [],
      extent: null,
      spatialReference: null,
    });
    expect(resolveWkid(schema.spatialReference)).toBe(4326);
  });
});

describe('findLayerByName', () => {
  function layer(id: number, name: string, type: string): ServiceLayer {
    return {
      id,
      name,
      type,
      geometryKind: type === 'Feature Layer' ? 'polygon' : null,
      parentId: -1,
      subLayerIds: null,
      minScale: 0,
      maxScale: 0,
      defaultVisibility: true,
    };
  }

  const layers: ServiceLayer[] = [layer(0, 'Parcels', 'Group Layer'), layer(1, 'Parcels', 'Feature Layer')];

  it('prefers feature layers', () => {
    expect(findLayerByName(layers, 'parcel')?.id).toBe(1);
  });

  it('returns null for no match or a blank hint', () => {
    expect(findLayerByName(layers, 'zoning')).toBeNull();
    expect(findLayerByName(layers, '  ')).toBeNull();
  });
});

describe('checkServiceHealth', () => {
  it('reports a reachable service with its layer count', async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(jsonResponse(SERVICE_BODY)));

    const report = await checkServiceHealth(`${SERVICE}/`, { fetchFn });

    expect(report).toMatchObject({ url: SERVICE, alive: true, layerCount: 3, error: null });
    expect(report.responseMs).toBeGreaterThanOrEqual(0);
  });

  it('folds failures into the report instead of throwing', async () => {
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(textResponse('Bad Gateway', 502)));

    const report = await checkServiceHealth(SERVICE, { fetchFn });

    expect(report.alive).toBe(false);
    expect(report.layerCount).toBe(0);
    expect(report.error).toBe(`Network error fetching ${SERVICE}?f=json: HTTP 502: Bad Gateway`);
  });

  it('times out after 10 seconds by default', async () => {
    vi.useFakeTimers();
    const fetchFn = vi.fn<FetchFn>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const pending = checkServiceHealth(SERVICE, { fetchFn });
    await vi.advanceTimersByTimeAsync(10_000);
    const report = await pending;

    expect(report.alive).toBe(false);
    expect(report.error).toContain('timed out after 10000ms');
  });

  it('writes reports to the cache and reuses fresh ones', async () => {
    const cache = new MemoryHealthCache();
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(jsonResponse(SERVICE_BODY)));

    const first = await checkServiceHealth(SERVICE, { fetchFn, cache, maxAgeMs: 60_000 });
    const second = await checkServiceHealth(SERVICE, { fetchFn, cache, maxAgeMs: 60_000 });

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(cache.get(SERVICE)).toBe(first);
  });

  it('probes again when no freshness limit is given', async () => {
    const cache = new MemoryHealthCache();
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(jsonResponse(SERVICE_BODY)));

    await checkServiceHealth(SERVICE, { fetchFn, cache });
    await checkServiceHealth(SERVICE, { fetchFn, cache });

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('returns the report when the cache cannot store it', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const cache: HealthCache = {
      get: () => null,
      set: () => {
        throw new Error('SQLITE_READONLY: attempt to write a readonly database');
      },
    };
    const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(jsonResponse(SERVICE_BODY)));

    const report = await checkServiceHealth(SERVICE, { fetchFn, cache });

    expect(report).toMatchObject({ url: SERVICE, alive: true, layerCount: 3 });
    expect(warn).toHaveBeenCalledWith(
      `Could not cache health report for ${SERVICE}: ` +
        'SQLITE_READONLY: attempt to write a readonly database'
    );
    warn.mockRestore();
  });

  it('still throws on caller cancellation', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      checkServiceHealth(SERVICE, { signal: controller.signal, fetchFn: vi.fn<FetchFn>() })
    ).rejects.toBeInstanceOf(DownloadCancelledError);
  });
});

describe('checkServicesHealth', () => {
  it('returns one report per unique URL in order of first appearance', async () => {
    const fetchFn = vi.fn<FetchFn>(
      routedFetch((url) =>
        url.pathname.includes('/Down/') ? textResponse('Not Found', 404) : SERVICE_BODY
      )
    );

    const reports = await checkServicesHealth(
      [`${ROOT}/B/MapServer`, `${ROOT}/Down/MapServer`, `${ROOT}/B/MapServer/`, `${ROOT}/A/MapServer`],
      { fetchFn }
    );

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(reports.map((r) => [r.url, r.alive])).toEqual([
      [`${ROOT}/B/MapServer`, true],
      [`${ROOT}/Down/MapServer`, false],
      [`${ROOT}/A/MapServer`, true],
    ]);
  });

  it('limits probes in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const fetchFn = vi.fn<FetchFn>(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return jsonResponse(SERVICE_BODY);
    });

    const urls = ['A', 'B', 'C', 'D', 'E'].map((name) => `${ROOT}/${name}/MapServer`);
    await checkServicesHealth(urls, { fetchFn, concurrency: 2 });

    expect(fetchFn).toHaveBeenCalledTimes(5);
    expect(peak).toBe(2);
  });
});
