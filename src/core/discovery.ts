/**
 * Service discovery: directories, service layers, layer schemas, and
 * health probes.
 */
import pLimit from 'p-limit';
import { toLayerField, type LayerField } from './attributes.js';
import { DEFAULT_DOWNLOAD_CONFIG, deriveConfig } from './config.js';
import { DownloadCancelledError, errorMessage, throwIfCancelled } from './errors.js';
import { geometryKindFromEsri, type GeometryKind } from './geometry.js';
import { isFresh, type HealthCache, type HealthReport } from './health-cache.js';
import { layerUrl } from './query.js';
import {
  DirectoryResponseSchema,
  LayerResponseSchema,
  ServiceResponseSchema,
  type ServiceExtent,
  type SpatialReference,
} from './schemas.js';
import { fetchDecoded, stripTrailingSlash, type TransportOptions } from './transport.js';

// ============================================================================
// Types
// ============================================================================

export interface DirectoryService {
  /** Full service name, possibly with a folder prefix */
  name: string;
  displayName: string;
  type: 'MapServer' | 'FeatureServer';
  url: string;
}

export interface ServiceLayer {
  id: number;
  name: string;
  /** Declared layer type, e.g. "Feature Layer" or "Group Layer" */
  type: string;
  geometryKind: GeometryKind | null;
  parentId: number;
  subLayerIds: number[] | null;
  minScale: number;
  maxScale: number;
  defaultVisibility: boolean;
}

export interface LayerSchema {
  id: number;
  name: string;
  geometryKind: GeometryKind;
  objectIdField: string;
  fields: LayerField[];
  spatialReference: SpatialReference | null;
  extent: ServiceExtent | null;
  maxRecordCount: number | null;
  minScale: number;
  maxScale: number;
}

export interface HealthCheckOptions extends TransportOptions {
  /** Probe timeout; defaults to 10s */
  timeoutMs?: number;
  cache?: HealthCache;
  /** Use a cached report instead of probing. Leave unset to always probe. */
  maxAgeMs?: number;
}

const BROWSABLE_TYPES = new Set(['MapServer', 'FeatureServer']);
const HEALTH_TIMEOUT_MS = 10_000;

function isBrowsable(type: string): type is DirectoryService['type'] {
  return BROWSABLE_TYPES.has(type);
}

// ============================================================================
// Directory
// ============================================================================

/**
 * Child map/feature services of a services directory, sorted by display
 * name (case-insensitive).
 */
export async function listDirectoryServices(
  directoryUrl: string,
  options: TransportOptions = {}
): Promise<DirectoryService[]> {
  const base = stripTrailingSlash(directoryUrl);
  const data = await fetchDecoded(DirectoryResponseSchema, base, {}, options);

  const results: DirectoryService[] = [];
  for (const svc of data.services) {
    if (!isBrowsable(svc.type)) continue;
    const parts = svc.name.split('/');
    results.push({
      name: svc.name,
      displayName: parts[parts.length - 1],
      type: svc.type,
      url: `${base}/${svc.name}/${svc.type}`,
    });
  }

  return results.sort((a, b) =>
    a.displayName.toLowerCase().localeCompare(b.displayName.toLowerCase())
  );
}

// ============================================================================
// Layers
// ============================================================================

export async function listServiceLayers(
  serviceUrl: string,
  options: TransportOptions = {}
): Promise<ServiceLayer[]> {
  const data = await fetchDecoded(ServiceResponseSchema, serviceUrl, {}, options);

  return data.layers.map((layer) => ({
    id: layer.id,
    name: layer.name ?? `Layer ${layer.id}`,
    type: layer.type,
    geometryKind: layer.geometryType ? geometryKindFromEsri(layer.geometryType) : null,
    parentId: layer.parentLayerId,
    subLayerIds: layer.subLayerIds,
    minScale: layer.minScale,
    maxScale: layer.maxScale,
    defaultVisibility: layer.defaultVisibility,
  }));
}

export async function getLayerSchema(
  serviceUrl: string,
  layerId: number,
  options: TransportOptions = {}
): Promise<LayerSchema> {
  const data = await fetchDecoded(LayerResponseSchema, layerUrl(serviceUrl, layerId), {}, options);
  const fields = data.fields ?? [];

  const oidField =
    data.objectIdField ??
    fields.find((f) => f.type === 'esriFieldTypeOID')?.name ??
    'OBJECTID';

  return {
    id: data.id ?? layerId,
    name: data.name ?? `Layer ${layerId}`,
    geometryKind: geometryKindFromEsri(data.geometryType),
    objectIdField: oidField,
    fields: fields.map(toLayerField),
    spatialReference: data.extent?.spatialReference ?? data.spatialReference ?? null,
    extent: data.extent ?? null,
    maxRecordCount: data.maxRecordCount ?? null,
    minScale: data.minScale,
    maxScale: data.maxScale,
  };
}

/**
 * WKID of a spatial reference, preferring the current code over a
 * deprecated one.
 */
export function resolveWkid(sr: SpatialReference | null | undefined, fallback = 4326): number {
  return sr?.latestWkid ?? sr?.wkid ?? fallback;
}

/**
 * First layer whose name contains `hint` (case-insensitive). Feature layers
 * win over group layers and tables.
 */
export function findLayerByName(layers: readonly ServiceLayer[], hint: string): ServiceLayer | null {
  const needle = hint.trim().toLowerCase();
  if (!needle) return null;
  const matches = layers.filter((l) => l.name.toLowerCase().includes(needle));
  return matches.find((l) => l.type === 'Feature Layer') ?? matches[0] ?? null;
}

// ============================================================================
// Health
// ============================================================================

/**
 * Time a metadata fetch. Never throws for server or network trouble; that
 * is folded into `alive`. Caller cancellation still throws.
 */
export async function checkServiceHealth(
  serviceUrl: string,
  options: HealthCheckOptions = {}
): Promise<HealthReport> {
  const url = stripTrailingSlash(serviceUrl);
  throwIfCancelled(options.signal, `health check of ${url}`);

  if (options.cache && options.maxAgeMs !== undefined) {
    const cached = options.cache.get(url);
    if (cached && isFresh(cached, options.maxAgeMs)) {
      return cached;
    }
  }

  const config = deriveConfig(options.config ?? DEFAULT_DOWNLOAD_CONFIG, {
    timeoutMs: options.timeoutMs ?? HEALTH_TIMEOUT_MS,
  });

  const start = performance.now();
  let report: HealthReport;
  try {
    const data = await fetchDecoded(ServiceResponseSchema, url, {}, {
      config,
      signal: options.signal,
      fetchFn: options.fetchFn,
    });
    report = {
      url,
      alive: true,
      responseMs: Math.round(performance.now() - start),
      layerCount: data.layers.length,
      error: null,
      checkedAt: new Date().toISOString(),
    };
  } catch (err) {
    if (err instanceof DownloadCancelledError) throw err;
    report = {
      url,
      alive: false,
      responseMs: Math.round(performance.now() - start),
      layerCount: 0,
      error: errorMessage(err),
      checkedAt: new Date().toISOString(),
    };
  }

  if (options.cache) {
    try {
      options.cache.set(report);
    } catch (err) {
      console.warn(`Could not cache health report for ${url}: ${errorMessage(err)}`);
    }
  }
  return report;
}

/**
 * Probe many services with bounded concurrency. Returns one report per
 * unique URL (trailing slashes ignored), in order of first appearance.
 */
export async function checkServicesHealth(
  serviceUrls: readonly string[],
  options: HealthCheckOptions & { concurrency?: number } = {}
): Promise<HealthReport[]> {
  const { concurrency = 4, ...probeOptions } = options;
  const limit = pLimit(concurrency);
  const unique = [...new Set(serviceUrls.map(stripTrailingSlash))];

  return Promise.all(unique.map((url) => limit(() => checkServiceHealth(url, probeOptions))));
}
