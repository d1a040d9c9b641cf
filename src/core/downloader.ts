/**
 * Object-ID paginated feature download.
 *
 * COUNT -> FETCH_IDS -> BATCH_LOOP -> DONE, with an early exit when the
 * count or the ID set is empty. Batches run strictly in ascending ID order,
 * one at a time. Any failed or truncated batch aborts the whole download;
 * partial results are never returned.
 */
import { DEFAULT_DOWNLOAD_CONFIG, type DownloadConfig } from './config.js';
import { TransportError, throwIfCancelled } from './errors.js';
import { batchParams, countParams, idsParams, queryUrl, type GeometryFilter } from './query.js';
import {
  CountResponseSchema,
  IdsResponseSchema,
  QueryResponseSchema,
  type EsriFeature,
  type SpatialReference,
} from './schemas.js';
import { buildUrl, fetchDecoded, type FetchFn, type TransportOptions } from './transport.js';

// ============================================================================
// Types
// ============================================================================

export type ProgressCallback = (percent: number, total: number, message: string) => void;

export interface DownloadRequest {
  serviceUrl: string;
  layerId: number;
  filter: GeometryFilter | null;
  /** Sent as outSR on every batch */
  outSpatialReference?: number;
}

export interface DownloadOptions {
  config?: DownloadConfig;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
  fetchFn?: FetchFn;
}

export interface DownloadResult {
  features: EsriFeature[];
  /** Spatial reference of the first batch; null when nothing was found */
  spatialReference: SpatialReference | null;
}

export interface ObjectIdSet {
  idField: string;
  ids: number[];
}

export interface ObjectIdBatch {
  index: number;
  min: number;
  max: number;
  ids: number[];
}

const PROGRESS_FLOOR = 10;
const PROGRESS_CEILING = 95;

// ============================================================================
// Batching
// ============================================================================

/**
 * Sorted ascending, duplicates removed.
 */
export function normalizeObjectIds(ids: readonly number[]): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

/**
 * Split a sorted, deduplicated ID list into contiguous batches of at most
 * `batchSize`. Batch i's max is always below batch i+1's min.
 */
export function partitionObjectIds(ids: readonly number[], batchSize: number): ObjectIdBatch[] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const batches: ObjectIdBatch[] = [];
  for (let start = 0; start < ids.length; start += batchSize) {
    const slice = ids.slice(start, start + batchSize);
    batches.push({
      index: batches.length,
      min: slice[0],
      max: slice[slice.length - 1],
      ids: slice,
    });
  }
  return batches;
}

export function batchProgress(completed: number, totalBatches: number): number {
  if (totalBatches <= 0) return PROGRESS_CEILING;
  return Math.floor(
    PROGRESS_FLOOR + (completed / totalBatches) * (PROGRESS_CEILING - PROGRESS_FLOOR)
  );
}

// ============================================================================
// Queries
// ============================================================================

export async function queryFeatureCount(
  serviceUrl: string,
  layerId: number,
  filter: GeometryFilter | null,
  options: TransportOptions = {}
): Promise<number> {
  const data = await fetchDecoded(
    CountResponseSchema,
    queryUrl(serviceUrl, layerId),
    countParams(filter),
    options
  );
  return data.count;
}

export async function queryObjectIds(
  serviceUrl: string,
  layerId: number,
  filter: GeometryFilter | null,
  options: TransportOptions = {}
): Promise<ObjectIdSet> {
  const data = await fetchDecoded(
    IdsResponseSchema,
    queryUrl(serviceUrl, layerId),
    idsParams(filter),
    options
  );
  return {
    idField: data.objectIdFieldName,
    ids: normalizeObjectIds(data.objectIds ?? []),
  };
}

// ============================================================================
// Download
// ============================================================================

export async function downloadFeatures(
  request: DownloadRequest,
  options: DownloadOptions = {}
): Promise<DownloadResult> {
  const { serviceUrl, layerId, filter, outSpatialReference } = request;
  const { onProgress, signal } = options;
  const config = options.config ?? DEFAULT_DOWNLOAD_CONFIG;
  const transport: TransportOptions = { config, signal, fetchFn: options.fetchFn };

  // COUNT
  onProgress?.(0, 100, 'Querying feature count...');
  const total = await queryFeatureCount(serviceUrl, layerId, filter, transport);

  if (total === 0) {
    onProgress?.(100, 100, 'No features found in query area.');
    return { features: [], spatialReference: null };
  }

  // FETCH_IDS
  onProgress?.(5, 100, `Found ${total} features. Getting object IDs...`);
  const { idField, ids } = await queryObjectIds(serviceUrl, layerId, filter, transport);

  if (ids.length === 0) {
    // Count said otherwise; trust the ID list
    onProgress?.(100, 100, 'Server returned no object IDs. No features downloaded.');
    return { features: [], spatialReference: null };
  }

  // BATCH_LOOP
  const batches = partitionObjectIds(ids, config.batchSize);
  const features: EsriFeature[] = [];
  let spatialReference: SpatialReference | null = null;

  onProgress?.(PROGRESS_FLOOR, 100, `Downloading ${ids.length} features in ${batches.length} batches...`);

  for (const batch of batches) {
    throwIfCancelled(signal, `batch ${batch.index + 1}/${batches.length}`);

    const url = queryUrl(serviceUrl, layerId);
    const params = batchParams(idField, batch.min, batch.max, filter, outSpatialReference);
    const data = await fetchDecoded(QueryResponseSchema, url, params, transport);

    // The server capped this batch below its ID count; the rest would be lost
    if (data.exceededTransferLimit) {
      throw new TransportError(
        buildUrl(url, params),
        `batch ${batch.index + 1}/${batches.length} was truncated at ${data.features.length} ` +
          `of ${batch.ids.length} features; use a batch size within the server's record limit`
      );
    }

    features.push(...data.features);
    if (spatialReference === null && data.spatialReference) {
      spatialReference = data.spatialReference;
    }

    onProgress?.(
      batchProgress(batch.index + 1, batches.length),
      100,
      `Batch ${batch.index + 1}/${batches.length} (${features.length}/${total})`
    );
  }

  // DONE
  onProgress?.(100, 100, `Downloaded ${features.length} features.`);

  if (features.length === 0) {
    return { features: [], spatialReference: null };
  }
  return { features, spatialReference };
}
