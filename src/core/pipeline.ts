/**
 * Acquire one layer end to end: schema, safety gate, download, convert,
 * hand off to a sink.
 */
import type { ExtentRect } from '../geo/extent.js';
import type { FeatureSink, SinkWriteResult } from '../sinks/geojson-sink.js';
import {
  DEFAULT_DOWNLOAD_CONFIG,
  deriveConfig,
  type DownloadConfig,
  type SafetyConfig,
} from './config.js';
import { convertFeatures } from './convert.js';
import { getLayerSchema, resolveWkid } from './discovery.js';
import { downloadFeatures, type ProgressCallback } from './downloader.js';
import { SafetyBlockedError, throwIfCancelled } from './errors.js';
import type { GeometryFilter } from './query.js';
import { checkDownloadSafety, summarizeVerdict, type SafetyVerdict } from './safety.js';
import type { FetchFn } from './transport.js';

// ============================================================================
// Types
// ============================================================================

export type ConfirmCallback = (verdict: SafetyVerdict) => boolean | Promise<boolean>;

export interface AcquireOptions {
  serviceUrl: string;
  layerId: number;
  filter: GeometryFilter | null;
  sink: FeatureSink;
  /** Defaults to the layer's own name */
  layerName?: string;
  /** Density hint for the safety gate, e.g. "parcels" */
  layerType?: string | null;
  /** WGS84 extent for the gate; derived from the filter when omitted */
  extent?: ExtentRect | null;
  outSpatialReference?: number;
  download?: DownloadConfig;
  safety?: SafetyConfig;
  /** Asked on a warn verdict. Without it, warnings decline. */
  confirm?: ConfirmCallback;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
  fetchFn?: FetchFn;
}

export type AcquireResult =
  | { status: 'declined'; verdict: SafetyVerdict }
  | { status: 'empty'; verdict: SafetyVerdict; layerName: string }
  | {
      status: 'written';
      verdict: SafetyVerdict;
      layerName: string;
      featureCount: number;
      skipped: number;
      spatialReferenceId: number;
      output: SinkWriteResult;
    };

// ============================================================================
// Layer Names
// ============================================================================

/**
 * Sink-safe layer name: runs of anything outside [A-Za-z0-9_] collapse to
 * one underscore; leading and trailing underscores are trimmed.
 */
export function toLayerName(name: string | null | undefined, layerId: number): string {
  const cleaned = (name ?? '').replace(/[^A-Za-z0-9_]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned || `layer_${layerId}`;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Batches never ask for more records than the layer will return at once.
 */
export function batchConfig(
  download: DownloadConfig,
  maxRecordCount: number | null
): DownloadConfig {
  if (maxRecordCount === null || maxRecordCount <= 0 || maxRecordCount >= download.batchSize) {
    return download;
  }
  return deriveConfig(download, { batchSize: maxRecordCount });
}

export async function acquireLayer(options: AcquireOptions): Promise<AcquireResult> {
  const { serviceUrl, layerId, filter, signal, fetchFn } = options;
  const transport = { config: options.download, signal, fetchFn };

  const schema = await getLayerSchema(serviceUrl, layerId, transport);
  const layerName = toLayerName(options.layerName ?? schema.name, layerId);
  console.log(`Layer ${layerId} "${schema.name}" (${schema.geometryKind}, ${schema.fields.length} fields)`);

  const verdict = await checkDownloadSafety(
    { serviceUrl, layerId, filter, extent: options.extent, layerType: options.layerType },
    { config: options.safety, download: options.download, signal, fetchFn }
  );
  console.log(`Safety check: ${summarizeVerdict(verdict)}`);

  if (verdict.action === 'block') {
    throw new SafetyBlockedError(verdict);
  }
  if (verdict.action === 'warn') {
    const confirmed = options.confirm ? await options.confirm(verdict) : false;
    if (!confirmed) {
      console.log('Download declined.');
      return { status: 'declined', verdict };
    }
  }

  const config = batchConfig(options.download ?? DEFAULT_DOWNLOAD_CONFIG, schema.maxRecordCount);
  const result = await downloadFeatures(
    { serviceUrl, layerId, filter, outSpatialReference: options.outSpatialReference },
    { config, onProgress: options.onProgress, signal, fetchFn }
  );
  if (result.features.length === 0) {
    return { status: 'empty', verdict, layerName };
  }

  const { records, skipped } = convertFeatures(result.features, {
    geometryKind: schema.geometryKind,
    fields: schema.fields,
  });

  const spatialReferenceId = result.spatialReference
    ? resolveWkid(result.spatialReference)
    : options.outSpatialReference ?? resolveWkid(schema.spatialReference);

  throwIfCancelled(signal, 'write');
  const output = await options.sink.write({
    layerName,
    spatialReferenceId,
    fields: schema.fields,
    features: records,
  });
  console.log(`Wrote ${records.length} features to ${output.location} (${output.mode})`);

  return {
    status: 'written',
    verdict,
    layerName,
    featureCount: records.length,
    skipped,
    spatialReferenceId,
    output,
  };
}
