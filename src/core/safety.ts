/**
 * Pre-flight safety gate.
 *
 * Runs before any bulk download. Checks, in order:
 * 1. Extent area (no network). A huge extent blocks outright.
 * 2. Spatial filter presence. No filter always blocks.
 * 3. Server feature count, under a short timeout. A failed count warns.
 * 4. An extent warning upgrades a would-be proceed to warn.
 *
 * The first block wins; warnings accumulate.
 */
import {
  extentAreaSqDeg,
  extentAreaSqMiles,
  extentHeight,
  extentWidth,
  filterExtentWgs84,
  type ExtentRect,
} from '../geo/extent.js';
import {
  DEFAULT_DOWNLOAD_CONFIG,
  DEFAULT_SAFETY_CONFIG,
  deriveConfig,
  type DownloadConfig,
  type SafetyConfig,
} from './config.js';
import { queryFeatureCount } from './downloader.js';
import { DownloadCancelledError, errorMessage } from './errors.js';
import type { GeometryFilter } from './query.js';
import type { FetchFn } from './transport.js';

// ============================================================================
// Types
// ============================================================================

export type SafetyAction = 'proceed' | 'warn' | 'block';

export interface SafetyDetails {
  extentWidthDeg: number | null;
  extentHeightDeg: number | null;
  /** Thresholds actually compared against the count */
  effectiveWarnCount: number | null;
  effectiveBlockCount: number | null;
  densityAdjusted: boolean;
  /** Why the count query failed, when it did */
  countError: string | null;
}

export interface SafetyVerdict {
  action: SafetyAction;
  /** null when the count was never asked for or could not be read */
  featureCount: number | null;
  estimatedBytes: number | null;
  extentSqDeg: number | null;
  extentSqMiles: number | null;
  /** Human-readable, in the order the checks ran. Empty only on proceed. */
  reasons: string[];
  details: SafetyDetails;
}

export interface SafetyCheckInput {
  serviceUrl: string;
  layerId: number;
  filter: GeometryFilter | null;
  /** WGS84 extent; derived from the filter when omitted */
  extent?: ExtentRect | null;
  /** e.g. "parcels" or "contours"; matched against highDensityLayerTypes */
  layerType?: string | null;
}

export interface SafetyCheckOptions {
  config?: SafetyConfig;
  /** Base transport config; the count query runs with countTimeoutMs */
  download?: DownloadConfig;
  fetchFn?: FetchFn;
  signal?: AbortSignal;
}

// Density tightening applies above this extent
const DENSE_EXTENT_SQ_DEG = 0.1;
const DENSE_WARN_CAP = 5_000;
const DENSE_BLOCK_CAP = 50_000;

const BYTES_PER_MB = 1024 * 1024;

// ============================================================================
// Formatting
// ============================================================================

function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

function formatMb(bytes: number, digits = 0): string {
  const mb = bytes / BYTES_PER_MB;
  return digits === 0 ? formatCount(Math.round(mb)) : mb.toFixed(digits);
}

function emptyVerdict(): SafetyVerdict {
  return {
    action: 'proceed',
    featureCount: null,
    estimatedBytes: null,
    extentSqDeg: null,
    extentSqMiles: null,
    reasons: [],
    details: {
      extentWidthDeg: null,
      extentHeightDeg: null,
      effectiveWarnCount: null,
      effectiveBlockCount: null,
      densityAdjusted: false,
      countError: null,
    },
  };
}

// ============================================================================
// Thresholds
// ============================================================================

export function isHighDensityLayer(
  layerType: string | null | undefined,
  config: SafetyConfig
): boolean {
  if (!layerType) return false;
  const needle = layerType.trim().toLowerCase();
  return config.highDensityLayerTypes.some((t) => t.toLowerCase() === needle);
}

/**
 * Warn/block counts for a layer at a given extent. Dense layer types over a
 * broad extent get capped thresholds.
 */
export function effectiveThresholds(
  config: SafetyConfig,
  layerType: string | null | undefined,
  extentSqDeg: number | null
): { warn: number; block: number; densityAdjusted: boolean } {
  const broad = extentSqDeg !== null && extentSqDeg > DENSE_EXTENT_SQ_DEG;
  if (broad && isHighDensityLayer(layerType, config)) {
    return {
      warn: Math.min(config.warnFeatureCount, DENSE_WARN_CAP),
      block: Math.min(config.blockFeatureCount, DENSE_BLOCK_CAP),
      densityAdjusted: true,
    };
  }
  return { warn: config.warnFeatureCount, block: config.blockFeatureCount, densityAdjusted: false };
}

// ============================================================================
// Gate
// ============================================================================

export async function checkDownloadSafety(
  input: SafetyCheckInput,
  options: SafetyCheckOptions = {}
): Promise<SafetyVerdict> {
  const config = options.config ?? DEFAULT_SAFETY_CONFIG;
  const verdict = emptyVerdict();

  // 1. Extent area
  const extent = input.extent ?? filterExtentWgs84(input.filter);
  if (extent) {
    const area = extentAreaSqDeg(extent);
    const sqMiles = extentAreaSqMiles(extent);
    verdict.extentSqDeg = area;
    verdict.extentSqMiles = sqMiles;
    verdict.details.extentWidthDeg = extentWidth(extent);
    verdict.details.extentHeightDeg = extentHeight(extent);

    if (area >= config.blockExtentSqDeg) {
      verdict.action = 'block';
      verdict.reasons.push(
        `Query extent is extremely large: ~${formatCount(Math.round(sqMiles))} sq miles ` +
          `(${area.toFixed(3)} sq degrees). This would likely download hundreds of thousands ` +
          `of features. Zoom in or use a clip polygon.`
      );
      return verdict;
    }

    if (area >= config.warnExtentSqDeg) {
      verdict.reasons.push(
        `Large query extent: ~${formatCount(Math.round(sqMiles))} sq miles. ` +
          `Consider a clip polygon for targeted results.`
      );
    }
  }

  // 2. Spatial filter
  if (!input.filter) {
    verdict.action = 'block';
    verdict.reasons.push(
      'No spatial filter attached. Downloading an entire service layer without ' +
        'a bounding box or clip polygon is not allowed.'
    );
    return verdict;
  }

  // 3. Feature count
  const countConfig = deriveConfig(options.download ?? DEFAULT_DOWNLOAD_CONFIG, {
    timeoutMs: config.countTimeoutMs,
  });

  let count: number;
  try {
    count = await queryFeatureCount(input.serviceUrl, input.layerId, input.filter, {
      config: countConfig,
      fetchFn: options.fetchFn,
      signal: options.signal,
    });
  } catch (err) {
    if (err instanceof DownloadCancelledError) throw err;
    verdict.action = 'warn';
    verdict.details.countError = errorMessage(err);
    verdict.reasons.push(
      'Could not determine feature count from the server. The dataset may be very ' +
        'large or the server may be slow. Proceed with caution.'
    );
    return verdict;
  }

  const estimatedBytes = count * config.estBytesPerFeature;
  verdict.featureCount = count;
  verdict.estimatedBytes = estimatedBytes;

  const thresholds = effectiveThresholds(config, input.layerType, verdict.extentSqDeg);
  verdict.details.effectiveWarnCount = thresholds.warn;
  verdict.details.effectiveBlockCount = thresholds.block;
  verdict.details.densityAdjusted = thresholds.densityAdjusted;

  if (count >= thresholds.block) {
    verdict.action = 'block';
    verdict.reasons.push(
      `Feature count (${formatCount(count)}) exceeds the safety limit of ` +
        `${formatCount(thresholds.block)}. This would produce a ~${formatMb(estimatedBytes)} MB ` +
        `file and could take a very long time. Zoom in or use a clip polygon.`
    );
    return verdict;
  }

  if (count >= thresholds.warn) {
    verdict.action = 'warn';
    verdict.reasons.push(
      `This will download ${formatCount(count)} features ` +
        `(~${formatMb(estimatedBytes)} MB estimated). This may take several minutes.`
    );
    return verdict;
  }

  // 4. Extent warnings still need confirmation
  verdict.action = verdict.reasons.length > 0 ? 'warn' : 'proceed';
  return verdict;
}

// ============================================================================
// Presentation
// ============================================================================

/**
 * Single line for logs, e.g. `WARN: 12,000 features | ~22.9 MB est. | extent 0.0500 sq deg`.
 */
export function summarizeVerdict(verdict: SafetyVerdict): string {
  const parts = [
    `${verdict.action.toUpperCase()}: ${
      verdict.featureCount === null ? 'unknown' : formatCount(verdict.featureCount)
    } features`,
  ];
  if (verdict.estimatedBytes) {
    parts.push(`~${formatMb(verdict.estimatedBytes, 1)} MB est.`);
  }
  if (verdict.extentSqDeg) {
    parts.push(`extent ${verdict.extentSqDeg.toFixed(4)} sq deg`);
  }
  return parts.join(' | ');
}

/**
 * Multi-line text for a confirmation prompt.
 */
export function formatConfirmationMessage(verdict: SafetyVerdict): string {
  const lines: string[] = [];

  if (verdict.featureCount) {
    lines.push(`Features to download: ${formatCount(verdict.featureCount)}`);
  }
  if (verdict.estimatedBytes !== null && verdict.estimatedBytes > BYTES_PER_MB) {
    lines.push(`Estimated file size: ~${formatMb(verdict.estimatedBytes)} MB`);
  }
  if (verdict.extentSqMiles !== null && verdict.extentSqMiles > 10) {
    lines.push(`Query area: ~${formatCount(Math.round(verdict.extentSqMiles))} square miles`);
  }

  lines.push('');
  for (const reason of verdict.reasons) {
    lines.push(`  ${reason}`);
  }

  if (verdict.action === 'warn') {
    lines.push('', 'Do you want to proceed with this download?');
  }

  return lines.join('\n');
}
