/**
 * Configuration for downloads and the safety gate.
 *
 * Values are frozen once resolved. Code that needs a different value for a
 * single call (the gate's short count timeout, a health probe) derives a new
 * config with `deriveConfig` instead of touching the shared one.
 *
 * Precedence (highest to lowest):
 * 1. Overrides passed by the caller
 * 2. Environment variables (LAYERPULL_*)
 * 3. Defaults below
 */
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

export interface DownloadConfig {
  /** Object IDs per batch request. Server record caps seen as low as 1000. */
  readonly batchSize: number;
  /** Per-request timeout in milliseconds */
  readonly timeoutMs: number;
  /** Verify TLS certificates. Off by default: many county servers are misconfigured. */
  readonly verifyTls: boolean;
  readonly userAgent: string;
}

export interface SafetyConfig {
  readonly warnFeatureCount: number;
  readonly blockFeatureCount: number;
  /** Extent thresholds in square degrees (WGS84) */
  readonly warnExtentSqDeg: number;
  readonly blockExtentSqDeg: number;
  /** Conservative average for polygons with moderate attribute tables */
  readonly estBytesPerFeature: number;
  /** Layer types that get tighter limits at broad extents */
  readonly highDensityLayerTypes: readonly string[];
  readonly countTimeoutMs: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_DOWNLOAD_CONFIG: DownloadConfig = Object.freeze({
  batchSize: 500,
  timeoutMs: 60_000,
  verifyTls: false,
  userAgent: 'layerpull/0.1',
});

// ~0.01 sq deg is a small municipality, ~0.25 a county, >1 multi-county
export const DEFAULT_SAFETY_CONFIG: SafetyConfig = Object.freeze({
  warnFeatureCount: 10_000,
  blockFeatureCount: 100_000,
  warnExtentSqDeg: 0.25,
  blockExtentSqDeg: 2.0,
  estBytesPerFeature: 2_000,
  highDensityLayerTypes: Object.freeze([
    'parcels',
    'address_points',
    'building_footprints',
    'contours',
    'flood_zones',
  ]),
  countTimeoutMs: 30_000,
});

// ============================================================================
// Validation
// ============================================================================

const positiveInt = z.number().int().positive();

const DownloadConfigSchema = z.object({
  batchSize: positiveInt,
  timeoutMs: positiveInt,
  verifyTls: z.boolean(),
  userAgent: z.string().min(1),
});

const SafetyConfigSchema = z
  .object({
    warnFeatureCount: z.number().int().nonnegative(),
    blockFeatureCount: z.number().int().nonnegative(),
    warnExtentSqDeg: z.number().nonnegative(),
    blockExtentSqDeg: z.number().nonnegative(),
    estBytesPerFeature: z.number().nonnegative(),
    highDensityLayerTypes: z.array(z.string()).readonly(),
    countTimeoutMs: positiveInt,
  })
  .refine((c) => c.warnFeatureCount <= c.blockFeatureCount, {
    message: 'warnFeatureCount must not exceed blockFeatureCount',
  })
  .refine((c) => c.warnExtentSqDeg <= c.blockExtentSqDeg, {
    message: 'warnExtentSqDeg must not exceed blockExtentSqDeg',
  });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ============================================================================
// Resolution
// ============================================================================

export function resolveDownloadConfig(
  overrides: Partial<DownloadConfig> = {},
  base: DownloadConfig = DEFAULT_DOWNLOAD_CONFIG
): DownloadConfig {
  const parsed = DownloadConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    throw new Error(`Invalid download config: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

export function resolveSafetyConfig(
  overrides: Partial<SafetyConfig> = {},
  base: SafetyConfig = DEFAULT_SAFETY_CONFIG
): SafetyConfig {
  const parsed = SafetyConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    throw new Error(`Invalid safety config: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze({
    ...parsed.data,
    highDensityLayerTypes: Object.freeze(
      parsed.data.highDensityLayerTypes.map((t) => t.toLowerCase())
    ),
  });
}

/**
 * Copy of `config` with some fields changed. The original is left as is.
 */
export function deriveConfig<T extends object>(config: T, changes: Partial<T>): T {
  return Object.freeze({ ...config, ...changes });
}

// ============================================================================
// Environment
// ============================================================================

const EnvSchema = z.object({
  LAYERPULL_BATCH_SIZE: z.coerce.number().int().positive().optional(),
  LAYERPULL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LAYERPULL_VERIFY_TLS: z.enum(['true', 'false', '1', '0']).optional(),
  LAYERPULL_USER_AGENT: z.string().min(1).optional(),
  LAYERPULL_COUNT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

type Overrides<T> = { -readonly [K in keyof T]?: T[K] };

export interface LoadedConfig {
  readonly download: DownloadConfig;
  readonly safety: SafetyConfig;
}

export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): LoadedConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  const download: Overrides<DownloadConfig> = {};
  if (vars.LAYERPULL_BATCH_SIZE !== undefined) download.batchSize = vars.LAYERPULL_BATCH_SIZE;
  if (vars.LAYERPULL_TIMEOUT_MS !== undefined) download.timeoutMs = vars.LAYERPULL_TIMEOUT_MS;
  if (vars.LAYERPULL_VERIFY_TLS !== undefined) {
    download.verifyTls = vars.LAYERPULL_VERIFY_TLS === 'true' || vars.LAYERPULL_VERIFY_TLS === '1';
  }
  if (vars.LAYERPULL_USER_AGENT !== undefined) download.userAgent = vars.LAYERPULL_USER_AGENT;

  const safety: Overrides<SafetyConfig> = {};
  if (vars.LAYERPULL_COUNT_TIMEOUT_MS !== undefined) {
    safety.countTimeoutMs = vars.LAYERPULL_COUNT_TIMEOUT_MS;
  }

  return {
    download: resolveDownloadConfig(download),
    safety: resolveSafetyConfig(safety),
  };
}
