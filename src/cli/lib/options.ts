/**
 * Option parsing shared by commands: numbers, bounding boxes, clip polygons,
 * and the global transport flags.
 */
import { InvalidArgumentError } from 'commander';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { loadConfigFromEnv, resolveDownloadConfig, type LoadedConfig } from '../../core/config.js';
import {
  envelopeFilter,
  polygonFilter,
  type EnvelopeFilter,
  type GeometryFilter,
  type PolygonFilter,
} from '../../core/query.js';
import { isClockwise, type Position, type Ring } from '../../geo/rings.js';

// ============================================================================
// Scalars
// ============================================================================

export function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return n;
}

export function parsePositiveInteger(value: string): number {
  const n = parseInteger(value);
  if (n <= 0) {
    throw new InvalidArgumentError(`"${value}" must be greater than zero.`);
  }
  return n;
}

// ============================================================================
// Global Options
// ============================================================================

export interface GlobalOptions {
  timeout?: number;
  batchSize?: number;
  verifyTls?: boolean;
}

/**
 * Environment config with command-line flags on top.
 */
export function resolveCliConfig(
  options: GlobalOptions,
  env: Record<string, string | undefined> = process.env
): LoadedConfig {
  const loaded = loadConfigFromEnv(env);
  const download = resolveDownloadConfig(
    {
      ...(options.timeout !== undefined && { timeoutMs: options.timeout }),
      ...(options.batchSize !== undefined && { batchSize: options.batchSize }),
      ...(options.verifyTls !== undefined && { verifyTls: options.verifyTls }),
    },
    loaded.download
  );
  return { download, safety: loaded.safety };
}

// ============================================================================
// Filters
// ============================================================================

/**
 * "xmin,ymin,xmax,ymax" -> envelope filter, in WGS84 unless told otherwise.
 */
export function parseBbox(value: string, spatialReferenceId = 4326): EnvelopeFilter {
  const parts = value.split(',').map((p) => p.trim());
  if (parts.length !== 4 || parts.some((p) => p === '')) {
    throw new InvalidArgumentError(`Bounding box must be "xmin,ymin,xmax,ymax", got "${value}".`);
  }
  const [xmin, ymin, xmax, ymax] = parts.map(Number);
  if (![xmin, ymin, xmax, ymax].every(Number.isFinite)) {
    throw new InvalidArgumentError(`Bounding box has a non-numeric value: "${value}".`);
  }
  if (xmin >= xmax || ymin >= ymax) {
    throw new InvalidArgumentError(`Bounding box min must be below max: "${value}".`);
  }
  return envelopeFilter(xmin, ymin, xmax, ymax, spatialReferenceId);
}

const PositionSchema = z
  .array(z.number())
  .min(2)
  .transform((p): Position => [p[0], p[1]]);
const PolygonCoordsSchema = z.array(z.array(PositionSchema).min(4)).min(1);

const ClipGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: PolygonCoordsSchema }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(PolygonCoordsSchema).min(1) }),
]);
type ClipGeometry = z.infer<typeof ClipGeometrySchema>;

const ClipFileSchema = z.union([
  ClipGeometrySchema,
  z.object({ type: z.literal('Feature'), geometry: ClipGeometrySchema }),
  z.object({
    type: z.literal('FeatureCollection'),
    features: z.array(z.object({ geometry: ClipGeometrySchema })).min(1),
  }),
]);

function clipGeometries(data: z.infer<typeof ClipFileSchema>): ClipGeometry[] {
  switch (data.type) {
    case 'Feature':
      return [data.geometry];
    case 'FeatureCollection':
      return data.features.map((f) => f.geometry);
    default:
      return [data];
  }
}

function orient(ring: Ring, clockwise: boolean): Ring {
  return isClockwise(ring) === clockwise ? ring : [...ring].reverse();
}

/**
 * Rings of a GeoJSON polygon rewound for a query: exteriors clockwise,
 * holes counter-clockwise.
 */
export function clipRings(geometry: ClipGeometry): Ring[] {
  const polygons = geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;
  return polygons.flatMap((polygon) => polygon.map((ring, i) => orient(ring, i === 0)));
}

/**
 * Parse clip polygon JSON: a geometry, a Feature, or a FeatureCollection
 * whose features' rings are merged into one filter.
 */
export function parseClipPolygon(text: string, spatialReferenceId = 4326): PolygonFilter {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new Error('Clip polygon is not valid JSON', { cause: err });
  }
  const parsed = ClipFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error('Clip file must hold a Polygon or MultiPolygon geometry');
  }
  return polygonFilter(clipGeometries(parsed.data).flatMap(clipRings), spatialReferenceId);
}

export interface FilterOptions {
  bbox?: string;
  clip?: string;
  wkid?: number;
}

/**
 * The filter a command was given, or null for none. --bbox and --clip are
 * mutually exclusive.
 */
export async function resolveFilter(options: FilterOptions): Promise<GeometryFilter | null> {
  if (options.bbox && options.clip) {
    throw new Error('Use either --bbox or --clip, not both');
  }
  if (options.bbox) {
    return parseBbox(options.bbox, options.wkid);
  }
  if (options.clip) {
    return parseClipPolygon(await readFile(options.clip, 'utf-8'), options.wkid);
  }
  return null;
}
