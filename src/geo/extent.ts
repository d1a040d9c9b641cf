/**
 * Query extents: bounds of a geometry filter, reprojection to WGS84, and
 * area in square degrees / approximate square miles.
 */
import proj4 from 'proj4';
import type { GeometryFilter } from '../core/query.js';
import { ringsBounds, type Bounds, type Position } from './rings.js';

export type ExtentRect = Bounds;

// ============================================================================
// Projections
// ============================================================================

const PROJECTIONS: Record<string, string> = {
  // WGS84
  'EPSG:4326': '+proj=longlat +datum=WGS84 +no_defs',
  // NAD83 geographic
  'EPSG:4269': '+proj=longlat +datum=NAD83 +no_defs',
  // Web Mercator, plus its legacy Esri codes
  'EPSG:3857':
    '+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +nadgrids=@null +no_defs',
  'EPSG:102100':
    '+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +nadgrids=@null +no_defs',
  'EPSG:102113':
    '+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +nadgrids=@null +no_defs',
  // NAD83 / South Carolina (ft)
  'EPSG:2273':
    '+proj=lcc +lat_1=34.83333333333334 +lat_2=32.5 +lat_0=31.83333333333333 +lon_0=-81 +x_0=609600 +y_0=0 +ellps=GRS80 +datum=NAD83 +to_meter=0.3048 +no_defs',
  // NAD83 California Zone 3 (ftUS)
  'EPSG:2227':
    '+proj=lcc +lat_1=38.43333333333333 +lat_2=37.06666666666667 +lat_0=36.5 +lon_0=-120.5 +x_0=2000000 +y_0=500000.0000000002 +ellps=GRS80 +datum=NAD83 +to_meter=0.3048006096012192 +no_defs',
  // NAD83 UTM zones 10N and 17N
  'EPSG:26910': '+proj=utm +zone=10 +datum=NAD83 +units=m +no_defs',
  'EPSG:26917': '+proj=utm +zone=17 +datum=NAD83 +units=m +no_defs',
  // British National Grid
  'EPSG:27700':
    '+proj=tmerc +lat_0=49 +lon_0=-2 +k=0.9996012717 +x_0=400000 +y_0=-100000 +ellps=airy +datum=OSGB36 +units=m +no_defs',
};

/**
 * Register a projection so extents in that WKID can be measured.
 */
export function registerProjection(wkid: number, def: string): void {
  const code = `EPSG:${wkid}`;
  PROJECTIONS[code] = def;
  proj4.defs(code, def);
}

export function isKnownProjection(wkid: number): boolean {
  return `EPSG:${wkid}` in PROJECTIONS;
}

function isGeographic(def: string): boolean {
  return def.includes('+proj=longlat');
}

// Points sampled per edge when reprojecting a rectangle; edges curve
// under conic projections so corners alone undershoot.
const EDGE_SAMPLES = 8;

/**
 * Bounding box of `bounds` in WGS84 degrees, or null when the WKID is not
 * registered.
 */
export function toWgs84Extent(bounds: Bounds, wkid: number | undefined): ExtentRect | null {
  if (wkid === undefined || wkid === 4326) return bounds;

  const code = `EPSG:${wkid}`;
  const def = PROJECTIONS[code];
  if (!def) return null;
  if (isGeographic(def)) return bounds;

  proj4.defs(code, def);
  const { xmin, ymin, xmax, ymax } = bounds;
  const samples: Position[] = [];
  for (let i = 0; i <= EDGE_SAMPLES; i++) {
    const t = i / EDGE_SAMPLES;
    const x = xmin + (xmax - xmin) * t;
    const y = ymin + (ymax - ymin) * t;
    samples.push([x, ymin], [x, ymax], [xmin, y], [xmax, y]);
  }

  const projected = samples.map((p): Position => {
    const [lng, lat] = proj4(code, 'EPSG:4326', p);
    return [lng, lat];
  });
  if (projected.some(([lng, lat]) => !Number.isFinite(lng) || !Number.isFinite(lat))) {
    return null;
  }
  return ringsBounds([projected]);
}

// ============================================================================
// Filters
// ============================================================================

export function filterBounds(filter: GeometryFilter): Bounds | null {
  if (filter.kind === 'envelope') {
    return {
      xmin: Math.min(filter.xmin, filter.xmax),
      ymin: Math.min(filter.ymin, filter.ymax),
      xmax: Math.max(filter.xmin, filter.xmax),
      ymax: Math.max(filter.ymin, filter.ymax),
    };
  }
  return ringsBounds(filter.rings);
}

/**
 * WGS84 extent of a filter, when it can be worked out.
 */
export function filterExtentWgs84(filter: GeometryFilter | null): ExtentRect | null {
  if (!filter) return null;
  const bounds = filterBounds(filter);
  if (!bounds) return null;
  return toWgs84Extent(bounds, filter.spatialReferenceId);
}

// ============================================================================
// Area
// ============================================================================

const MILES_PER_DEGREE = 69.0;

export function extentWidth(extent: ExtentRect): number {
  return Math.abs(extent.xmax - extent.xmin);
}

export function extentHeight(extent: ExtentRect): number {
  return Math.abs(extent.ymax - extent.ymin);
}

export function extentAreaSqDeg(extent: ExtentRect): number {
  return extentWidth(extent) * extentHeight(extent);
}

/**
 * Rough square miles: a degree of longitude shrinks with cos(latitude),
 * taken at the extent's middle.
 */
export function extentAreaSqMiles(extent: ExtentRect): number {
  const midLat = ((extent.ymin + extent.ymax) / 2) * (Math.PI / 180);
  const widthMiles = extentWidth(extent) * MILES_PER_DEGREE * Math.cos(midLat);
  const heightMiles = extentHeight(extent) * MILES_PER_DEGREE;
  return Math.abs(widthMiles * heightMiles);
}
