/**
 * Esri JSON geometry -> GeoJSON geometry.
 *
 * Points stay points; every other kind becomes its multi-part GeoJSON form.
 * Empty payloads convert to `null`. Malformed coordinates throw
 * GeometryConversionError, which callers contain to the one feature.
 *
 * Polygon rings: Esri marks exterior rings clockwise and holes
 * counter-clockwise. Rings are classified by signed area, each hole goes to
 * the first exterior containing its first vertex, and rings are rewound to
 * RFC 7946 order (exterior counter-clockwise, holes clockwise). Rewinding is
 * a reversal, so no vertex is lost. When no ring is clockwise the service is
 * not following the convention and every ring is treated as an exterior.
 */
import type { MultiLineString, MultiPoint, MultiPolygon, Point } from 'geojson';
import { isClockwise, pointInRing, signedArea, type Position, type Ring } from '../geo/rings.js';
import { GeometryConversionError } from './errors.js';
import type { EsriGeometry } from './schemas.js';

// ============================================================================
// Types
// ============================================================================

export type GeometryKind = 'point' | 'multipoint' | 'polyline' | 'polygon';

export type ConvertedGeometry = Point | MultiPoint | MultiLineString | MultiPolygon;

const ESRI_GEOMETRY_KINDS: Record<string, GeometryKind> = {
  esriGeometryPoint: 'point',
  esriGeometryMultipoint: 'multipoint',
  esriGeometryPolyline: 'polyline',
  esriGeometryPolygon: 'polygon',
};

/**
 * Layers that do not declare a geometry type are read as polygons.
 */
export function geometryKindFromEsri(esriType: string | undefined): GeometryKind {
  return (esriType && ESRI_GEOMETRY_KINDS[esriType]) || 'polygon';
}

// ============================================================================
// Coordinates
// ============================================================================

function isEmptyOrdinate(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === 'NaN' ||
    (typeof value === 'number' && Number.isNaN(value))
  );
}

function toPosition(value: unknown, where: string): Position {
  if (!Array.isArray(value) || value.length < 2) {
    throw new GeometryConversionError(`Invalid coordinate at ${where}`);
  }
  const [x, y] = value;
  if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
    throw new GeometryConversionError(`Non-numeric coordinate at ${where}`);
  }
  return [x, y];
}

function toPositions(value: unknown, where: string): Position[] {
  if (!Array.isArray(value)) {
    throw new GeometryConversionError(`Expected a coordinate list at ${where}`);
  }
  return value.map((v, i) => toPosition(v, `${where}[${i}]`));
}

function closeRing(ring: Ring): Ring {
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] === last[0] && first[1] === last[1]) return ring;
  return [...ring, [first[0], first[1]]];
}

function orient(ring: Ring, counterClockwise: boolean): Ring {
  return signedArea(ring) > 0 === counterClockwise ? ring : [...ring].reverse();
}

// ============================================================================
// Per-kind Conversion
// ============================================================================

function convertPoint(geometry: EsriGeometry): Point | null {
  if (isEmptyOrdinate(geometry.x) || isEmptyOrdinate(geometry.y)) {
    return null;
  }
  return { type: 'Point', coordinates: toPosition([geometry.x, geometry.y], 'point') };
}

function convertMultipoint(geometry: EsriGeometry): MultiPoint | null {
  if (!geometry.points || geometry.points.length === 0) return null;
  return { type: 'MultiPoint', coordinates: toPositions(geometry.points, 'points') };
}

function convertPolyline(geometry: EsriGeometry): MultiLineString | null {
  if (!geometry.paths) return null;

  const lines: Position[][] = [];
  geometry.paths.forEach((path, i) => {
    const line = toPositions(path, `paths[${i}]`);
    if (line.length === 0) return;
    if (line.length < 2) {
      throw new GeometryConversionError(`Path ${i} has a single vertex`);
    }
    lines.push(line);
  });

  return lines.length ? { type: 'MultiLineString', coordinates: lines } : null;
}

/**
 * Group rings into polygons: exterior first, then its holes.
 */
export function assemblePolygons(rings: Ring[]): Ring[][] {
  const exteriors = rings.filter(isClockwise);
  if (exteriors.length === 0) {
    return rings.map((ring) => [orient(ring, true)]);
  }

  const polygons: Ring[][] = exteriors.map((ring) => [orient(ring, true)]);
  for (const ring of rings) {
    if (isClockwise(ring)) continue;
    const owner = polygons.find((polygon) => pointInRing(ring[0], polygon[0]));
    if (owner) {
      owner.push(orient(ring, false));
    } else {
      polygons.push([orient(ring, true)]);
    }
  }
  return polygons;
}

function convertPolygon(geometry: EsriGeometry): MultiPolygon | null {
  if (!geometry.rings) return null;

  const rings: Ring[] = [];
  geometry.rings.forEach((value, i) => {
    const ring = toPositions(value, `rings[${i}]`);
    if (ring.length === 0) return;
    const closed = closeRing(ring);
    if (closed.length < 4) {
      throw new GeometryConversionError(`Ring ${i} has fewer than three distinct vertices`);
    }
    rings.push(closed);
  });

  if (rings.length === 0) return null;
  return { type: 'MultiPolygon', coordinates: assemblePolygons(rings) };
}

// ============================================================================
// Public API
// ============================================================================

export function convertGeometry(
  kind: GeometryKind,
  geometry: EsriGeometry | null
): ConvertedGeometry | null {
  if (!geometry) return null;

  switch (kind) {
    case 'point':
      return convertPoint(geometry);
    case 'multipoint':
      return convertMultipoint(geometry);
    case 'polyline':
      return convertPolyline(geometry);
    case 'polygon':
      return convertPolygon(geometry);
  }
}

export function vertexCount(geometry: ConvertedGeometry): number {
  switch (geometry.type) {
    case 'Point':
      return 1;
    case 'MultiPoint':
      return geometry.coordinates.length;
    case 'MultiLineString':
      return geometry.coordinates.reduce((n, line) => n + line.length, 0);
    case 'MultiPolygon':
      return geometry.coordinates.reduce(
        (n, polygon) => n + polygon.reduce((m, ring) => m + ring.length, 0),
        0
      );
  }
}
