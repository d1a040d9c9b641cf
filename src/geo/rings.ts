/**
 * Ring utilities for polygon assembly.
 *
 * Orientation uses the shoelace formula with y pointing up: a positive signed
 * area is counter-clockwise. Containment uses ray casting.
 */

export type Position = [number, number]; // [x, y]
export type Ring = Position[];

/** Any coordinate ring, including GeoJSON's looser `number[][]`. */
export type RingLike = readonly (readonly number[])[];

/**
 * Signed area (shoelace). Positive = counter-clockwise.
 */
export function signedArea(ring: RingLike): number {
  let sum = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    sum += (xj - xi) * (yj + yi);
  }
  return sum / 2;
}

export function isClockwise(ring: RingLike): boolean {
  return signedArea(ring) < 0;
}

/**
 * Ray casting: casts a ray to the right and counts edge crossings.
 * Odd number of crossings = inside.
 */
export function pointInRing(point: readonly number[], ring: RingLike): boolean {
  const [x, y] = point;
  let inside = false;

  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];

    const intersects =
      yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;

    if (intersects) {
      inside = !inside;
    }
  }

  return inside;
}

/**
 * Inside the outer ring and outside every hole.
 */
export function pointInPolygon(point: Position, polygon: Ring[]): boolean {
  if (polygon.length === 0 || !pointInRing(point, polygon[0])) {
    return false;
  }
  for (let i = 1; i < polygon.length; i++) {
    if (pointInRing(point, polygon[i])) {
      return false;
    }
  }
  return true;
}

export interface Bounds {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
}

export function ringsBounds(rings: readonly Ring[]): Bounds | null {
  let xmin = Infinity;
  let ymin = Infinity;
  let xmax = -Infinity;
  let ymax = -Infinity;

  for (const ring of rings) {
    for (const [x, y] of ring) {
      xmin = Math.min(xmin, x);
      xmax = Math.max(xmax, x);
      ymin = Math.min(ymin, y);
      ymax = Math.max(ymax, y);
    }
  }

  if (!Number.isFinite(xmin)) return null;
  return { xmin, ymin, xmax, ymax };
}
