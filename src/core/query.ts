/**
 * Query parameter encoding for layer `/query` requests.
 */
import type { Ring } from '../geo/rings.js';
import { stripTrailingSlash, type QueryParams } from './transport.js';

// ============================================================================
// Geometry Filter
// ============================================================================

export interface EnvelopeFilter {
  kind: 'envelope';
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
  /** Sent as inSR when present */
  spatialReferenceId?: number;
}

export interface PolygonFilter {
  kind: 'polygon';
  rings: Ring[];
  spatialReferenceId: number;
}

/**
 * Spatial predicate for a query. `null` means no spatial predicate at all,
 * which the safety gate refuses for bulk downloads.
 */
export type GeometryFilter = EnvelopeFilter | PolygonFilter;

export function envelopeFilter(
  xmin: number,
  ymin: number,
  xmax: number,
  ymax: number,
  spatialReferenceId?: number
): EnvelopeFilter {
  return { kind: 'envelope', xmin, ymin, xmax, ymax, spatialReferenceId };
}

export function polygonFilter(rings: Ring[], spatialReferenceId: number): PolygonFilter {
  return { kind: 'polygon', rings, spatialReferenceId };
}

/**
 * The geometry / geometryType / spatialRel / inSR parameters for a filter.
 */
export function geometryFilterParams(filter: GeometryFilter | null): QueryParams {
  if (!filter) return {};

  const params: QueryParams =
    filter.kind === 'envelope'
      ? {
          geometry: `${filter.xmin},${filter.ymin},${filter.xmax},${filter.ymax}`,
          geometryType: 'esriGeometryEnvelope',
        }
      : {
          geometry: JSON.stringify({
            rings: filter.rings,
            spatialReference: { wkid: filter.spatialReferenceId },
          }),
          geometryType: 'esriGeometryPolygon',
        };

  params.spatialRel = 'esriSpatialRelIntersects';
  if (filter.spatialReferenceId !== undefined) {
    params.inSR = String(filter.spatialReferenceId);
  }
  return params;
}

// ============================================================================
// Query Builders
// ============================================================================

export function layerUrl(serviceUrl: string, layerId: number): string {
  return `${stripTrailingSlash(serviceUrl)}/${layerId}`;
}

export function queryUrl(serviceUrl: string, layerId: number): string {
  return `${layerUrl(serviceUrl, layerId)}/query`;
}

export function countParams(filter: GeometryFilter | null): QueryParams {
  return {
    where: '1=1',
    returnCountOnly: 'true',
    ...geometryFilterParams(filter),
  };
}

export function idsParams(filter: GeometryFilter | null): QueryParams {
  return {
    where: '1=1',
    returnIdsOnly: 'true',
    ...geometryFilterParams(filter),
  };
}

/**
 * Range predicate over one batch. Cheaper for the server to plan than an ID
 * list, and gaps inside the range are harmless.
 */
export function buildRangeWhere(idField: string, min: number, max: number): string {
  return `${idField} >= ${min} AND ${idField} <= ${max}`;
}

export function batchParams(
  idField: string,
  min: number,
  max: number,
  filter: GeometryFilter | null,
  outSpatialReference?: number
): QueryParams {
  const params: QueryParams = {
    where: buildRangeWhere(idField, min, max),
    outFields: '*',
    returnGeometry: 'true',
    ...geometryFilterParams(filter),
  };
  if (outSpatialReference !== undefined) {
    params.outSR = String(outSpatialReference);
  }
  return params;
}
