import { describe, it, expect } from 'vitest';
import {
  batchParams,
  buildRangeWhere,
  countParams,
  envelopeFilter,
  geometryFilterParams,
  idsParams,
  polygonFilter,
  queryUrl,
} from '../query.js';

describe('geometryFilterParams', () => {
  it('returns nothing for no filter', () => {
    expect(geometryFilterParams(null)).toEqual({});
  });

  it('encodes an envelope as a comma list', () => {
    expect(geometryFilterParams(envelopeFilter(-81.1, 34.0, -81.0, 34.1))).toEqual({
      geometry: '-81.1,34,-81,34.1',
      geometryType: 'esriGeometryEnvelope',
      spatialRel: 'esriSpatialRelIntersects',
    });
  });

  it('adds inSR when the envelope has a spatial reference', () => {
    const params = geometryFilterParams(envelopeFilter(0, 0, 10, 10, 2273));
    expect(params.inSR).toBe('2273');
  });

  it('encodes a polygon as JSON with its spatial reference', () => {
    const ring: Array<[number, number]> = [
      [0, 0],
      [0, 1],
      [1, 1],
      [0, 0],
    ];
    expect(geometryFilterParams(polygonFilter([ring], 4326))).toEqual({
      geometry: '{"rings":[[[0,0],[0,1],[1,1],[0,0]]],"spatialReference":{"wkid":4326}}',
      geometryType: 'esriGeometryPolygon',
      spatialRel: 'esriSpatialRelIntersects',
      inSR: '4326',
    });
  });
});

describe('query builders', () => {
  const filter = envelopeFilter(1, 2, 3, 4);

  it('builds the layer query URL', () => {
    expect(queryUrl('https://gis.example.test/MapServer/', 5)).toBe(
      'https://gis.example.test/MapServer/5/query'
    );
  });

  it('builds count parameters with the filter attached', () => {
    expect(countParams(filter)).toEqual({
      where: '1=1',
      returnCountOnly: 'true',
      geometry: '1,2,3,4',
      geometryType: 'esriGeometryEnvelope',
      spatialRel: 'esriSpatialRelIntersects',
    });
  });

  it('builds count parameters without a spatial predicate', () => {
    expect(countParams(null)).toEqual({ where: '1=1', returnCountOnly: 'true' });
  });

  it('builds ID parameters', () => {
    expect(idsParams(filter).returnIdsOnly).toBe('true');
    expect(idsParams(filter).geometry).toBe('1,2,3,4');
  });

  it('builds an inclusive range predicate', () => {
    expect(buildRangeWhere('FID', 10, 509)).toBe('FID >= 10 AND FID <= 509');
  });

  it('builds batch parameters with optional outSR', () => {
    expect(batchParams('OBJECTID', 1, 500, filter, 4326)).toEqual({
      where: 'OBJECTID >= 1 AND OBJECTID <= 500',
      outFields: '*',
      returnGeometry: 'true',
      geometry: '1,2,3,4',
      geometryType: 'esriGeometryEnvelope',
      spatialRel: 'esriSpatialRelIntersects',
      outSR: '4326',
    });
    expect(batchParams('OBJECTID', 1, 500, filter)).not.toHaveProperty('outSR');
  });
});
