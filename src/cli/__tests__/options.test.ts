/**
 * Unit tests for command-line option parsing.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { geometryFilterParams } from '../../core/query.js';
import { isClockwise } from '../../geo/rings.js';
import {
  parseBbox,
  parseClipPolygon,
  parsePositiveInteger,
  resolveCliConfig,
  resolveFilter,
} from '../lib/options.js';

// Counter-clockwise square with a clockwise hole, as GeoJSON writes them
const SQUARE_WITH_HOLE = {
  type: 'Polygon',
  coordinates: [
    [
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
      [0, 0],
    ],
    [
      [2, 2],
      [2, 4],
      [4, 4],
      [4, 2],
      [2, 2],
    ],
  ],
};

describe('parsePositiveInteger', () => {
  it('parses whole numbers above zero', () => {
    expect(parsePositiveInteger('250')).toBe(250);
  });

  it('rejects zero and fractions', () => {
    expect(() => parsePositiveInteger('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInteger('1.5')).toThrow('"1.5" is not an integer.');
  });
});

describe('parseBbox', () => {
  it('builds an envelope filter', () => {
    expect(parseBbox('-81.1, 34.0, -81.0, 34.05', 4326)).toEqual({
      kind: 'envelope',
      xmin: -81.1,
      ymin: 34,
      xmax: -81,
      ymax: 34.05,
      spatialReferenceId: 4326,
    });
  });

  it('defaults to WGS84 so the server is told the input spatial reference', () => {
    const filter = parseBbox('-81.1,34,-81,34.05');

    expect(filter.spatialReferenceId).toBe(4326);
    expect(geometryFilterParams(filter)).toEqual({
      geometry: '-81.1,34,-81,34.05',
      geometryType: 'esriGeometryEnvelope',
      spatialRel: 'esriSpatialRelIntersects',
      inSR: '4326',
    });
  });

  it('rejects the wrong number of values', () => {
    expect(() => parseBbox('1,2,3')).toThrow('Bounding box must be "xmin,ymin,xmax,ymax", got "1,2,3".');
  });

  it('rejects non-numeric values', () => {
    expect(() => parseBbox('1,2,x,4')).toThrow('Bounding box has a non-numeric value: "1,2,x,4".');
  });

  it('rejects inverted corners', () => {
    expect(() => parseBbox('5,2,3,4')).toThrow('Bounding box min must be below max: "5,2,3,4".');
  });
});

describe('parseClipPolygon', () => {
  it('rewinds exteriors clockwise and holes counter-clockwise', () => {
    const filter = parseClipPolygon(JSON.stringify(SQUARE_WITH_HOLE));

    expect(filter.kind).toBe('polygon');
    expect(filter.spatialReferenceId).toBe(4326);
    expect(filter.rings).toHaveLength(2);
    expect(isClockwise(filter.rings[0])).toBe(true);
    expect(isClockwise(filter.rings[1])).toBe(false);
    expect(filter.rings[0][1]).toEqual([0, 10]);
  });

  it('merges the rings of every feature in a FeatureCollection', () => {
    const filter = parseClipPolygon(
      JSON.stringify({
        type: 'FeatureCollection',
        features: [
          { type: 'Feature', properties: {}, geometry: SQUARE_WITH_HOLE },
          {
            type: 'Feature',
            properties: {},
            geometry: { type: 'Polygon', coordinates: [SQUARE_WITH_HOLE.coordinates[0]] },
          },
        ],
      }),
      2273
    );

    expect(filter.rings).toHaveLength(3);
    expect(filter.rings.map(isClockwise)).toEqual([true, false, true]);
    expect(filter.spatialReferenceId).toBe(2273);
  });

  it('flattens the rings of a MultiPolygon', () => {
    const filter = parseClipPolygon(
      JSON.stringify({
        type: 'MultiPolygon',
        coordinates: [SQUARE_WITH_HOLE.coordinates, [SQUARE_WITH_HOLE.coordinates[0]]],
      })
    );

    expect(filter.rings).toHaveLength(3);
    expect(filter.rings.map(isClockwise)).toEqual([true, false, true]);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseClipPolygon('{not json')).toThrow('Clip polygon is not valid JSON');
  });

  it('rejects non-polygon geometry', () => {
    expect(() => parseClipPolygon('{"type":"Point","coordinates":[0,0]}')).toThrow(
      'Clip file must hold a Polygon or MultiPolygon geometry'
    );
  });
});

describe('resolveFilter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'layerpull-clip-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('sends inSR=4326 for --bbox without --wkid', async () => {
    const filter = await resolveFilter({ bbox: '-81.1,34,-81,34.05' });
    expect(geometryFilterParams(filter).inSR).toBe('4326');
  });

  it('returns null when no filter flag is given', async () => {
    expect(await resolveFilter({})).toBeNull();
  });

  it('refuses --bbox together with --clip', async () => {
    await expect(resolveFilter({ bbox: '0,0,1,1', clip: 'clip.geojson' })).rejects.toThrow(
      'Use either --bbox or --clip, not both'
    );
  });

  it('reads a clip polygon from disk', async () => {
    const path = join(dir, 'clip.geojson');
    await writeFile(path, JSON.stringify(SQUARE_WITH_HOLE));

    const filter = await resolveFilter({ clip: path, wkid: 3857 });

    expect(filter?.kind).toBe('polygon');
    expect(filter?.spatialReferenceId).toBe(3857);
  });
});

describe('resolveCliConfig', () => {
  it('layers flags over environment over defaults', () => {
    const config = resolveCliConfig(
      { batchSize: 250 },
      { LAYERPULL_BATCH_SIZE: '1000', LAYERPULL_TIMEOUT_MS: '5000', LAYERPULL_COUNT_TIMEOUT_MS: '2000' }
    );

    expect(config.download.batchSize).toBe(250);
    expect(config.download.timeoutMs).toBe(5_000);
    expect(config.download.verifyTls).toBe(false);
    expect(config.safety.countTimeoutMs).toBe(2_000);
  });

  it('turns TLS verification on from the flag', () => {
    expect(resolveCliConfig({ verifyTls: true }, {}).download.verifyTls).toBe(true);
  });
});
