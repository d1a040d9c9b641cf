/**
 * Output sinks. The pipeline hands a sink one complete, named collection;
 * sinks never see partial batches.
 */
import type { Feature, FeatureCollection } from 'geojson';
import { access, mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AttributeValue, LayerField } from '../core/attributes.js';
import type { FeatureRecord } from '../core/convert.js';
import type { ConvertedGeometry } from '../core/geometry.js';

// ============================================================================
// Contract
// ============================================================================

export interface LayerCollection {
  /** Stable name, [A-Za-z0-9_] only */
  layerName: string;
  spatialReferenceId: number;
  fields: readonly LayerField[];
  features: readonly FeatureRecord[];
}

export interface SinkWriteResult {
  layerName: string;
  /** Where the layer landed */
  location: string;
  mode: 'created' | 'replaced';
  featureCount: number;
}

export interface FeatureSink {
  write(collection: LayerCollection): Promise<SinkWriteResult>;
}

const LAYER_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

// ============================================================================
// GeoJSON
// ============================================================================

type LayerProperties = Record<string, AttributeValue>;
type LayerFeature = Feature<ConvertedGeometry, LayerProperties>;

/** RFC 7946 dropped `crs`; GIS readers still honour the old named form. */
export interface LayerFeatureCollection extends FeatureCollection<ConvertedGeometry, LayerProperties> {
  name: string;
  crs?: { type: 'name'; properties: { name: string } };
}

export function toFeatureCollection(collection: LayerCollection): LayerFeatureCollection {
  const features: LayerFeature[] = collection.features.map((record) => ({
    type: 'Feature',
    geometry: record.geometry,
    properties: record.attributes,
  }));

  const output: LayerFeatureCollection = {
    type: 'FeatureCollection',
    name: collection.layerName,
    features,
  };
  if (collection.spatialReferenceId !== 4326) {
    output.crs = {
      type: 'name',
      properties: { name: `urn:ogc:def:crs:EPSG::${collection.spatialReferenceId}` },
    };
  }
  return output;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * A directory of `{layerName}.geojson` files. Writing a layer replaces a
 * layer of the same name and leaves the others alone.
 */
export class GeoJsonDirectorySink implements FeatureSink {
  constructor(readonly directory: string) {}

  layerPath(layerName: string): string {
    return join(this.directory, `${layerName}.geojson`);
  }

  async listLayers(): Promise<string[]> {
    if (!(await exists(this.directory))) return [];
    const entries = await readdir(this.directory);
    return entries
      .filter((name) => name.endsWith('.geojson'))
      .map((name) => name.slice(0, -'.geojson'.length))
      .sort();
  }

  async write(collection: LayerCollection): Promise<SinkWriteResult> {
    if (!LAYER_NAME_PATTERN.test(collection.layerName)) {
      throw new Error(`Invalid layer name "${collection.layerName}"`);
    }

    await mkdir(this.directory, { recursive: true });
    const path = this.layerPath(collection.layerName);
    const mode = (await exists(path)) ? 'replaced' : 'created';

    // Write beside the target, then swap it in
    const tmpPath = `${path}.tmp`;
    try {
      await writeFile(tmpPath, JSON.stringify(toFeatureCollection(collection)));
      await rename(tmpPath, path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }

    return {
      layerName: collection.layerName,
      location: path,
      mode,
      featureCount: collection.features.length,
    };
  }
}
