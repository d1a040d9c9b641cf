/**
 * Downloaded Esri features -> converted records with GeoJSON geometry and
 * typed attributes.
 */
import { convertAttributes, type AttributeValue, type LayerField } from './attributes.js';
import { GeometryConversionError } from './errors.js';
import { convertGeometry, type ConvertedGeometry, type GeometryKind } from './geometry.js';
import type { EsriFeature } from './schemas.js';

export interface FeatureRecord {
  geometry: ConvertedGeometry;
  attributes: Record<string, AttributeValue>;
}

export interface ConvertOptions {
  geometryKind: GeometryKind;
  fields: readonly LayerField[];
}

export interface ConvertResult {
  records: FeatureRecord[];
  /** Features with no geometry, or geometry that could not be converted */
  skipped: number;
}

/**
 * Convert a batch of features. A feature whose geometry is empty or
 * malformed is skipped; the rest of the batch still converts.
 */
export function convertFeatures(
  features: readonly EsriFeature[],
  options: ConvertOptions
): ConvertResult {
  const records: FeatureRecord[] = [];
  let skipped = 0;
  let malformed = 0;

  for (const feature of features) {
    let geometry: ConvertedGeometry | null;
    try {
      geometry = convertGeometry(options.geometryKind, feature.geometry);
    } catch (err) {
      if (!(err instanceof GeometryConversionError)) throw err;
      malformed++;
      geometry = null;
    }

    if (!geometry) {
      skipped++;
      continue;
    }

    records.push({
      geometry,
      attributes: convertAttributes(options.fields, feature.attributes),
    });
  }

  if (skipped > 0) {
    console.warn(
      `Skipped ${skipped} of ${features.length} features (${malformed} with malformed geometry)`
    );
  }

  return { records, skipped };
}
