/**
 * Response shapes for the ArcGIS REST endpoints we call.
 *
 * Every body is validated here, once, with optional keys defaulted, so the
 * rest of the code never probes for key presence.
 */
import { z } from 'zod';

// ============================================================================
// Shared
// ============================================================================

export const SpatialReferenceSchema = z
  .object({
    wkid: z.number().int().optional(),
    latestWkid: z.number().int().optional(),
    wkt: z.string().optional(),
  })
  .passthrough();

export type SpatialReference = z.infer<typeof SpatialReferenceSchema>;

export const ExtentSchema = z.object({
  xmin: z.number(),
  ymin: z.number(),
  xmax: z.number(),
  ymax: z.number(),
  spatialReference: SpatialReferenceSchema.optional(),
});

export type ServiceExtent = z.infer<typeof ExtentSchema>;

/** In-band error body: HTTP 200 with `{ error: { code, message } }` */
export const ArcGisErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().default('Unknown server error'),
    details: z.array(z.string()).default([]),
  }),
});

// ============================================================================
// Discovery
// ============================================================================

export const DirectoryResponseSchema = z.object({
  folders: z.array(z.string()).default([]),
  services: z
    .array(
      z.object({
        name: z.string().default(''),
        type: z.string().default(''),
      })
    )
    .default([]),
});

const ServiceLayerEntrySchema = z.object({
  id: z.number().int(),
  name: z.string().optional(),
  type: z.string().default('Unknown'),
  geometryType: z.string().optional(),
  parentLayerId: z.number().int().default(-1),
  subLayerIds: z.array(z.number().int()).nullable().default(null),
  minScale: z.number().default(0),
  maxScale: z.number().default(0),
  defaultVisibility: z.boolean().default(true),
});

export const ServiceResponseSchema = z.object({
  layers: z.array(ServiceLayerEntrySchema).default([]),
  tables: z.array(z.object({ id: z.number().int(), name: z.string().optional() })).default([]),
  spatialReference: SpatialReferenceSchema.optional(),
});

export type ServiceResponse = z.infer<typeof ServiceResponseSchema>;

export const FieldSchema = z.object({
  name: z.string(),
  type: z.string().default(''),
  alias: z.string().optional(),
  length: z.number().int().optional(),
});

export type ServiceField = z.infer<typeof FieldSchema>;

export const LayerResponseSchema = z.object({
  id: z.number().int().optional(),
  name: z.string().optional(),
  type: z.string().optional(),
  geometryType: z.string().optional(),
  objectIdField: z.string().optional(),
  fields: z.array(FieldSchema).nullable().default([]),
  // Some layers report NaN extents; treat those as absent
  extent: ExtentSchema.optional().catch(undefined),
  spatialReference: SpatialReferenceSchema.optional(),
  maxRecordCount: z.number().int().optional(),
  minScale: z.number().default(0),
  maxScale: z.number().default(0),
});

export type LayerResponse = z.infer<typeof LayerResponseSchema>;

// ============================================================================
// Query
// ============================================================================

export const CountResponseSchema = z.object({
  count: z.number().int().nonnegative(),
});

export const IdsResponseSchema = z.object({
  objectIdFieldName: z.string().default('OBJECTID'),
  objectIds: z.array(z.number().int()).nullable().default([]),
});

// Coordinates stay loose here; the geometry converter checks them per feature
// so one bad vertex drops one feature, not the batch.
export const EsriGeometrySchema = z
  .object({
    x: z.unknown().optional(),
    y: z.unknown().optional(),
    points: z.array(z.unknown()).optional(),
    paths: z.array(z.unknown()).optional(),
    rings: z.array(z.unknown()).optional(),
    spatialReference: SpatialReferenceSchema.optional(),
  })
  .passthrough();

export type EsriGeometry = z.infer<typeof EsriGeometrySchema>;

export const EsriFeatureSchema = z.object({
  geometry: EsriGeometrySchema.nullable().default(null),
  attributes: z
    .record(z.unknown())
    .nullish()
    .transform((attrs) => attrs ?? {}),
});

export type EsriFeature = z.infer<typeof EsriFeatureSchema>;

export const QueryResponseSchema = z.object({
  features: z.array(EsriFeatureSchema).default([]),
  spatialReference: SpatialReferenceSchema.optional(),
  exceededTransferLimit: z.boolean().default(false),
});
