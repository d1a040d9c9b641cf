export * from './core/attributes.js';
export * from './core/config.js';
export * from './core/convert.js';
export * from './core/discovery.js';
export * from './core/downloader.js';
export * from './core/errors.js';
export * from './core/geometry.js';
export * from './core/health-cache.js';
export * from './core/pipeline.js';
export * from './core/query.js';
export * from './core/safety.js';
export * from './core/transport.js';
export * from './geo/extent.js';
export * from './geo/rings.js';
export * from './sinks/geojson-sink.js';
export type {
  EsriFeature,
  EsriGeometry,
  ServiceExtent,
  ServiceField,
  SpatialReference,
} from './core/schemas.js';
