/**
 * Schema-driven attribute conversion.
 *
 * Each declared field is integer, real, or text. A value that does not fit
 * its field is kept as its string form rather than dropped.
 */
import type { ServiceField } from './schemas.js';

export type FieldKind = 'integer' | 'real' | 'text';

export type AttributeValue = number | string | null;

export interface LayerField {
  name: string;
  alias: string;
  kind: FieldKind;
  /** Text width; 254 when the server does not say */
  length: number | null;
  /** Server-declared type, e.g. esriFieldTypeDouble */
  sourceType: string;
}

const FIELD_KINDS: Record<string, FieldKind> = {
  esriFieldTypeOID: 'integer',
  esriFieldTypeInteger: 'integer',
  esriFieldTypeSmallInteger: 'integer',
  esriFieldTypeBigInteger: 'integer',
  esriFieldTypeDouble: 'real',
  esriFieldTypeSingle: 'real',
  esriFieldTypeString: 'text',
  esriFieldTypeDate: 'text',
  esriFieldTypeDateOnly: 'text',
  esriFieldTypeTimeOnly: 'text',
  esriFieldTypeTimestampOffset: 'text',
  esriFieldTypeGlobalID: 'text',
  esriFieldTypeGUID: 'text',
};

const DEFAULT_TEXT_LENGTH = 254;
const MAX_EPOCH_MS = 8.64e15;

export function fieldKindFromEsri(esriType: string): FieldKind {
  return FIELD_KINDS[esriType] ?? 'text';
}

export function toLayerField(field: ServiceField): LayerField {
  const kind = fieldKindFromEsri(field.type);
  return {
    name: field.name,
    alias: field.alias ?? field.name,
    kind,
    length: kind === 'text' ? field.length || DEFAULT_TEXT_LENGTH : null,
    sourceType: field.type,
  };
}

// ============================================================================
// Coercion
// ============================================================================

const INTEGER_PATTERN = /^[-+]?\d+$/;
const REAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function toInteger(value: unknown): AttributeValue {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return asText(value);
}

function toReal(value: unknown): AttributeValue {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && REAL_PATTERN.test(value.trim())) {
    return parseFloat(value.trim());
  }
  return asText(value);
}

function isDateField(field: LayerField): boolean {
  return field.sourceType === 'esriFieldTypeDate';
}

/**
 * Convert one raw attribute value to its field's kind.
 */
export function coerceAttribute(field: LayerField, value: unknown): AttributeValue {
  if (value === null || value === undefined) return null;

  switch (field.kind) {
    case 'integer':
      return toInteger(value);
    case 'real':
      return toReal(value);
    case 'text':
      // Date fields arrive as epoch milliseconds
      if (isDateField(field) && typeof value === 'number' && Math.abs(value) <= MAX_EPOCH_MS) {
        return new Date(value).toISOString();
      }
      return asText(value);
  }
}

/**
 * Attributes for the declared fields only. A layer that declares no fields
 * passes its raw attributes through as text.
 */
export function convertAttributes(
  fields: readonly LayerField[],
  raw: Record<string, unknown>
): Record<string, AttributeValue> {
  const out: Record<string, AttributeValue> = {};

  if (fields.length === 0) {
    for (const [name, value] of Object.entries(raw)) {
      out[name] = value === null || value === undefined ? null : asText(value);
    }
    return out;
  }

  for (const field of fields) {
    out[field.name] = coerceAttribute(field, raw[field.name]);
  }
  return out;
}
