import type { SchemaObject, SchemaOrRef } from '../types';
import { isPlainObject, type SchemaRegistry } from './registry';

const MAX_SAMPLE_DEPTH = 6;

function sampleString(schema: SchemaObject): string {
  switch (schema.format) {
    case 'date-time':
      return '2024-01-01T00:00:00Z';
    case 'date':
      return '2024-01-01';
    case 'uuid':
      return '00000000-0000-0000-0000-000000000000';
    case 'email':
      return 'user@example.com';
    case 'uri':
      return 'https://example.com';
    default:
      return 'string';
  }
}

/**
 * Deterministic sample value for a schema, used where no example was declared.
 */
export function sampleFromSchema(schema: SchemaOrRef | undefined, registry: SchemaRegistry, depth = 0): unknown {
  const actual = registry.resolve(schema);
  if (!actual || depth > MAX_SAMPLE_DEPTH) {
    return null;
  }
  if (actual.example !== undefined) {
    return actual.example;
  }
  if (actual.default !== undefined) {
    return actual.default;
  }
  if (Array.isArray(actual.enum) && actual.enum.length > 0) {
    return actual.enum[0];
  }
  if (actual.allOf && actual.allOf.length > 0) {
    const merged: Record<string, unknown> = {};
    for (const part of actual.allOf) {
      const sample = sampleFromSchema(part, registry, depth + 1);
      if (isPlainObject(sample)) {
        Object.assign(merged, sample);
      }
    }
    for (const [key, value] of Object.entries(actual.properties ?? {})) {
      merged[key] = sampleFromSchema(value, registry, depth + 1);
    }
    return merged;
  }
  const variant = actual.oneOf?.[0] ?? actual.anyOf?.[0];
  if (variant) {
    return sampleFromSchema(variant, registry, depth + 1);
  }
  if (actual.type === 'array') {
    return [sampleFromSchema(actual.items, registry, depth + 1)];
  }
  if (actual.type === 'object' || actual.properties) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(actual.properties ?? {})) {
      result[key] = sampleFromSchema(value, registry, depth + 1);
    }
    return result;
  }
  switch (actual.type) {
    case 'string':
      return sampleString(actual);
    case 'integer':
    case 'number':
      return 0;
    case 'boolean':
      return false;
    default:
      return null;
  }
}

/** True for a non-empty array or an object with at least one key. */
export function hasValues(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return isPlainObject(value) && Object.keys(value).length > 0;
}

export function inferSchemaFromValue(value: unknown): SchemaObject {
  if (typeof value === 'string') {
    return { type: 'string' };
  }
  if (typeof value === 'boolean') {
    return { type: 'boolean' };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { type: 'integer', format: 'int32' } : { type: 'number', format: 'double' };
  }
  if (Array.isArray(value)) {
    return { type: 'array', items: value.length > 0 ? inferSchemaFromValue(value[0]) : {} };
  }
  if (isPlainObject(value)) {
    const properties: Record<string, SchemaObject> = {};
    for (const [key, entry] of Object.entries(value)) {
      properties[key] = inferSchemaFromValue(entry);
    }
    return { type: 'object', properties };
  }
  return {};
}
