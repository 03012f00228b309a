import { applyNamingPolicy, type NamingPolicy } from '../naming';
import type { RequestBodyDescription, SchemaObject } from '../types';
import { getAllProperties, type SchemaRegistry } from './registry';

export interface PruneContext {
  registry: SchemaRegistry;
  namingPolicy: NamingPolicy;
}

function removeSchemaProperty(
  schema: SchemaObject,
  key: string,
  registry: SchemaRegistry,
  visited: Set<SchemaObject>
): void {
  if (visited.has(schema)) {
    return;
  }
  visited.add(schema);

  if (schema.properties && key in schema.properties) {
    delete schema.properties[key];
  }
  if (schema.required) {
    const required = schema.required.filter((entry) => entry !== key);
    if (required.length === 0) {
      delete schema.required;
    } else if (required.length !== schema.required.length) {
      schema.required = required;
    }
  }
  for (const child of schema.allOf ?? []) {
    const actual = registry.resolve(child);
    if (actual) {
      removeSchemaProperty(actual, key, registry, visited);
    }
  }
}

/**
 * Removes a request field from every content schema of the body. The field
 * name goes through the naming policy and is matched case-insensitively against
 * the schema's own and inherited property keys. Returns the wire name so the
 * caller can collect it for example projection.
 */
export function pruneBodyField(body: RequestBodyDescription | null, fieldName: string, context: PruneContext): string {
  const wireName = applyNamingPolicy(fieldName, context.namingPolicy);
  if (!body) {
    return wireName;
  }

  const lowered = wireName.toLowerCase();
  for (const media of new Set(Object.values(body.content))) {
    const actual = context.registry.resolve(media.schema);
    if (!actual) {
      continue;
    }
    const match = getAllProperties(actual, context.registry).find((prop) => prop.key.toLowerCase() === lowered);
    if (match) {
      removeSchemaProperty(actual, match.key, context.registry, new Set());
    }
  }
  return wireName;
}

/** Deletes every object component left without properties and returns the removed names. */
export function removeEmptyComponentSchemas(registry: SchemaRegistry): string[] {
  const removed: string[] = [];
  for (const name of registry.names()) {
    const schema = registry.get(name);
    if (!schema || schema.type !== 'object') {
      continue;
    }
    if (schema.additionalProperties || schema.oneOf?.length || schema.anyOf?.length) {
      continue;
    }
    if (getAllProperties(schema, registry).length === 0 && registry.remove(name)) {
      removed.push(name);
    }
  }
  return removed;
}
