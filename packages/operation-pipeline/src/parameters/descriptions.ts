import { applyNamingPolicy, type NamingPolicy } from '../naming';
import { getAllProperties, isPlainObject, isReferenceObject, type SchemaRegistry } from '../schema/registry';
import type { EndpointSummary, RequestBodyDescription } from '../types';
import { serializeExample } from '../examples/serialize';

export interface ParamDescription {
  description?: string;
  example?: unknown;
}

/** Case-insensitive map of request field name → description and example. */
export class ParamDescriptionIndex {
  private readonly entries = new Map<string, ParamDescription>();

  get(name: string): ParamDescription | undefined {
    return this.entries.get(name.toLowerCase());
  }

  getOrAdd(name: string): ParamDescription {
    const key = name.toLowerCase();
    let entry = this.entries.get(key);
    if (!entry) {
      entry = {};
      this.entries.set(key, entry);
    }
    return entry;
  }

  /** Looks the field up by its wire name first, then by its declared name. */
  lookup(...names: Array<string | undefined>): ParamDescription | undefined {
    for (const name of names) {
      if (name === undefined) {
        continue;
      }
      const entry = this.get(name);
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface DescriptionSources {
  body: RequestBodyDescription | null;
  summary?: EndpointSummary;
  registry: SchemaRegistry;
  namingPolicy: NamingPolicy;
}

/**
 * Merges three tiers in order, each overriding the previous only where it has
 * a value: content schema properties, summary params, then the first request
 * example when it is not a list.
 */
export function collectParamDescriptions(sources: DescriptionSources): ParamDescriptionIndex {
  const index = new ParamDescriptionIndex();

  if (sources.body) {
    for (const media of new Set(Object.values(sources.body.content))) {
      for (const prop of getAllProperties(media.schema, sources.registry)) {
        const actual = sources.registry.resolve(prop.schema);
        const entry = index.getOrAdd(prop.key);
        if (actual?.description !== undefined) {
          entry.description = actual.description;
        }
        if (actual?.example !== undefined) {
          entry.example = actual.example;
        }
      }
    }
  }

  for (const [name, description] of Object.entries(sources.summary?.params ?? {})) {
    index.getOrAdd(applyNamingPolicy(name, sources.namingPolicy)).description = description;
  }

  const firstExample = sources.summary?.requestExamples?.[0];
  if (firstExample && isPlainObject(firstExample.value)) {
    const serialized = serializeExample(firstExample.value, sources.namingPolicy);
    if (isPlainObject(serialized)) {
      for (const [key, value] of Object.entries(serialized)) {
        index.getOrAdd(key).example = value;
      }
    }
  }

  return index;
}

/** Writes merged descriptions and examples back onto the inline property schemas of the body. */
export function applyParamDescriptions(
  body: RequestBodyDescription | null,
  index: ParamDescriptionIndex,
  registry: SchemaRegistry
): void {
  if (!body || index.size === 0) {
    return;
  }
  for (const media of new Set(Object.values(body.content))) {
    for (const prop of getAllProperties(media.schema, registry)) {
      const entry = index.get(prop.key);
      if (!entry || isReferenceObject(prop.schema)) {
        continue;
      }
      if (entry.description !== undefined) {
        prop.schema.description = entry.description;
      }
      if (entry.example !== undefined) {
        prop.schema.example = entry.example;
      }
    }
  }
}
