import type { ReferenceObject, SchemaObject, SchemaOrRef } from '../types';

const REF_PREFIXES = ['#/components/schemas/', '#/definitions/'];

export const isReferenceObject = (schema: SchemaOrRef): schema is ReferenceObject => '$ref' in schema;

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const schemaRef = (name: string): ReferenceObject => ({
  $ref: `#/components/schemas/${name}`
});

export function refName(ref: string): string | undefined {
  for (const prefix of REF_PREFIXES) {
    if (ref.startsWith(prefix)) {
      return decodeURIComponent(ref.slice(prefix.length));
    }
  }
  return undefined;
}

/**
 * Named component schemas shared by every operation of a document. Entries are
 * mutated by key only; a schema object handed out by `get` stays the live entry.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, SchemaObject>();

  constructor(initial: Record<string, SchemaObject> = {}) {
    for (const [name, schema] of Object.entries(initial)) {
      this.schemas.set(name, schema);
    }
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  get(name: string): SchemaObject | undefined {
    return this.schemas.get(name);
  }

  set(name: string, schema: SchemaObject): void {
    this.schemas.set(name, schema);
  }

  names(): string[] {
    return Array.from(this.schemas.keys());
  }

  /**
   * Removes a component and drops `allOf` edges other components hold to it.
   */
  remove(name: string): boolean {
    if (!this.schemas.delete(name)) {
      return false;
    }
    for (const schema of this.schemas.values()) {
      if (!schema.allOf) {
        continue;
      }
      const remaining = schema.allOf.filter((entry) => !isReferenceObject(entry) || refName(entry.$ref) !== name);
      if (remaining.length !== schema.allOf.length) {
        schema.allOf = remaining;
      }
    }
    return true;
  }

  /** Follows `$ref` chains to the actual schema; undefined for dangling or cyclic refs. */
  resolve(schema: SchemaOrRef | undefined): SchemaObject | undefined {
    const seen = new Set<string>();
    let current = schema;
    while (current && isReferenceObject(current)) {
      const name = refName(current.$ref);
      if (!name || seen.has(name)) {
        return undefined;
      }
      seen.add(name);
      current = this.schemas.get(name);
    }
    return current && !isReferenceObject(current) ? current : undefined;
  }

  toJSON(): Record<string, SchemaObject> {
    return Object.fromEntries(this.schemas.entries());
  }
}

export interface SchemaProperty {
  key: string;
  schema: SchemaOrRef;
  owner: SchemaObject;
}

/** Own properties followed by every property inherited through `allOf`. */
export function getAllProperties(schema: SchemaOrRef | undefined, registry: SchemaRegistry): SchemaProperty[] {
  const result: SchemaProperty[] = [];
  const visited = new Set<SchemaObject>();

  const visit = (node: SchemaOrRef | undefined) => {
    const actual = registry.resolve(node);
    if (!actual || visited.has(actual)) {
      return;
    }
    visited.add(actual);
    for (const [key, value] of Object.entries(actual.properties ?? {})) {
      result.push({ key, schema: value, owner: actual });
    }
    for (const child of actual.allOf ?? []) {
      visit(child);
    }
  };

  visit(schema);
  return result;
}

export function cloneSchema<T extends SchemaOrRef>(schema: T): T {
  return structuredClone(schema);
}
