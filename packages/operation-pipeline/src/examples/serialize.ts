import { applyNamingPolicy, type NamingPolicy } from '../naming';
import { isPlainObject } from '../schema/registry';

/**
 * Serializes a user-supplied example the way the wire format would: object keys
 * go through the naming policy at every depth, values are copied.
 */
export function serializeExample(value: unknown, namingPolicy: NamingPolicy): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => serializeExample(entry, namingPolicy));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) {
        continue;
      }
      result[applyNamingPolicy(key, namingPolicy)] = serializeExample(entry, namingPolicy);
    }
    return result;
  }
  return value;
}
