import { applyNamingPolicy } from '../naming';
import type { DocumentPolicy } from '../policy';
import { isPlainObject, type SchemaRegistry } from '../schema/registry';
import type { ExampleObject, OperationDescription, RequestExample, RequestField } from '../types';
import { serializeExample } from './serialize';

/**
 * Every member of a group sharing a label gets ` 1`, ` 2`, … appended in
 * encounter order, skipping any suffix another example already carries.
 * Unique labels are kept. The input is left untouched.
 */
export function disambiguateLabels(examples: ReadonlyArray<RequestExample>): RequestExample[] {
  const totals = new Map<string, number>();
  for (const example of examples) {
    totals.set(example.label, (totals.get(example.label) ?? 0) + 1);
  }
  const taken = new Set(examples.map((example) => example.label).filter((label) => (totals.get(label) ?? 0) < 2));
  const seen = new Map<string, number>();
  return examples.map((example) => {
    if ((totals.get(example.label) ?? 0) < 2) {
      return { ...example };
    }
    let index = seen.get(example.label) ?? 0;
    let label: string;
    do {
      index += 1;
      label = `${example.label} ${index}`;
    } while (taken.has(label));
    seen.set(example.label, index);
    taken.add(label);
    return { ...example, label };
  });
}

function matchesField(key: string, field: RequestField, policy: DocumentPolicy): boolean {
  return key === field.name || key === applyNamingPolicy(field.name, policy.namingPolicy) || key === field.bindFrom;
}

/** Descends into the overriding field's value when the body was replaced by a single field. */
function selectOverrideValue(value: unknown, overrideField: RequestField, policy: DocumentPolicy): unknown {
  if (!isPlainObject(value)) {
    return value;
  }
  const entry = Object.entries(value).find(([key]) => matchesField(key, overrideField, policy));
  return entry && entry[1] !== undefined && entry[1] !== null ? entry[1] : value;
}

export interface ExampleProjection {
  removed: ReadonlyArray<string>;
  /** Body and form override fields, in the order they replaced the body. */
  overrideFields?: ReadonlyArray<RequestField>;
  policy: DocumentPolicy;
}

/**
 * Serializes a request example against the final body: lists as they are,
 * field maps without any key that was pruned from the body schema.
 */
export function projectExample(value: unknown, projection: ExampleProjection): unknown {
  const input = (projection.overrideFields ?? []).reduce<unknown>(
    (current, field) => selectOverrideValue(current, field, projection.policy),
    value
  );
  const serialized = serializeExample(input, projection.policy.namingPolicy);
  if (!isPlainObject(serialized)) {
    return serialized;
  }
  const removed = new Set(projection.removed.map((name) => name.toLowerCase()));
  return Object.fromEntries(Object.entries(serialized).filter(([key]) => !removed.has(key.toLowerCase())));
}

/**
 * Attaches the summary's request examples to the first media type of the body.
 * One example becomes the body schema's example (the component itself for a
 * `$ref` body); several become named examples on the media type.
 */
export function attachRequestExamples(
  operation: OperationDescription,
  examples: ReadonlyArray<RequestExample> | undefined,
  projection: ExampleProjection,
  registry: SchemaRegistry
): void {
  const media = operation.requestBody ? Object.values(operation.requestBody.content)[0] : undefined;
  if (!media || !examples || examples.length === 0) {
    return;
  }

  if (examples.length === 1) {
    const schema = registry.resolve(media.schema);
    if (schema) {
      schema.example = projectExample(examples[0].value, projection);
    }
    return;
  }

  const named: Record<string, ExampleObject> = { ...(media.examples ?? {}) };
  for (const example of disambiguateLabels(examples)) {
    named[example.label] = {
      ...(example.summary !== undefined ? { summary: example.summary } : {}),
      ...(example.description !== undefined ? { description: example.description } : {}),
      value: projectExample(example.value, projection)
    };
  }
  media.examples = named;
}
