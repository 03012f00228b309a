import { applyNamingPolicy } from '../naming';
import type { DocumentPolicy } from '../policy';
import { cloneSchema, isReferenceObject, type SchemaRegistry } from '../schema/registry';
import { hasValues, sampleFromSchema } from '../schema/samples';
import { serializeExample } from '../examples/serialize';
import type {
  ParameterDescription,
  ParameterKind,
  RequestField,
  SchemaObject,
  SchemaOrRef
} from '../types';
import type { ParamDescriptionIndex } from './descriptions';

export interface ParameterContext {
  policy: DocumentPolicy;
  registry: SchemaRegistry;
  descriptions: ParamDescriptionIndex;
  /** Route constraint type hints keyed by lower-cased token name. */
  routeHints: Map<string, SchemaObject>;
}

export interface ParameterRequest<K extends ParameterKind> {
  kind: K;
  field?: RequestField;
  name?: string;
  /** Use `name` as given instead of running it through the naming policy. */
  verbatimName?: boolean;
  required?: boolean;
}

export type BuiltParameter<K extends ParameterKind> = Omit<ParameterDescription, 'in'> & { in: K };

function resolveParameterName<K extends ParameterKind>(request: ParameterRequest<K>, policy: DocumentPolicy): string {
  if (request.name !== undefined) {
    return request.verbatimName ? request.name : applyNamingPolicy(request.name, policy.namingPolicy);
  }
  if (request.field?.bindFrom) {
    return request.field.bindFrom;
  }
  if (request.field) {
    return applyNamingPolicy(request.field.name, policy.namingPolicy);
  }
  throw new Error(`A name or a field is required to create a ${request.kind} parameter`);
}

const withNullable = (schema: SchemaOrRef): SchemaOrRef =>
  isReferenceObject(schema) ? { allOf: [schema], nullable: true } : { ...schema, nullable: true };

const withDefault = (schema: SchemaOrRef, value: unknown): SchemaOrRef =>
  isReferenceObject(schema) ? { allOf: [schema], default: value } : { ...schema, default: value };

function unwrapSingleBranch(schema: SchemaOrRef, registry: SchemaRegistry): SchemaOrRef {
  if (isReferenceObject(schema) || schema.oneOf?.length !== 1) {
    return schema;
  }
  const branch = schema.oneOf?.[0];
  if (!branch) {
    return schema;
  }
  const actual = registry.resolve(branch);
  if (actual && (actual.type === 'object' || actual.properties) && !actual.discriminator) {
    return branch;
  }
  return schema;
}

/**
 * Builds a parameter for a request field, a route token or a synthesized header.
 * A caller-forced `required` wins; otherwise a field is required when it has no
 * default and is not nullable.
 */
export function createParameter<K extends ParameterKind>(
  context: ParameterContext,
  request: ParameterRequest<K>
): BuiltParameter<K> {
  const { policy, registry } = context;
  const { field } = request;
  const name = resolveParameterName(request, policy);

  const source: SchemaOrRef = field?.schemaOverride?.schema ??
    field?.schema ??
    context.routeHints.get(name.toLowerCase()) ?? { type: 'string' };
  let schema = cloneSchema(source);

  const nullable = field ? field.schemaOverride?.nullable ?? field.nullable ?? false : undefined;
  const hasDefault = field?.defaultValue !== undefined;
  const required = request.required ?? (hasDefault ? false : nullable === undefined ? false : !nullable);

  if (!required && nullable === true && policy.dialect === 'openapi3') {
    schema = withNullable(schema);
  }
  if (request.kind === 'body') {
    schema = unwrapSingleBranch(schema, registry);
  }

  let defaultValue: unknown;
  if (field && hasDefault) {
    const value = structuredClone(field.defaultValue);
    if (policy.dialect === 'swagger2') {
      defaultValue = value;
    } else {
      schema = withDefault(schema, value);
    }
  }

  const described = context.descriptions.lookup(
    name,
    field ? applyNamingPolicy(field.name, policy.namingPolicy) : undefined,
    field?.name
  );
  const description = described?.description ?? field?.description;

  let example: unknown;
  if (policy.generateExamples) {
    example = described?.example ?? serializeExample(field?.example, policy.namingPolicy);
    if (example === undefined && !hasDefault && required) {
      const sample = sampleFromSchema(schema, registry);
      example = hasValues(sample) ? sample : undefined;
    }
  }

  return {
    name,
    in: request.kind,
    required,
    schema,
    ...(description !== undefined ? { description } : {}),
    ...(example !== undefined ? { example } : {}),
    ...(defaultValue !== undefined ? { default: defaultValue } : {})
  };
}
