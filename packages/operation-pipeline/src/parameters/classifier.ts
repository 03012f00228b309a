import { assertUnreachable } from '../errors';
import { applyNamingPolicy } from '../naming';
import { extractRouteTokens } from '../route/normalizer';
import { pruneBodyField } from '../schema/pruner';
import type {
  EndpointDescriptor,
  FieldBinding,
  FieldBindingKind,
  ParameterDescription,
  ParameterLocation,
  RequestBodyDescription,
  RequestField
} from '../types';
import { createParameter, type BuiltParameter, type ParameterContext } from './factory';

export const RESERVED_HEADER_NAMES = ['Accept', 'Content-Type', 'Authorization'] as const;

export const DEFAULT_IDEMPOTENCY_HEADER = 'Idempotency-Key';

export interface ClassifierContext extends ParameterContext {
  descriptor: EndpointDescriptor;
  body: RequestBodyDescription | null;
  /** Request fields still eligible for classification. */
  fields: RequestField[];
  /** GET without the document-wide body opt-in. */
  getWithoutBody: boolean;
}

export interface StageResult<K extends ParameterLocation> {
  parameters: BuiltParameter<K>[];
  removed: string[];
}

type BindingOf<K extends FieldBindingKind> = Extract<FieldBinding, { kind: K }>;

export function bindingsOf<K extends FieldBindingKind>(field: RequestField, kind: K): BindingOf<K>[] {
  return (field.bindings ?? []).filter((binding): binding is BindingOf<K> => binding.kind === kind);
}

export const hasBinding = (field: RequestField, kind: FieldBindingKind): boolean => bindingsOf(field, kind).length > 0;

export const isRequiredBinding = (binding: BindingOf<'header' | 'claim' | 'permission'>): boolean =>
  binding.required ?? true;

const prune = (context: ClassifierContext, field: RequestField): string =>
  pruneBodyField(context.body, field.name, {
    registry: context.registry,
    namingPolicy: context.policy.namingPolicy
  });

/** Ignored, hidden and non-settable fields never reach the body or a parameter. */
export function prefilterFields(context: ClassifierContext): { fields: RequestField[]; removed: string[] } {
  const fields: RequestField[] = [];
  const removed: string[] = [];
  for (const field of context.fields) {
    if (field.ignored || field.hidden || field.settable === false) {
      removed.push(prune(context, field));
      continue;
    }
    fields.push(field);
  }
  return { fields, removed };
}

/**
 * One parameter per `{token}` of the path. A field matching the token
 * (case-insensitively, by bind-from name or declared name) supplies the schema
 * and leaves the body and further classification. Tokens are rewritten to
 * their naming-policy form.
 */
export function classifyPathParameters(
  path: string,
  context: ClassifierContext
): StageResult<'path'> & { path: string; fields: RequestField[] } {
  let canonical = path;
  const parameters: BuiltParameter<'path'>[] = [];
  const removed: string[] = [];
  const matched = new Set<RequestField>();

  for (const token of extractRouteTokens(path)) {
    const lowered = token.toLowerCase();
    const field = context.fields.find((entry) => (entry.bindFrom ?? entry.name).toLowerCase() === lowered);
    canonical = canonical.replace(`{${token}}`, `{${applyNamingPolicy(token, context.policy.namingPolicy)}}`);
    if (field) {
      matched.add(field);
      removed.push(prune(context, field));
    }
    parameters.push(createParameter(context, { kind: 'path', field, name: token, required: true }));
  }

  const fields = context.fields.filter((field) => !matched.has(field));
  return { path: canonical, parameters, removed, fields };
}

type QueryVerdict = 'exclude' | 'force' | 'neutral';

function queryVerdict(binding: FieldBinding): QueryVerdict {
  switch (binding.kind) {
    case 'header':
      return 'exclude';
    case 'claim':
    case 'permission':
      return isRequiredBinding(binding) ? 'exclude' : 'neutral';
    case 'query':
      return 'force';
    case 'body':
    case 'form':
      return 'neutral';
    default:
      return assertUnreachable(binding);
  }
}

/**
 * Query parameters: every remaining field of a GET without body opt-in that is
 * not already a path parameter, plus fields with an explicit query annotation.
 * Header bindings and required claim/permission bindings take precedence.
 */
export function classifyQueryParameters(
  context: ClassifierContext,
  existing: ReadonlyArray<{ name: string }>
): StageResult<'query'> & { warnings: string[] } {
  const parameters: BuiltParameter<'query'>[] = [];
  const removed: string[] = [];
  const warnings: string[] = [];
  const taken = new Set(existing.map((parameter) => parameter.name.toLowerCase()));

  for (const field of context.fields) {
    const verdicts = (field.bindings ?? []).map(queryVerdict);
    const forced = verdicts.includes('force');

    if (verdicts.includes('exclude')) {
      const securityBound = [...bindingsOf(field, 'claim'), ...bindingsOf(field, 'permission')].find(isRequiredBinding);
      if (forced && securityBound) {
        warnings.push(
          `Field '${field.name}' of endpoint '${context.descriptor.id}' has a required ${securityBound.kind} binding ` +
            'and a query annotation; it is bound from the security context only.'
        );
      }
      continue;
    }

    const parameterName = field.bindFrom ?? applyNamingPolicy(field.name, context.policy.namingPolicy);
    const implicit = context.getWithoutBody && !taken.has(parameterName.toLowerCase());
    if (!implicit && !forced) {
      continue;
    }

    removed.push(prune(context, field));
    parameters.push(createParameter(context, { kind: 'query', field }));
  }

  return { parameters, removed, warnings };
}

/**
 * Header, claim and permission bindings, in the order each field declares them.
 * Reserved header names drop the field entirely.
 */
export function classifyBoundFields(context: ClassifierContext): StageResult<'header'> {
  const parameters: BuiltParameter<'header'>[] = [];
  const removed: string[] = [];

  for (const field of context.fields) {
    for (const binding of field.bindings ?? []) {
      switch (binding.kind) {
        case 'header': {
          const headerName = binding.headerName ?? field.name;
          const reserved = RESERVED_HEADER_NAMES.some((name) => name.toLowerCase() === headerName.toLowerCase());
          if (reserved) {
            removed.push(prune(context, field));
            break;
          }
          const required = isRequiredBinding(binding);
          parameters.push(
            createParameter(context, {
              kind: 'header',
              field,
              name: headerName,
              verbatimName: binding.headerName !== undefined,
              required
            })
          );
          if (required || binding.removeFromSchema) {
            removed.push(prune(context, field));
          }
          break;
        }
        case 'claim':
        case 'permission':
          if (isRequiredBinding(binding) || binding.removeFromSchema) {
            removed.push(prune(context, field));
          }
          break;
        case 'query':
        case 'body':
        case 'form':
          break;
        default:
          assertUnreachable(binding);
      }
    }
  }

  return { parameters, removed };
}

/** Legacy dialect only: file fields leave the body and become form-data parameters. */
export function classifyLegacyFileFields(
  context: ClassifierContext
): StageResult<'formData'> & { fields: RequestField[] } {
  if (context.policy.dialect !== 'swagger2') {
    return { parameters: [], removed: [], fields: context.fields };
  }
  const parameters: BuiltParameter<'formData'>[] = [];
  const removed: string[] = [];
  const fields: RequestField[] = [];

  for (const field of context.fields) {
    if (!field.isFile) {
      fields.push(field);
      continue;
    }
    removed.push(prune(context, field));
    parameters.push(createParameter(context, { kind: 'formData', field }));
  }

  return { parameters, removed, fields };
}

export function synthesizeIdempotencyHeader(context: ClassifierContext): BuiltParameter<'header'> | undefined {
  const options = context.descriptor.idempotency;
  if (!options) {
    return undefined;
  }
  const parameter = createParameter(context, {
    kind: 'header',
    name: options.headerName ?? DEFAULT_IDEMPOTENCY_HEADER,
    verbatimName: true,
    required: true
  });
  return {
    name: parameter.name,
    in: parameter.in,
    required: parameter.required,
    schema: options.schema ? structuredClone(options.schema) : parameter.schema,
    ...(options.description !== undefined ? { description: options.description } : {}),
    ...(options.example !== undefined ? { example: structuredClone(options.example) } : {})
  };
}

/** Appends parameters, replacing any existing entry with the same name and location. */
export function mergeParameters(
  existing: ParameterDescription[],
  added: ReadonlyArray<ParameterDescription>
): ParameterDescription[] {
  const result = [...existing];
  for (const parameter of added) {
    for (let index = result.length - 1; index >= 0; index -= 1) {
      if (result[index].name === parameter.name && result[index].in === parameter.in) {
        result.splice(index, 1);
      }
    }
    result.push(parameter);
  }
  return result;
}
