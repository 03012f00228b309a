import { z } from 'zod';
import { PolicyValidationError } from './errors';
import type { SchemaObject } from './types';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const schemaObjectSchema = z.custom<SchemaObject>((value) => isPlainObject(value) && !('$ref' in value), {
  message: 'Expected an inline schema object'
});

export const documentPolicySchema = z
  .object({
    autoTagPathSegmentIndex: z.number().int().nonnegative().default(1),
    tagCase: z.enum(['none', 'title', 'lower']).default('title'),
    tagStripSymbols: z.boolean().default(false),
    enableGetRequestsWithBody: z.boolean().default(false),
    useOneOfForPolymorphism: z.boolean().default(false),
    removeEmptyRequestSchema: z.boolean().default(false),
    namingPolicy: z.enum(['camelCase', 'snakeCase', 'kebabCase', 'none']).default('camelCase'),
    endpointRoutePrefix: z.string().min(1).optional(),
    versioningPrefix: z.string().default('v'),
    allowEmptyRequestDtos: z.boolean().default(false),
    usingVersioningAddOn: z.boolean().default(false),
    dialect: z.enum(['openapi3', 'swagger2']).default('openapi3'),
    generateExamples: z.boolean().default(true),
    routeConstraintMap: z.record(z.string().min(1), schemaObjectSchema).default({})
  })
  .strict();

export type DocumentPolicyInput = z.input<typeof documentPolicySchema>;

export type DocumentPolicy = Readonly<z.output<typeof documentPolicySchema>>;

export type SpecDialect = DocumentPolicy['dialect'];

export const DEFAULT_ROUTE_CONSTRAINTS: Readonly<Record<string, SchemaObject>> = Object.freeze({
  int: { type: 'integer', format: 'int32' },
  long: { type: 'integer', format: 'int64' },
  decimal: { type: 'number', format: 'decimal' },
  double: { type: 'number', format: 'double' },
  float: { type: 'number', format: 'float' },
  bool: { type: 'boolean' },
  guid: { type: 'string', format: 'uuid' },
  datetime: { type: 'string', format: 'date-time' },
  alpha: { type: 'string' }
});

function parsePolicy(raw: unknown): DocumentPolicy {
  const parsed = documentPolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw new PolicyValidationError(parsed.error.issues);
  }
  return Object.freeze({
    ...parsed.data,
    routeConstraintMap: Object.freeze({ ...DEFAULT_ROUTE_CONSTRAINTS, ...parsed.data.routeConstraintMap })
  });
}

export function createDocumentPolicy(input: DocumentPolicyInput = {}): DocumentPolicy {
  return parsePolicy(input);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value || !value.trim()) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Reads `OPFORGE_*` variables; unset or unparsable values are left to the schema defaults. */
export function readPolicyEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const values: Record<string, unknown> = {
    autoTagPathSegmentIndex: parseInteger(env.OPFORGE_TAG_SEGMENT_INDEX),
    tagCase: parseText(env.OPFORGE_TAG_CASE),
    tagStripSymbols: parseBoolean(env.OPFORGE_TAG_STRIP_SYMBOLS),
    enableGetRequestsWithBody: parseBoolean(env.OPFORGE_GET_WITH_BODY),
    useOneOfForPolymorphism: parseBoolean(env.OPFORGE_USE_ONE_OF),
    removeEmptyRequestSchema: parseBoolean(env.OPFORGE_REMOVE_EMPTY_SCHEMAS),
    namingPolicy: parseText(env.OPFORGE_NAMING_POLICY),
    endpointRoutePrefix: parseText(env.OPFORGE_ROUTE_PREFIX),
    versioningPrefix: parseText(env.OPFORGE_VERSION_PREFIX),
    allowEmptyRequestDtos: parseBoolean(env.OPFORGE_ALLOW_EMPTY_REQUESTS),
    usingVersioningAddOn: parseBoolean(env.OPFORGE_VERSIONING_ADDON),
    dialect: parseText(env.OPFORGE_DIALECT),
    generateExamples: parseBoolean(env.OPFORGE_GENERATE_EXAMPLES)
  };
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export interface LoadDocumentPolicyOptions {
  env?: Record<string, string | undefined>;
  overrides?: Record<string, unknown>;
}

/** Environment first, explicit overrides on top, then validation. */
export function loadDocumentPolicy(options: LoadDocumentPolicyOptions = {}): DocumentPolicy {
  const env = options.env ?? process.env;
  return parsePolicy({ ...readPolicyEnv(env), ...(options.overrides ?? {}) });
}
