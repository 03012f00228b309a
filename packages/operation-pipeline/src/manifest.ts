import { z } from 'zod';
import type { DocumentInfo } from './document/builder';
import { ManifestValidationError } from './errors';
import { isPlainObject } from './schema/registry';
import type { RouteEntry, SchemaObject, SchemaOrRef } from './types';

const schemaOrRefSchema = z.custom<SchemaOrRef>((value) => isPlainObject(value), {
  message: 'Expected a schema object or reference'
});

const componentSchema = z.custom<SchemaObject>((value) => isPlainObject(value) && !('$ref' in value), {
  message: 'Expected an inline schema object'
});

const securityBinding = {
  required: z.boolean().optional(),
  removeFromSchema: z.boolean().optional()
};

const fieldBindingSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('header'), headerName: z.string().min(1).optional(), ...securityBinding }).strict(),
  z.object({ kind: z.literal('claim'), claimType: z.string().min(1), ...securityBinding }).strict(),
  z.object({ kind: z.literal('permission'), permission: z.string().min(1), ...securityBinding }).strict(),
  z.object({ kind: z.literal('query') }).strict(),
  z.object({ kind: z.literal('body') }).strict(),
  z.object({ kind: z.literal('form') }).strict()
]);

const requestFieldSchema = z
  .object({
    name: z.string().min(1),
    schema: schemaOrRefSchema.optional(),
    schemaOverride: z.object({ schema: schemaOrRefSchema, nullable: z.boolean().optional() }).strict().optional(),
    nullable: z.boolean().optional(),
    defaultValue: z.unknown().optional(),
    bindFrom: z.string().min(1).optional(),
    settable: z.boolean().optional(),
    ignored: z.boolean().optional(),
    hidden: z.boolean().optional(),
    isFile: z.boolean().optional(),
    description: z.string().optional(),
    example: z.unknown().optional(),
    bindings: z.array(fieldBindingSchema).optional()
  })
  .strict();

const requestShapeSchema = z
  .object({
    name: z.string().min(1),
    kind: z.enum(['object', 'list', 'empty']).optional(),
    fields: z.array(requestFieldSchema).default([]),
    schema: schemaOrRefSchema.optional(),
    contentTypes: z.array(z.string().min(1)).optional()
  })
  .strict();

const responseFieldSchema = z
  .object({
    name: z.string().min(1),
    jsonName: z.string().min(1).optional(),
    schema: schemaOrRefSchema.optional(),
    description: z.string().optional(),
    example: z.unknown().optional(),
    header: z.object({ headerName: z.string().min(1).optional() }).strict().optional()
  })
  .strict();

const statusCodeSchema = z.number().int().min(100).max(599);

const declaredResponseSchema = z
  .object({
    statusCode: statusCodeSchema,
    contentTypes: z.array(z.string().min(1)).optional(),
    shape: z
      .object({
        name: z.string().min(1),
        schema: schemaOrRefSchema.optional(),
        fields: z.array(responseFieldSchema).optional()
      })
      .strict()
      .optional(),
    example: z.unknown().optional()
  })
  .strict();

const summarySchema = z
  .object({
    summary: z.string().optional(),
    description: z.string().optional(),
    responses: z.record(z.string()).optional(),
    responseParams: z.record(z.record(z.string())).optional(),
    params: z.record(z.string()).optional(),
    requestExamples: z
      .array(
        z
          .object({
            label: z.string(),
            summary: z.string().optional(),
            description: z.string().optional(),
            value: z.custom<{} | null>((value) => value !== undefined, { message: 'Example value is required' })
          })
          .strict()
      )
      .optional(),
    responseExamples: z.record(z.unknown()).optional(),
    responseHeaders: z
      .array(
        z
          .object({
            statusCode: statusCodeSchema,
            headerName: z.string().min(1),
            description: z.string().optional(),
            example: z.unknown().optional()
          })
          .strict()
      )
      .optional()
  })
  .strict();

const parameterSchema = z
  .object({
    name: z.string().min(1),
    in: z.enum(['path', 'query', 'header', 'formData']),
    required: z.boolean(),
    schema: schemaOrRefSchema,
    description: z.string().optional(),
    example: z.unknown().optional(),
    default: z.unknown().optional()
  })
  .strict();

const endpointSchema = z
  .object({
    kind: z.literal('endpoint'),
    id: z.string().min(1),
    route: z.string().min(1),
    verb: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']),
    name: z.string().min(1).optional(),
    version: z
      .object({
        current: z.number().int().nonnegative().optional(),
        startingRelease: z.number().int().nonnegative().optional(),
        deprecatedAt: z.number().int().nonnegative().optional()
      })
      .strict()
      .optional(),
    request: requestShapeSchema.optional(),
    responses: z.array(declaredResponseSchema).optional(),
    summary: summarySchema.optional(),
    docs: z.object({ summary: z.string().optional(), description: z.string().optional() }).strict().optional(),
    deprecated: z.boolean().optional(),
    tagOverride: z.string().min(1).optional(),
    disableAutoTag: z.boolean().optional(),
    idempotency: z
      .object({
        headerName: z.string().min(1).optional(),
        description: z.string().optional(),
        example: z.unknown().optional(),
        schema: schemaOrRefSchema.optional()
      })
      .strict()
      .optional(),
    presetParameters: z.array(parameterSchema).optional()
  })
  .strict();

const foreignRouteSchema = z
  .object({
    kind: z.undefined().optional(),
    path: z.string().min(1),
    method: z.string().min(1),
    operation: z.record(z.unknown())
  })
  .strict();

export const endpointManifestSchema = z
  .object({
    info: z
      .object({
        title: z.string().min(1),
        version: z.string().min(1),
        description: z.string().optional()
      })
      .strict()
      .optional(),
    components: z.object({ schemas: z.record(componentSchema).default({}) }).strict().optional(),
    endpoints: z.array(z.union([endpointSchema, foreignRouteSchema]))
  })
  .strict();

export interface EndpointManifest {
  info?: DocumentInfo;
  components?: { schemas: Record<string, SchemaObject> };
  endpoints: RouteEntry[];
}

export function parseManifest(raw: unknown): EndpointManifest {
  const parsed = endpointManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ManifestValidationError(parsed.error.issues);
  }
  return parsed.data;
}
