import { serializeExample } from '../examples/serialize';
import { applyNamingPolicy } from '../naming';
import type { DocumentPolicy } from '../policy';
import { cloneSchema, getAllProperties, isReferenceObject, schemaRef, type SchemaRegistry } from '../schema/registry';
import { inferSchemaFromValue, sampleFromSchema } from '../schema/samples';
import type {
  DeclaredResponse,
  EndpointDescriptor,
  HeaderObject,
  MediaTypeDescription,
  OperationDescription,
  ResponseDescription,
  ResponseShape,
  SchemaOrRef
} from '../types';
import { DEFAULT_RESPONSE_DESCRIPTIONS } from './statusText';

export interface ResponseAssemblyContext {
  descriptor: EndpointDescriptor;
  policy: DocumentPolicy;
  registry: SchemaRegistry;
}

const DEFAULT_CONTENT_TYPE = 'application/json';

export const declaredContentTypes = (response: DeclaredResponse): string[] =>
  response.contentTypes && response.contentTypes.length > 0 ? response.contentTypes : [DEFAULT_CONTENT_TYPE];

export const firstMedia = (content: Record<string, MediaTypeDescription>): MediaTypeDescription | undefined =>
  Object.values(content)[0];

export const shapeSchema = (shape: ResponseShape | { name: string; schema?: SchemaOrRef }): SchemaOrRef =>
  shape.schema ? cloneSchema(shape.schema) : schemaRef(shape.name);

/** Last declaration wins for a status code. */
export function latestDeclaredResponses(declared: DeclaredResponse[] = []): Map<string, DeclaredResponse> {
  const byStatus = new Map<string, DeclaredResponse>();
  for (const response of declared) {
    byStatus.set(String(response.statusCode), response);
  }
  return byStatus;
}

/**
 * Responses as the schema generator reports them: one entry per status code,
 * typed content under the first declared content type only.
 */
export function seedResponses(descriptor: EndpointDescriptor): Record<string, ResponseDescription> {
  const responses: Record<string, ResponseDescription> = {};
  const declared = Array.from(latestDeclaredResponses(descriptor.responses).entries()).sort(
    ([left], [right]) => Number(left) - Number(right)
  );
  for (const [code, response] of declared) {
    const content: Record<string, MediaTypeDescription> = {};
    if (response.shape) {
      content[declaredContentTypes(response)[0]] = { schema: shapeSchema(response.shape) };
    }
    responses[code] = { description: '', content, headers: {} };
  }
  return responses;
}

function resolveResponseExample(code: string, declared: DeclaredResponse, context: ResponseAssemblyContext): unknown {
  const raw = declared.example ?? context.descriptor.summary?.responseExamples?.[code];
  if (raw === undefined || raw === null) {
    return undefined;
  }
  const serialized = serializeExample(raw, context.policy.namingPolicy);
  if (context.policy.dialect === 'swagger2' && Array.isArray(serialized)) {
    return JSON.stringify(serialized);
  }
  return serialized;
}

/** Headers synthesized from response fields flagged to be sent as headers. */
function headersFromShape(shape: ResponseShape | undefined, context: ResponseAssemblyContext): Record<string, HeaderObject> {
  const headers: Record<string, HeaderObject> = {};
  for (const field of shape?.fields ?? []) {
    if (!field.header) {
      continue;
    }
    const name = field.header.headerName ?? applyNamingPolicy(field.name, context.policy.namingPolicy);
    const schema = cloneSchema(field.schema ?? { type: 'string' });
    const example =
      field.example !== undefined
        ? serializeExample(field.example, context.policy.namingPolicy)
        : sampleFromSchema(schema, context.registry);
    headers[name] = {
      schema,
      example,
      ...(field.description !== undefined ? { description: field.description } : {})
    };
  }
  return headers;
}

function declaredHeaders(code: string, context: ResponseAssemblyContext): Record<string, HeaderObject> {
  const headers: Record<string, HeaderObject> = {};
  for (const header of context.descriptor.summary?.responseHeaders ?? []) {
    if (String(header.statusCode) !== code) {
      continue;
    }
    const example =
      header.example !== undefined ? serializeExample(header.example, context.policy.namingPolicy) : undefined;
    headers[header.headerName] = {
      ...(header.description !== undefined ? { description: header.description } : {}),
      ...(example !== undefined ? { example, schema: inferSchemaFromValue(example) } : {})
    };
  }
  return headers;
}

function flattenPolymorphism(response: ResponseDescription, registry: SchemaRegistry): void {
  for (const media of new Set(Object.values(response.content))) {
    const actual = registry.resolve(media.schema);
    const mapping = actual?.discriminator?.mapping;
    const branches = actual?.oneOf;
    if (!mapping || Object.keys(mapping).length === 0 || !branches || branches.length === 0) {
      continue;
    }
    media.schema = { oneOf: branches.map((branch) => cloneSchema(branch)) };
  }
}

// Byte arrays come out of the schema generator as string/byte.
function fixBinaryFormat(response: ResponseDescription): void {
  for (const media of new Set(Object.values(response.content))) {
    const { schema } = media;
    if (!isReferenceObject(schema) && schema.type === 'string' && schema.format === 'byte') {
      schema.format = 'binary';
    }
  }
}

/**
 * Merges declared response metadata into the seeded responses: examples,
 * header fields, user headers (which win), one shared media entry across every
 * declared content type, polymorphism flattening and the binary fix.
 */
export function assembleResponses(operation: OperationDescription, context: ResponseAssemblyContext): void {
  const declared = latestDeclaredResponses(context.descriptor.responses);

  for (const [code, response] of Object.entries(operation.responses)) {
    const meta = declared.get(code);
    const media = firstMedia(response.content);

    if (meta) {
      const example = resolveResponseExample(code, meta, context);
      if (media && example !== undefined) {
        media.example = example;
      }
      Object.assign(response.headers, headersFromShape(meta.shape, context), declaredHeaders(code, context));
      if (media) {
        response.content = Object.fromEntries(declaredContentTypes(meta).map((contentType) => [contentType, media]));
      }
    }

    if (context.policy.useOneOfForPolymorphism) {
      flattenPolymorphism(response, context.registry);
    }
    fixBinaryFormat(response);
  }

  describeResponses(operation, context);
}

function applyPropertyDescriptions(
  schema: SchemaOrRef,
  descriptions: Record<string, string>,
  shape: ResponseShape | undefined,
  context: ResponseAssemblyContext
): void {
  const byWireName = new Map<string, string>();
  for (const [name, text] of Object.entries(descriptions)) {
    const field = shape?.fields?.find((entry) => entry.name === name);
    byWireName.set(field?.jsonName ?? applyNamingPolicy(name, context.policy.namingPolicy), text);
  }
  for (const prop of getAllProperties(schema, context.registry)) {
    const text = byWireName.get(prop.key);
    if (text !== undefined && !isReferenceObject(prop.schema)) {
      prop.schema.description = text;
    }
  }
}

/**
 * Fills empty descriptions: the default reason phrase, then the summary's
 * per-status text, then per-property descriptions inside the response schema.
 */
export function describeResponses(operation: OperationDescription, context: ResponseAssemblyContext): void {
  const summary = context.descriptor.summary;
  const declared = latestDeclaredResponses(context.descriptor.responses);

  for (const [code, response] of Object.entries(operation.responses)) {
    if (response.description.trim() !== '') {
      continue;
    }
    const fallback = DEFAULT_RESPONSE_DESCRIPTIONS[code];
    if (fallback !== undefined) {
      response.description = fallback;
    }
    const custom = summary?.responses?.[code];
    if (custom !== undefined) {
      response.description = custom;
    }

    const propertyDescriptions = summary?.responseParams?.[code];
    const media = firstMedia(response.content);
    if (propertyDescriptions && media) {
      applyPropertyDescriptions(media.schema, propertyDescriptions, declared.get(code)?.shape, context);
    }
  }
}
