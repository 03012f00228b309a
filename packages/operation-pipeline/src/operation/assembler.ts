import { EmptyRequestShapeError } from '../errors';
import { attachRequestExamples } from '../examples/synthesizer';
import { silentLogger, type PipelineLogger } from '../logger';
import {
  classifyBoundFields,
  classifyLegacyFileFields,
  classifyPathParameters,
  classifyQueryParameters,
  hasBinding,
  mergeParameters,
  prefilterFields,
  synthesizeIdempotencyHeader,
  type ClassifierContext
} from '../parameters/classifier';
import { applyParamDescriptions, collectParamDescriptions } from '../parameters/descriptions';
import { createParameter, type ParameterContext } from '../parameters/factory';
import type { DocumentPolicy } from '../policy';
import { assembleResponses } from '../responses/assembler';
import { canonicalPath, computeBareRoute, deriveTag, routeParameterTypeHints } from '../route/normalizer';
import { removeEmptyComponentSchemas } from '../schema/pruner';
import { getAllProperties, type SchemaRegistry } from '../schema/registry';
import type {
  EndpointDescriptor,
  EndpointMarker,
  OperationDescription,
  ParameterDescription,
  RequestBodyDescription,
  RequestField
} from '../types';
import { createOperationSkeleton, propagateRequestContentTypes, toHttpMethod } from './skeleton';

export interface OperationAssemblyContext {
  registry: SchemaRegistry;
  policy: DocumentPolicy;
  logger?: PipelineLogger;
}

export interface OperationAssemblyResult {
  operation: OperationDescription;
  /** Wire names of every field pruned from the request body. */
  removedFields: string[];
  warnings: string[];
}

function createMarker(descriptor: EndpointDescriptor, path: string, policy: DocumentPolicy): EndpointMarker {
  const version = descriptor.version?.current ?? 0;
  return {
    method: toHttpMethod(descriptor),
    bareRoute: computeBareRoute(path, policy, version),
    version,
    startingRelease: descriptor.version?.startingRelease ?? 0,
    deprecatedAt: descriptor.version?.deprecatedAt ?? 0
  };
}

function describeOperation(operation: OperationDescription, descriptor: EndpointDescriptor): void {
  if (descriptor.name) {
    operation.operationId = descriptor.name;
  }
  const summary = descriptor.summary?.summary ?? descriptor.docs?.summary;
  const description = descriptor.summary?.description ?? descriptor.docs?.description;
  if (summary !== undefined) {
    operation.summary = summary;
  }
  if (description !== undefined) {
    operation.description = description;
  }
  if (descriptor.deprecated) {
    operation.deprecated = true;
  }
}

function assertSettableShape(descriptor: EndpointDescriptor, policy: DocumentPolicy): void {
  const shape = descriptor.request;
  if (!shape || (shape.kind ?? 'object') !== 'object' || policy.allowEmptyRequestDtos) {
    return;
  }
  if (!shape.fields.some((field) => field.settable !== false)) {
    throw new EmptyRequestShapeError(descriptor.id, shape.name);
  }
}

function hasNoProperties(body: RequestBodyDescription, registry: SchemaRegistry): boolean {
  return Object.values(body.content).every((media) => getAllProperties(media.schema, registry).length === 0);
}

/** Replaces the whole body with one field's schema and drops the wrapper component. */
function applyBodyOverride(operation: OperationDescription, field: RequestField, context: ParameterContext): void {
  const body = operation.requestBody;
  const media = body ? Object.values(body.content)[0] : undefined;
  if (!body || !media) {
    return;
  }
  const previousName = body.name;
  const parameter = createParameter(context, { kind: 'body', field, name: field.name, required: true });

  media.schema = parameter.schema;
  body.required = parameter.required;
  body.name = parameter.name;
  if (parameter.description !== undefined) {
    body.description = parameter.description;
  } else {
    delete body.description;
  }
  context.registry.remove(previousName);
}

/**
 * Runs one endpoint through the pipeline: route and tags, content types,
 * responses, documentation, parameter classification with body pruning, body
 * collapse, empty component removal, body/form override, then request examples.
 */
export function assembleOperation(
  descriptor: EndpointDescriptor,
  context: OperationAssemblyContext
): OperationAssemblyResult {
  const { policy, registry } = context;
  const logger = context.logger ?? silentLogger;

  const path = canonicalPath(descriptor.route);
  const marker = createMarker(descriptor, path, policy);
  const operation = createOperationSkeleton(descriptor, path, marker);
  const tag = deriveTag(marker.bareRoute, descriptor, policy);
  if (tag !== undefined) {
    operation.tags.push(tag);
  }

  propagateRequestContentTypes(operation, descriptor);
  assembleResponses(operation, { descriptor, policy, registry });
  describeOperation(operation, descriptor);

  assertSettableShape(descriptor, policy);

  const shape = descriptor.request;
  const descriptions = collectParamDescriptions({
    body: operation.requestBody,
    summary: descriptor.summary,
    registry,
    namingPolicy: policy.namingPolicy
  });
  applyParamDescriptions(operation.requestBody, descriptions, registry);

  const getWithoutBody = descriptor.verb === 'GET' && !policy.enableGetRequestsWithBody;
  let classifier: ClassifierContext = {
    policy,
    registry,
    descriptions,
    routeHints: routeParameterTypeHints(descriptor.route, policy),
    descriptor,
    body: operation.requestBody,
    fields: shape?.fields ?? [],
    getWithoutBody
  };
  const removed: string[] = [];

  const prefiltered = prefilterFields(classifier);
  removed.push(...prefiltered.removed);
  classifier = { ...classifier, fields: prefiltered.fields };

  const pathStage = classifyPathParameters(path, classifier);
  operation.path = pathStage.path;
  removed.push(...pathStage.removed);
  classifier = { ...classifier, fields: pathStage.fields };

  const queryStage = classifyQueryParameters(classifier, pathStage.parameters);
  removed.push(...queryStage.removed);

  const boundStage = classifyBoundFields(classifier);
  removed.push(...boundStage.removed);

  const fileStage = classifyLegacyFileFields(classifier);
  removed.push(...fileStage.removed);
  classifier = { ...classifier, fields: fileStage.fields };

  const idempotency = synthesizeIdempotencyHeader(classifier);

  const added: ParameterDescription[] = [
    ...pathStage.parameters,
    ...queryStage.parameters,
    ...boundStage.parameters,
    ...fileStage.parameters,
    ...(idempotency ? [idempotency] : [])
  ];
  const preset = policy.usingVersioningAddOn ? structuredClone(descriptor.presetParameters ?? []) : [];
  operation.parameters = mergeParameters(preset, added);

  if (
    operation.requestBody &&
    shape?.kind !== 'list' &&
    (getWithoutBody || hasNoProperties(operation.requestBody, registry))
  ) {
    operation.requestBody = null;
  }

  if (policy.removeEmptyRequestSchema) {
    const deleted = removeEmptyComponentSchemas(registry);
    if (deleted.length > 0) {
      logger.debug({ endpoint: descriptor.id, schemas: deleted }, 'Removed empty component schemas');
    }
  }

  const overrideFields = [
    classifier.fields.find((field) => hasBinding(field, 'body')),
    classifier.fields.find((field) => hasBinding(field, 'form'))
  ].filter((field): field is RequestField => field !== undefined);
  for (const field of overrideFields) {
    applyBodyOverride(operation, field, classifier);
  }

  const projection = {
    removed,
    overrideFields: operation.requestBody ? overrideFields : [],
    policy
  };
  attachRequestExamples(operation, descriptor.summary?.requestExamples, projection, registry);

  for (const warning of queryStage.warnings) {
    logger.warn({ endpoint: descriptor.id }, warning);
  }
  logger.debug(
    { endpoint: descriptor.id, method: operation.method, path: operation.path, parameters: operation.parameters.length },
    'Assembled operation'
  );

  return {
    operation,
    removedFields: Array.from(new Set(removed)),
    warnings: queryStage.warnings
  };
}
