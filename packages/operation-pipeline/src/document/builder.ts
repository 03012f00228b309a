import { silentLogger, type PipelineLogger } from '../logger';
import { assembleOperation } from '../operation/assembler';
import { createDocumentPolicy, type DocumentPolicy } from '../policy';
import { SchemaRegistry } from '../schema/registry';
import type { OperationDescription, RequestBodyDescription, RouteEntry, SchemaObject } from '../types';

export interface DocumentInfo {
  title: string;
  version: string;
  description?: string;
}

export type PublishedOperation = Omit<OperationDescription, 'path' | 'method' | 'marker' | 'requestBody'> & {
  requestBody?: RequestBodyDescription;
};

export type PathItem = Record<string, PublishedOperation | Record<string, unknown>>;

export type AssembledDocument = ({ openapi: '3.0.3' } | { swagger: '2.0' }) & {
  info: DocumentInfo;
  paths: Record<string, PathItem>;
  components: { schemas: Record<string, SchemaObject> };
};

export interface BuildDocumentOptions {
  endpoints: ReadonlyArray<RouteEntry>;
  components?: { schemas?: Record<string, SchemaObject> };
  policy?: DocumentPolicy;
  info?: DocumentInfo;
  logger?: PipelineLogger;
}

const DEFAULT_INFO: DocumentInfo = { title: 'API', version: '1.0.0' };

/** Drops the cross-endpoint marker and the pipeline's own addressing fields. */
export function publishOperation(operation: OperationDescription): PublishedOperation {
  const { path: _path, method: _method, marker: _marker, requestBody, ...rest } = operation;
  return requestBody ? { ...rest, requestBody } : rest;
}

/**
 * Runs every managed endpoint through the operation pipeline, one at a time in
 * input order, against one shared component registry. Entries without the
 * endpoint marker are copied into the document as they are. A fatal error
 * aborts the build.
 */
export function buildDocument(options: BuildDocumentOptions): AssembledDocument {
  const policy = options.policy ?? createDocumentPolicy();
  const logger = options.logger ?? silentLogger;
  const registry = new SchemaRegistry(structuredClone(options.components?.schemas ?? {}));
  const paths: Record<string, PathItem> = {};

  const attach = (path: string, method: string, operation: PublishedOperation | Record<string, unknown>) => {
    const item = paths[path] ?? {};
    if (item[method]) {
      logger.warn({ path, method }, 'Duplicate operation replaced by a later endpoint');
    }
    item[method] = operation;
    paths[path] = item;
  };

  for (const entry of options.endpoints) {
    if (entry.kind !== 'endpoint') {
      logger.debug({ path: entry.path, method: entry.method }, 'Passing through foreign route');
      attach(entry.path, entry.method.toLowerCase(), structuredClone(entry.operation));
      continue;
    }
    const { operation } = assembleOperation(entry, { registry, policy, logger });
    attach(operation.path, operation.method, publishOperation(operation));
  }

  logger.info({ operations: options.endpoints.length, schemas: registry.names().length }, 'Document assembled');

  const body = {
    info: options.info ?? DEFAULT_INFO,
    paths,
    components: { schemas: registry.toJSON() }
  };
  return policy.dialect === 'swagger2' ? { swagger: '2.0', ...body } : { openapi: '3.0.3', ...body };
}
