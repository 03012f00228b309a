import { seedResponses, shapeSchema } from '../responses/assembler';
import type { EndpointDescriptor, EndpointMarker, HttpMethod, OperationDescription, RequestBodyDescription } from '../types';

const DEFAULT_REQUEST_CONTENT_TYPE = 'application/json';

export const requestContentTypes = (descriptor: EndpointDescriptor): string[] => {
  const declared = descriptor.request?.contentTypes;
  return declared && declared.length > 0 ? declared : [DEFAULT_REQUEST_CONTENT_TYPE];
};

export const toHttpMethod = (descriptor: EndpointDescriptor): HttpMethod => {
  switch (descriptor.verb) {
    case 'GET':
      return 'get';
    case 'POST':
      return 'post';
    case 'PUT':
      return 'put';
    case 'PATCH':
      return 'patch';
    case 'DELETE':
      return 'delete';
    case 'HEAD':
      return 'head';
    case 'OPTIONS':
      return 'options';
  }
};

function seedRequestBody(descriptor: EndpointDescriptor): RequestBodyDescription | null {
  const shape = descriptor.request;
  if (!shape || shape.kind === 'empty') {
    return null;
  }
  return {
    name: shape.name,
    required: true,
    content: { [requestContentTypes(descriptor)[0]]: { schema: shapeSchema(shape) } }
  };
}

/**
 * The operation as a schema generator would hand it over: request content under
 * the first declared content type only, untyped response descriptions, no
 * parameters yet.
 */
export function createOperationSkeleton(descriptor: EndpointDescriptor, path: string, marker: EndpointMarker): OperationDescription {
  return {
    path,
    method: marker.method,
    tags: [],
    parameters: [],
    requestBody: seedRequestBody(descriptor),
    responses: seedResponses(descriptor),
    marker
  };
}

/** Every declared request content type shares the one media entry. */
export function propagateRequestContentTypes(operation: OperationDescription, descriptor: EndpointDescriptor): void {
  const body = operation.requestBody;
  const media = body ? Object.values(body.content)[0] : undefined;
  if (!body || !media) {
    return;
  }
  body.content = Object.fromEntries(requestContentTypes(descriptor).map((contentType) => [contentType, media]));
}
