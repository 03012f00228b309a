import type { OpenAPIV3 } from 'openapi-types';

export type SchemaObject = OpenAPIV3.SchemaObject;
export type ReferenceObject = OpenAPIV3.ReferenceObject;
export type SchemaOrRef = SchemaObject | ReferenceObject;
export type HeaderObject = OpenAPIV3.HeaderObject;
export type ExampleObject = OpenAPIV3.ExampleObject;

export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

export type HttpMethod = Lowercase<HttpVerb>;

/**
 * Binding annotations a request field can carry. `required` defaults to true
 * for header, claim and permission bindings.
 */
export type FieldBinding =
  | { kind: 'header'; headerName?: string; required?: boolean; removeFromSchema?: boolean }
  | { kind: 'claim'; claimType: string; required?: boolean; removeFromSchema?: boolean }
  | { kind: 'permission'; permission: string; required?: boolean; removeFromSchema?: boolean }
  | { kind: 'query' }
  | { kind: 'body' }
  | { kind: 'form' };

export type FieldBindingKind = FieldBinding['kind'];

export interface SchemaTypeOverride {
  schema: SchemaOrRef;
  nullable?: boolean;
}

export interface RequestField {
  /** Declared (source) name before the naming policy is applied. */
  name: string;
  schema?: SchemaOrRef;
  schemaOverride?: SchemaTypeOverride;
  nullable?: boolean;
  /** Constructor-supplied default; its presence makes the field optional. */
  defaultValue?: unknown;
  /** Wire name override used verbatim for path and query binding. */
  bindFrom?: string;
  /** Defaults to true. */
  settable?: boolean;
  ignored?: boolean;
  hidden?: boolean;
  isFile?: boolean;
  description?: string;
  example?: unknown;
  bindings?: FieldBinding[];
}

export type RequestShapeKind = 'object' | 'list' | 'empty';

export interface RequestShape {
  /** Component schema name of the request wrapper. */
  name: string;
  /** `empty` marks the designated empty-body marker type. Defaults to `object`. */
  kind?: RequestShapeKind;
  fields: RequestField[];
  /** Body schema; defaults to a reference to the `name` component. */
  schema?: SchemaOrRef;
  /** Declared consumes list; defaults to `application/json`. */
  contentTypes?: string[];
}

export interface ResponseHeaderBinding {
  headerName?: string;
}

export interface ResponseField {
  name: string;
  jsonName?: string;
  schema?: SchemaOrRef;
  description?: string;
  example?: unknown;
  header?: ResponseHeaderBinding;
}

export interface ResponseShape {
  name: string;
  schema?: SchemaOrRef;
  fields?: ResponseField[];
}

export interface DeclaredResponse {
  statusCode: number;
  contentTypes?: string[];
  shape?: ResponseShape;
  example?: unknown;
}

export interface RequestExample {
  label: string;
  summary?: string;
  description?: string;
  value: {} | null;
}

export interface ResponseHeaderDeclaration {
  statusCode: number;
  headerName: string;
  description?: string;
  example?: unknown;
}

export interface EndpointSummary {
  summary?: string;
  description?: string;
  /** Status code → response description. */
  responses?: Record<string, string>;
  /** Status code → property name → description. */
  responseParams?: Record<string, Record<string, string>>;
  /** Request field name → description. */
  params?: Record<string, string>;
  requestExamples?: RequestExample[];
  /** Status code → example payload. */
  responseExamples?: Record<string, unknown>;
  responseHeaders?: ResponseHeaderDeclaration[];
}

export interface EndpointVersion {
  current?: number;
  startingRelease?: number;
  deprecatedAt?: number;
}

export interface IdempotencyOptions {
  headerName?: string;
  description?: string;
  example?: unknown;
  schema?: SchemaOrRef;
}

export interface EndpointDocs {
  summary?: string;
  description?: string;
}

export interface EndpointDescriptor {
  /** Metadata marker; entries without it are foreign and pass through untouched. */
  kind: 'endpoint';
  /** Endpoint identity used in diagnostics. */
  id: string;
  route: string;
  verb: HttpVerb;
  name?: string;
  version?: EndpointVersion;
  request?: RequestShape;
  responses?: DeclaredResponse[];
  summary?: EndpointSummary;
  docs?: EndpointDocs;
  deprecated?: boolean;
  tagOverride?: string;
  disableAutoTag?: boolean;
  idempotency?: IdempotencyOptions;
  /** Parameters pre-populated by an external versioning add-on. */
  presetParameters?: ParameterDescription[];
}

export interface ForeignRoute {
  kind?: undefined;
  path: string;
  method: string;
  operation: Record<string, unknown>;
}

export type RouteEntry = EndpointDescriptor | ForeignRoute;

export type ParameterKind = 'path' | 'query' | 'header' | 'formData' | 'body';

export type ParameterLocation = Exclude<ParameterKind, 'body'>;

export interface ParameterDescription {
  name: string;
  in: ParameterLocation;
  required: boolean;
  schema: SchemaOrRef;
  description?: string;
  example?: unknown;
  default?: unknown;
}

export interface MediaTypeDescription {
  schema: SchemaOrRef;
  example?: unknown;
  examples?: Record<string, ExampleObject>;
}

export interface RequestBodyDescription {
  name: string;
  required: boolean;
  description?: string;
  content: Record<string, MediaTypeDescription>;
}

export interface ResponseDescription {
  description: string;
  content: Record<string, MediaTypeDescription>;
  headers: Record<string, HeaderObject>;
}

export interface EndpointMarker {
  method: HttpMethod;
  bareRoute: string;
  version: number;
  startingRelease: number;
  deprecatedAt: number;
}

export interface OperationDescription {
  path: string;
  method: HttpMethod;
  operationId?: string;
  summary?: string;
  description?: string;
  tags: string[];
  parameters: ParameterDescription[];
  requestBody: RequestBodyDescription | null;
  responses: Record<string, ResponseDescription>;
  deprecated?: boolean;
  marker: EndpointMarker;
}
