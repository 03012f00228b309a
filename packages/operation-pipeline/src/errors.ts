import type { ZodIssue } from 'zod';

export type OperationPipelineErrorCode = 'EMPTY_REQUEST_SHAPE' | 'INVALID_POLICY' | 'INVALID_MANIFEST';

export class OperationPipelineError extends Error {
  public readonly code: OperationPipelineErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: OperationPipelineErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'OperationPipelineError';
    this.code = code;
    this.details = details;
  }
}

export class EmptyRequestShapeError extends OperationPipelineError {
  readonly endpointId: string;
  readonly shapeName: string;

  constructor(endpointId: string, shapeName: string) {
    super(
      'Request shapes without any publicly settable fields are not supported. ' +
        `Offending endpoint: [${endpointId}] Offending request shape: [${shapeName}]`,
      'EMPTY_REQUEST_SHAPE',
      { endpointId, shapeName }
    );
    this.name = 'EmptyRequestShapeError';
    this.endpointId = endpointId;
    this.shapeName = shapeName;
  }
}

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class PolicyValidationError extends OperationPipelineError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(`Invalid document policy: ${describeIssues(issues)}`, 'INVALID_POLICY');
    this.name = 'PolicyValidationError';
    this.issues = issues;
  }
}

export class ManifestValidationError extends OperationPipelineError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(`Invalid endpoint manifest: ${describeIssues(issues)}`, 'INVALID_MANIFEST');
    this.name = 'ManifestValidationError';
    this.issues = issues;
  }
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
