import { formatTagName } from '../naming';
import type { DocumentPolicy } from '../policy';
import type { EndpointDescriptor, SchemaObject } from '../types';

const ROUTE_CONSTRAINT_PATTERN = /(?<=\{)([^?:}]+)[^}]*(?=\})/g;
const ROUTE_TOKEN_PATTERN = /\{([^{}]*)\}/g;
const CONSTRAINED_SEGMENT_PATTERN = /\{[^{}]*:[^{}]*\}/;

/** `{id:int:min(5)}` becomes `{id}`, `{slug?}` becomes `{slug}`; other text is untouched. */
export function stripRouteConstraints(relativePath: string): string {
  return relativePath
    .split('/')
    .map((segment) => segment.replace(ROUTE_CONSTRAINT_PATTERN, '$1'))
    .join('/');
}

export function canonicalPath(route: string): string {
  const trimmed = route.replace(/^~+/, '').replace(/^\/+/, '').replace(/\/+$/, '');
  return `/${stripRouteConstraints(trimmed)}`;
}

export function versionSegment(policy: DocumentPolicy, version: number): string {
  return `${policy.versioningPrefix}${version}`;
}

/**
 * Canonical path without the route prefix and version segments. Both are
 * matched as whole segments.
 */
export function computeBareRoute(path: string, policy: DocumentPolicy, version: number): string {
  const prefixSegments = (policy.endpointRoutePrefix ?? '').split('/').filter(Boolean);
  let segments = path.split('/').filter(Boolean);

  if (prefixSegments.length > 0 && prefixSegments.every((segment, index) => segments[index] === segment)) {
    segments = segments.slice(prefixSegments.length);
  }

  const versionToken = versionSegment(policy, version);
  const versionIndex = segments.indexOf(versionToken);
  if (versionIndex >= 0) {
    segments = [...segments.slice(0, versionIndex), ...segments.slice(versionIndex + 1)];
  }

  return `/${segments.join('/')}`;
}

export function extractRouteTokens(path: string): string[] {
  return Array.from(path.matchAll(ROUTE_TOKEN_PATTERN), (match) => match[1]);
}

/**
 * Type hints from route constraints, keyed by lower-cased parameter name.
 * Constraints missing from the policy's map fall back to string.
 */
export function routeParameterTypeHints(route: string, policy: DocumentPolicy): Map<string, SchemaObject> {
  const hints = new Map<string, SchemaObject>();
  for (const segment of route.split('/')) {
    if (!CONSTRAINED_SEGMENT_PATTERN.test(segment)) {
      continue;
    }
    for (const match of segment.matchAll(ROUTE_TOKEN_PATTERN)) {
      const body = match[1].split('(')[0];
      const [rawName, rawType] = body.split(':');
      const name = rawName.replace(/\?$/, '').trim();
      const type = (rawType ?? '').replace(/\?$/, '').trim();
      if (!name) {
        continue;
      }
      const hint = policy.routeConstraintMap[type] ?? { type: 'string' };
      hints.set(name.toLowerCase(), { ...hint });
    }
  }
  return hints;
}

/**
 * Tag override when declared, else the configured segment of the bare route.
 * Undefined when auto-tagging is off for the document or the endpoint.
 */
export function deriveTag(bareRoute: string, descriptor: EndpointDescriptor, policy: DocumentPolicy): string | undefined {
  const index = policy.autoTagPathSegmentIndex;
  if (index <= 0 || descriptor.disableAutoTag) {
    return undefined;
  }
  if (descriptor.tagOverride !== undefined) {
    return formatTagName(descriptor.tagOverride, policy.tagCase, policy.tagStripSymbols);
  }
  const segments = bareRoute.split('/').filter(Boolean);
  if (segments.length < index) {
    return undefined;
  }
  return formatTagName(segments[index - 1], policy.tagCase, policy.tagStripSymbols);
}
