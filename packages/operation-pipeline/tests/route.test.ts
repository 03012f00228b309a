import { describe, expect, test } from 'vitest';
import {
  canonicalPath,
  computeBareRoute,
  createDocumentPolicy,
  deriveTag,
  routeParameterTypeHints,
  stripRouteConstraints,
  type EndpointDescriptor
} from '../src/index';

const endpoint = (overrides: Partial<EndpointDescriptor> = {}): EndpointDescriptor => ({
  kind: 'endpoint',
  id: 'Orders.Get',
  route: '/sales-orders/{id}',
  verb: 'GET',
  ...overrides
});

describe('route normalization', () => {
  test('keeps only the parameter name of constrained tokens', () => {
    expect(stripRouteConstraints('orders/{id:int:min(5)}/{slug?}')).toBe('orders/{id}/{slug}');
    expect(canonicalPath('~/api/v1/orders/{id:int}/')).toBe('/api/v1/orders/{id}');
    expect(canonicalPath('orders')).toBe('/orders');
  });

  test('removes the route prefix and version as whole segments', () => {
    const policy = createDocumentPolicy({ endpointRoutePrefix: 'api' });
    expect(computeBareRoute('/api/v1/orders/{id}', policy, 1)).toBe('/orders/{id}');
    expect(computeBareRoute('/apis/v1/orders', policy, 1)).toBe('/apis/orders');
    expect(computeBareRoute('/api/v10/orders', policy, 1)).toBe('/v10/orders');
  });

  test('exposes constraint types as hints and falls back to string', () => {
    const policy = createDocumentPolicy();
    const hints = routeParameterTypeHints('/orders/{Id:int}/{code:alpha:length(3)}/{when:datetime?}/{x:custom}/{slug}', policy);

    expect(hints.get('id')).toEqual({ type: 'integer', format: 'int32' });
    expect(hints.get('code')).toEqual({ type: 'string' });
    expect(hints.get('when')).toEqual({ type: 'string', format: 'date-time' });
    expect(hints.get('x')).toEqual({ type: 'string' });
    expect(hints.has('slug')).toBe(false);
  });
});

describe('deriveTag', () => {
  test('uses the configured segment of the bare route', () => {
    const policy = createDocumentPolicy();
    expect(deriveTag('/sales-orders/{id}', endpoint(), policy)).toBe('Sales-Orders');

    const stripped = createDocumentPolicy({ tagStripSymbols: true, autoTagPathSegmentIndex: 2 });
    expect(deriveTag('/admin/sales-orders', endpoint(), stripped)).toBe('SalesOrders');
  });

  test('prefers the endpoint override', () => {
    const policy = createDocumentPolicy({ tagCase: 'lower' });
    expect(deriveTag('/sales-orders', endpoint({ tagOverride: 'Customer Accounts' }), policy)).toBe('customer accounts');
  });

  test('yields no tag when disabled or the route is too short', () => {
    expect(deriveTag('/orders', endpoint({ disableAutoTag: true }), createDocumentPolicy())).toBeUndefined();
    expect(deriveTag('/orders', endpoint(), createDocumentPolicy({ autoTagPathSegmentIndex: 0 }))).toBeUndefined();
    expect(deriveTag('/orders', endpoint(), createDocumentPolicy({ autoTagPathSegmentIndex: 3 }))).toBeUndefined();
  });
});
