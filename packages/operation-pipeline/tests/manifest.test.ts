import { describe, expect, test } from 'vitest';
import { ManifestValidationError, parseManifest } from '../src/index';

describe('parseManifest', () => {
  test('accepts managed endpoints and foreign routes', () => {
    const manifest = parseManifest({
      info: { title: 'Orders', version: '1.0.0' },
      components: { schemas: { Order: { type: 'object', properties: { id: { type: 'integer' } } } } },
      endpoints: [
        {
          kind: 'endpoint',
          id: 'Orders.Create',
          route: '/orders',
          verb: 'POST',
          request: {
            name: 'Order',
            fields: [{ name: 'Token', bindings: [{ kind: 'header', headerName: 'X-Token', required: false }] }]
          },
          summary: { requestExamples: [{ label: 'Empty', value: null }] }
        },
        { path: '/health', method: 'get', operation: { summary: 'Health probe' } }
      ]
    });

    expect(manifest.endpoints).toHaveLength(2);
    const [managed, foreign] = manifest.endpoints;
    expect(managed.kind).toBe('endpoint');
    expect(foreign.kind).toBeUndefined();
    expect(manifest.components?.schemas.Order).toEqual({ type: 'object', properties: { id: { type: 'integer' } } });
  });

  test('defaults missing request fields to an empty list', () => {
    const manifest = parseManifest({
      endpoints: [{ kind: 'endpoint', id: 'Ping', route: '/ping', verb: 'GET', request: { name: 'Ping', kind: 'empty' } }]
    });
    const [entry] = manifest.endpoints;
    expect(entry.kind === 'endpoint' ? entry.request?.fields : undefined).toEqual([]);
  });

  test('reports unknown binding kinds with their path', () => {
    expect(() =>
      parseManifest({
        endpoints: [
          {
            kind: 'endpoint',
            id: 'Orders.Create',
            route: '/orders',
            verb: 'POST',
            request: { name: 'Order', fields: [{ name: 'Token', bindings: [{ kind: 'cookie' }] }] }
          }
        ]
      })
    ).toThrow(ManifestValidationError);
  });

  test('rejects unsupported verbs', () => {
    expect(() =>
      parseManifest({ endpoints: [{ kind: 'endpoint', id: 'Orders.Trace', route: '/orders', verb: 'TRACE' }] })
    ).toThrow(/^Invalid endpoint manifest: /);
  });
});
