import { describe, expect, test } from 'vitest';
import {
  SchemaRegistry,
  getAllProperties,
  pruneBodyField,
  removeEmptyComponentSchemas,
  schemaRef,
  type RequestBodyDescription
} from '../src/index';

function createFixture() {
  const registry = new SchemaRegistry({
    BaseRequest: {
      type: 'object',
      properties: { id: { type: 'integer' }, tenantId: { type: 'string' } },
      required: ['id', 'tenantId']
    },
    OrderRequest: {
      type: 'object',
      allOf: [schemaRef('BaseRequest')],
      properties: { note: { type: 'string' } },
      required: ['note', 'id']
    },
    Labels: { type: 'object', additionalProperties: { type: 'string' } }
  });
  const media = { schema: schemaRef('OrderRequest') };
  const body: RequestBodyDescription = {
    name: 'OrderRequest',
    required: true,
    content: { 'application/json': media, 'application/xml': media }
  };
  return { registry, body };
}

describe('pruneBodyField', () => {
  test('removes inherited properties and their required entries', () => {
    const { registry, body } = createFixture();

    const wireName = pruneBodyField(body, 'TenantId', { registry, namingPolicy: 'camelCase' });

    expect(wireName).toBe('tenantId');
    expect(registry.get('BaseRequest')?.properties).toEqual({ id: { type: 'integer' } });
    expect(registry.get('BaseRequest')?.required).toEqual(['id']);
    expect(getAllProperties(body.content['application/json'].schema, registry).map((prop) => prop.key)).toEqual([
      'note',
      'id'
    ]);
  });

  test('is idempotent', () => {
    const { registry, body } = createFixture();

    pruneBodyField(body, 'Id', { registry, namingPolicy: 'camelCase' });
    const afterFirst = structuredClone(registry.toJSON());
    pruneBodyField(body, 'Id', { registry, namingPolicy: 'camelCase' });

    expect(registry.toJSON()).toEqual(afterFirst);
    expect(registry.get('OrderRequest')?.required).toEqual(['note']);
    expect(registry.get('BaseRequest')?.required).toEqual(['tenantId']);
  });

  test('returns the wire name even without a body', () => {
    const { registry } = createFixture();
    expect(pruneBodyField(null, 'CustomerId', { registry, namingPolicy: 'snakeCase' })).toBe('customer_id');
  });
});

describe('removeEmptyComponentSchemas', () => {
  test('deletes object components left without properties and detaches them', () => {
    const { registry, body } = createFixture();
    pruneBodyField(body, 'Id', { registry, namingPolicy: 'camelCase' });
    pruneBodyField(body, 'TenantId', { registry, namingPolicy: 'camelCase' });

    expect(removeEmptyComponentSchemas(registry)).toEqual(['BaseRequest']);
    expect(registry.has('BaseRequest')).toBe(false);
    expect(registry.get('OrderRequest')?.allOf).toEqual([]);
    expect(registry.has('Labels')).toBe(true);
  });
});
