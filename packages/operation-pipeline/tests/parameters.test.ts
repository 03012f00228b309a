import { describe, expect, test } from 'vitest';
import {
  ParamDescriptionIndex,
  SchemaRegistry,
  collectParamDescriptions,
  createDocumentPolicy,
  createParameter,
  mergeParameters,
  schemaRef,
  type ParameterContext,
  type RequestBodyDescription,
  type SchemaObject
} from '../src/index';

function context(overrides: Partial<ParameterContext> = {}): ParameterContext {
  return {
    policy: createDocumentPolicy(),
    registry: new SchemaRegistry({ Address: { type: 'object', properties: { city: { type: 'string' } } } }),
    descriptions: new ParamDescriptionIndex(),
    routeHints: new Map(),
    ...overrides
  };
}

describe('collectParamDescriptions', () => {
  test('lets later tiers override only the values they carry', () => {
    const registry = new SchemaRegistry({
      Request: {
        type: 'object',
        properties: {
          customerId: { type: 'string', description: 'From schema', example: 'schema-id' },
          note: { type: 'string', description: 'Schema note' }
        }
      }
    });
    const body: RequestBodyDescription = {
      name: 'Request',
      required: true,
      content: { 'application/json': { schema: schemaRef('Request') } }
    };

    const index = collectParamDescriptions({
      body,
      registry,
      namingPolicy: 'camelCase',
      summary: {
        params: { CustomerId: 'From summary' },
        requestExamples: [{ label: 'One', value: { Note: 'example note' } }]
      }
    });

    expect(index.get('CUSTOMERID')).toEqual({ description: 'From summary', example: 'schema-id' });
    expect(index.get('note')).toEqual({ description: 'Schema note', example: 'example note' });
  });
});

describe('createParameter', () => {
  test('prefers the schema override and marks optional nullable refs', () => {
    const parameter = createParameter(context(), {
      kind: 'query',
      field: {
        name: 'Address',
        schema: { type: 'string' },
        schemaOverride: { schema: schemaRef('Address'), nullable: true }
      }
    });

    expect(parameter).toEqual({
      name: 'address',
      in: 'query',
      required: false,
      schema: { allOf: [schemaRef('Address')], nullable: true }
    });
  });

  test('falls back to the route hint and samples required object examples', () => {
    const withHint = createParameter(context({ routeHints: new Map<string, SchemaObject>([['id', { type: 'integer', format: 'int64' }]]) }), {
      kind: 'path',
      name: 'id',
      required: true
    });
    expect(withHint.schema).toEqual({ type: 'integer', format: 'int64' });

    const sampled = createParameter(context(), { kind: 'header', field: { name: 'Origin', schema: schemaRef('Address') } });
    expect(sampled.required).toBe(true);
    expect(sampled.example).toEqual({ city: 'string' });
  });

  test('puts defaults on the parameter in the legacy dialect', () => {
    const parameter = createParameter(context({ policy: createDocumentPolicy({ dialect: 'swagger2' }) }), {
      kind: 'query',
      field: { name: 'Limit', schema: { type: 'integer' }, defaultValue: 10 }
    });
    expect(parameter).toEqual({
      name: 'limit',
      in: 'query',
      required: false,
      schema: { type: 'integer' },
      default: 10
    });
  });

  test('uses bind-from names verbatim', () => {
    const parameter = createParameter(context(), { kind: 'query', field: { name: 'PageNumber', bindFrom: 'p' } });
    expect(parameter.name).toBe('p');
  });
});

describe('mergeParameters', () => {
  test('replaces entries with the same name and location', () => {
    const merged = mergeParameters(
      [
        { name: 'id', in: 'path', required: true, schema: { type: 'string' } },
        { name: 'id', in: 'query', required: false, schema: { type: 'string' } }
      ],
      [{ name: 'id', in: 'path', required: true, schema: { type: 'integer' } }]
    );
    expect(merged).toEqual([
      { name: 'id', in: 'query', required: false, schema: { type: 'string' } },
      { name: 'id', in: 'path', required: true, schema: { type: 'integer' } }
    ]);
  });
});
