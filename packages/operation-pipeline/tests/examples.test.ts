import { describe, expect, test } from 'vitest';
import { createDocumentPolicy, disambiguateLabels, projectExample, serializeExample } from '../src/index';

describe('disambiguateLabels', () => {
  test('suffixes every member of a duplicated group and leaves the input alone', () => {
    const input = [
      { label: 'Draft', value: {} },
      { label: 'Final', value: {} },
      { label: 'Draft', value: {} },
      { label: 'Draft', value: {} }
    ];

    expect(disambiguateLabels(input).map((example) => example.label)).toEqual(['Draft 1', 'Final', 'Draft 2', 'Draft 3']);
    expect(input[0].label).toBe('Draft');
  });

  test('skips suffixes already used by another label', () => {
    const labels = disambiguateLabels([
      { label: 'Basic', value: {} },
      { label: 'Basic', value: {} },
      { label: 'Basic 1', value: {} }
    ]).map((example) => example.label);

    expect(labels).toEqual(['Basic 2', 'Basic 3', 'Basic 1']);
  });
});

describe('projectExample', () => {
  const policy = createDocumentPolicy();

  test('drops pruned keys case-insensitively', () => {
    expect(projectExample({ CustomerId: 'c-1', Note: 'hello' }, { removed: ['customerid'], policy })).toEqual({
      note: 'hello'
    });
  });

  test('serializes lists and primitives as they are', () => {
    expect(projectExample([{ CustomerId: 'c-1' }], { removed: ['customerId'], policy })).toEqual([
      { customerId: 'c-1' }
    ]);
    expect(projectExample('plain', { removed: [], policy })).toBe('plain');
  });

  test('descends into the override field by bind-from name', () => {
    const projected = projectExample(
      { Meta: 'x', document: { Title: 'Report' } },
      { removed: [], overrideFields: [{ name: 'Doc', bindFrom: 'document' }], policy }
    );
    expect(projected).toEqual({ title: 'Report' });
  });
});

describe('serializeExample', () => {
  test('applies the naming policy at every depth and skips undefined values', () => {
    expect(
      serializeExample({ OrderLines: [{ LineId: 1, Extra: undefined }], Total: 2 }, 'snakeCase')
    ).toEqual({ order_lines: [{ line_id: 1 }], total: 2 });
  });
});
