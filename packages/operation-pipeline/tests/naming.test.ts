import { describe, expect, test } from 'vitest';
import { applyNamingPolicy, formatTagName, toTitleCase } from '../src/index';

describe('applyNamingPolicy', () => {
  test('camel cases leading capitals the way JSON serializers do', () => {
    expect(applyNamingPolicy('CustomerId', 'camelCase')).toBe('customerId');
    expect(applyNamingPolicy('URLValue', 'camelCase')).toBe('urlValue');
    expect(applyNamingPolicy('ID', 'camelCase')).toBe('id');
    expect(applyNamingPolicy('X-Tenant', 'camelCase')).toBe('x-Tenant');
    expect(applyNamingPolicy('note', 'camelCase')).toBe('note');
  });

  test('separates words for snake and kebab case', () => {
    expect(applyNamingPolicy('CustomerId', 'snakeCase')).toBe('customer_id');
    expect(applyNamingPolicy('CustomerId', 'kebabCase')).toBe('customer-id');
  });

  test('keeps names untouched without a policy', () => {
    expect(applyNamingPolicy('CustomerId', 'none')).toBe('CustomerId');
  });
});

describe('formatTagName', () => {
  test('title cases each word and keeps acronyms', () => {
    expect(toTitleCase('sales-orders')).toBe('Sales-Orders');
    expect(toTitleCase('API keys')).toBe('API Keys');
  });

  test('applies case then strips symbols', () => {
    expect(formatTagName('sales-orders', 'title', true)).toBe('SalesOrders');
    expect(formatTagName('Sales_Orders', 'lower', false)).toBe('sales_orders');
    expect(formatTagName('sales-orders', 'none', false)).toBe('sales-orders');
  });
});
