import { describe, it, expect } from 'vitest';
import { OutputFormatter, cellToString } from '../cli-helpers.js';

describe('cellToString', () => {
  it('renders scalars, lists and missing values', () => {
    expect(cellToString(undefined)).toBe('');
    expect(cellToString(null)).toBe('');
    expect(cellToString('com.shop.orders')).toBe('com.shop.orders');
    expect(cellToString(3)).toBe('3');
    expect(cellToString(['EXTERN', 'com.shop.billing'])).toBe('EXTERN, com.shop.billing');
    expect(cellToString({ a: 1 })).toBe('{"a":1}');
  });
});

describe('OutputFormatter', () => {
  const rows = [{ packageName: 'com.shop.orders', calls: ['EXTERN', 'com.shop.billing'] }];

  it('formats JSON with two-space indentation', () => {
    expect(OutputFormatter.format({ files: ['a.txt'] }, 'json')).toBe(
      '{\n  "files": [\n    "a.txt"\n  ]\n}'
    );
  });

  it('formats YAML lists of records', () => {
    const yaml = OutputFormatter.format(
      [{ packageName: 'com.shop.orders', uses: ['a.b'], calls: [] }],
      'yaml'
    );
    expect(yaml).toBe('- packageName: com.shop.orders\n  uses:\n    - a.b\n  calls: []');
  });

  it('quotes YAML strings that need it', () => {
    expect(OutputFormatter.format({ path: 'POST : /invoices' }, 'yaml')).toBe(
      'path: "POST : /invoices"'
    );
  });

  it('formats a table row per record', () => {
    const lines = OutputFormatter.format(rows, 'table').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('com.shop.orders | EXTERN, com.shop.billing');
  });

  it('truncates long cells', () => {
    const long = 'x'.repeat(60);
    const lines = OutputFormatter.formatTable([{ name: long }]).split('\n');
    expect(lines[2]).toBe('x'.repeat(47) + '...');
  });
});
