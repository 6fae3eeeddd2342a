import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors';
import { defineRecordMapper, parseFieldTag } from '../record-mapper';

interface Product {
  sku: string;
  title: string;
  price: number;
}

describe('parseFieldTag', () => {
  it('should parse a column name', () => {
    expect(parseFieldTag('title')).toEqual({ column: 'title', isPrimaryKey: false });
  });

  it('should parse the primary key option', () => {
    expect(parseFieldTag('sku;primary_key')).toEqual({ column: 'sku', isPrimaryKey: true });
  });

  it('should trim whitespace around parts', () => {
    expect(parseFieldTag(' sku ; primary_key ')).toEqual({ column: 'sku', isPrimaryKey: true });
  });

  it('should reject a missing column name', () => {
    expect(() => parseFieldTag('')).toThrow(ValidationError);
    expect(() => parseFieldTag(';primary_key')).toThrow('Field tag ";primary_key" has no column name');
  });

  it('should reject unknown options', () => {
    expect(() => parseFieldTag('sku;unique', 'sku')).toThrow(
      'Unknown field tag option "unique" in "sku;unique"',
    );
  });

  it('should report the field on errors', () => {
    try {
      parseFieldTag('', 'title');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('title');
      }
    }
  });
});

describe('defineRecordMapper', () => {
  const mapper = defineRecordMapper<Product>([
    { field: 'sku', tag: 'sku;primary_key' },
    { field: 'title', tag: 'product_title' },
    { field: 'price' },
  ]);

  it('should produce entries in declaration order', () => {
    expect(mapper({ sku: 'A-1', title: 'Lamp', price: 25 })).toEqual([
      { column: 'sku', value: 'A-1', isPrimaryKey: true },
      { column: 'product_title', value: 'Lamp', isPrimaryKey: false },
      { column: 'price', value: 25, isPrimaryKey: false },
    ]);
  });

  it('should validate tags when defined', () => {
    expect(() => defineRecordMapper<Product>([{ field: 'sku', tag: 'sku;index' }])).toThrow(
      ValidationError,
    );
  });

  it('should reject columns mapped twice', () => {
    expect(() =>
      defineRecordMapper<Product>([
        { field: 'title', tag: 'name' },
        { field: 'sku', tag: 'name' },
      ]),
    ).toThrow('Column "name" is mapped more than once');
  });
});
