import { describe, it, expect } from 'vitest';
import { sanitizeSchema } from './schema-sanitizer.js';
import type { JSONSchema } from './json-schema.js';

describe('sanitizeSchema', () => {
  it('should strip document metadata at every depth', () => {
    const schema: JSONSchema = {
      $schema: 'http://json-schema.org/draft-07/schema#',
      $id: 'urn:example:order',
      title: 'Order',
      type: 'object',
      properties: {
        item: { type: 'string', title: 'Item', description: 'What to order' },
        extras: { type: 'array', title: 'Extras', items: { type: 'string', title: 'Extra' } },
      },
      required: ['item'],
      definitions: {},
    };

    expect(sanitizeSchema(schema)).toEqual({
      type: 'object',
      properties: {
        item: { type: 'string', description: 'What to order' },
        extras: { type: 'array', items: { type: 'string' } },
      },
      required: ['item'],
      additionalProperties: false,
    });
  });

  it('should keep properties named like metadata keywords', () => {
    const schema: JSONSchema = {
      type: 'object',
      properties: { title: { type: 'string', title: 'Title' }, $id: { type: 'integer' } },
    };

    expect(sanitizeSchema(schema)).toEqual({
      type: 'object',
      properties: { title: { type: 'string' }, $id: { type: 'integer' } },
      additionalProperties: false,
    });
  });

  it('should close nested objects unless they say otherwise', () => {
    const schema: JSONSchema = {
      type: 'object',
      properties: {
        open: { type: 'object', additionalProperties: true },
        tags: { type: 'object', additionalProperties: { type: 'object', title: 'Tag' } },
      },
    };

    expect(sanitizeSchema(schema)).toEqual({
      type: 'object',
      properties: {
        open: { type: 'object', additionalProperties: true },
        tags: { type: 'object', additionalProperties: { type: 'object', additionalProperties: false } },
      },
      additionalProperties: false,
    });
  });

  it('should collapse an optional union to its branch, keeping the outer fields', () => {
    const schema: JSONSchema = {
      anyOf: [{ type: 'string', description: 'inner', default: 'a' }, { type: 'null' }],
      description: 'outer',
      default: null,
    };

    expect(sanitizeSchema(schema)).toEqual({ type: 'string', description: 'outer', default: null });
  });

  it('should close an object reached through an optional union', () => {
    const schema: JSONSchema = {
      oneOf: [{ type: 'null' }, { type: 'object', title: 'Filter', properties: { q: { type: 'string' } } }],
    };

    expect(sanitizeSchema(schema)).toEqual({
      type: 'object',
      properties: { q: { type: 'string' } },
      additionalProperties: false,
    });
  });

  it('should keep unions with several non-null branches', () => {
    const schema: JSONSchema = {
      anyOf: [{ type: 'string', title: 'S' }, { type: 'number' }, { type: 'null' }],
    };

    expect(sanitizeSchema(schema)).toEqual({
      anyOf: [{ type: 'string' }, { type: 'number' }, { type: 'null' }],
    });
  });

  it('should reduce nullable type lists', () => {
    expect(sanitizeSchema({ type: ['integer', 'null'] })).toEqual({ type: 'integer' });
    expect(sanitizeSchema({ type: ['string', 'number'] })).toEqual({ type: ['string', 'number'] });
    expect(sanitizeSchema({ type: ['null'] })).toEqual({ type: ['null'] });
  });

  it('should visit tuple items', () => {
    const schema: JSONSchema = {
      type: 'array',
      prefixItems: [{ type: 'object', title: 'Head' }, { type: ['number', 'null'] }],
    };

    expect(sanitizeSchema(schema)).toEqual({
      type: 'array',
      prefixItems: [{ type: 'object', additionalProperties: false }, { type: 'number' }],
    });
  });

  it('should leave the input untouched', () => {
    const schema: JSONSchema = { title: 'T', type: 'object', properties: { a: { type: ['string', 'null'] } } };
    const before = structuredClone(schema);

    sanitizeSchema(schema);

    expect(schema).toEqual(before);
  });
});
