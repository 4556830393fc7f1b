/**
 * Unit tests for the canonical wire document
 */

import { describe, it, expect } from 'vitest';
import {
  canonicalJson,
  normalizeDocument,
  toWireDocument,
} from '../../../src/lib/normalizer/index.js';
import type { Schema } from '../../../src/types/schema.js';

const schema: Schema = {
  projectName: 'Library',
  entities: [
    {
      name: 'Author',
      tableName: 'authors',
      attributes: [
        {
          name: 'id',
          dataType: 'uuid',
          isPrimaryKey: true,
          isForeignKey: false,
          isNullable: false,
          isUnique: true,
        },
        {
          name: 'name',
          dataType: 'varchar',
          isPrimaryKey: false,
          isForeignKey: false,
          isNullable: false,
          isUnique: false,
          maxLength: 120,
        },
      ],
    },
    {
      name: 'Book',
      attributes: [
        {
          name: 'isbn',
          dataType: 'char',
          isPrimaryKey: true,
          isForeignKey: false,
          isNullable: false,
          isUnique: true,
          maxLength: 13,
        },
        {
          name: 'author_id',
          dataType: 'uuid',
          isPrimaryKey: false,
          isForeignKey: true,
          isNullable: true,
          isUnique: false,
          referencesTable: 'Author',
          referencesColumn: 'id',
        },
        {
          name: 'in_print',
          dataType: 'boolean',
          isPrimaryKey: false,
          isForeignKey: false,
          isNullable: false,
          isUnique: false,
          defaultValue: true,
        },
      ],
    },
  ],
  relationships: [
    {
      name: 'writes',
      sourceEntity: 'Author',
      targetEntity: 'Book',
      relationshipType: '1:N (Non-Identifying)',
      targetCardinality: '0..*',
    },
  ],
  metadata: { analysisTimestamp: '2024-05-01T12:00:00.000Z' },
};

describe('toWireDocument', () => {
  it('should omit absent optional fields', () => {
    const wire = toWireDocument(schema);
    expect(Object.keys(wire.entities[1])).toEqual(['name', 'attributes']);
    expect(Object.keys(wire.relationships[0])).toEqual([
      'name',
      'sourceEntity',
      'targetEntity',
      'relationshipType',
      'targetCardinality',
    ]);
  });

  it('should round-trip through JSON and the normalizer', () => {
    const text = JSON.stringify(toWireDocument(schema));
    const result = normalizeDocument(JSON.parse(text));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual(schema);
  });
});

describe('canonicalJson', () => {
  it('should sort keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"e":0,"f":1}]},"b":1}',
    );
  });

  it('should skip undefined properties', () => {
    expect(canonicalJson({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });
});
