/**
 * Unit tests for foreign-key reference reconciliation
 */

import { describe, it, expect } from 'vitest';
import {
  findReferenceCandidate,
  normalizeReferenceName,
  reconcileReferences,
} from '../../src/lib/reconciler/index.js';
import { validateSchema } from '../../src/lib/validator/index.js';
import {
  attribute,
  customerOrderSchema,
  entity,
  foreignKey,
  primaryKey,
  schema,
} from '../fixtures/schemas.js';

describe('normalizeReferenceName', () => {
  it('should fold case, drop underscores and a trailing id', () => {
    expect(normalizeReferenceName('CustomerID')).toBe('customer');
    expect(normalizeReferenceName('customer_id')).toBe('customer');
    expect(normalizeReferenceName('Customer_Code')).toBe('customercode');
  });

  it('should keep a bare id', () => {
    expect(normalizeReferenceName('ID')).toBe('id');
  });
});

describe('findReferenceCandidate', () => {
  it('should prefer a normalized exact match over an earlier substring match', () => {
    expect(findReferenceCandidate('CustomerID', ['customer_code', 'customer_id'])).toEqual({
      name: 'customer_id',
      rule: 'normalized-exact',
    });
  });

  it('should fall back to the first substring match in declared order', () => {
    expect(findReferenceCandidate('Code', ['id', 'customer_code', 'code_name'])).toEqual({
      name: 'customer_code',
      rule: 'substring',
    });
  });

  it('should return null when nothing matches', () => {
    expect(findReferenceCandidate('CustomerID', ['code'])).toBeNull();
  });
});

describe('reconcileReferences', () => {
  it('should rewrite CustomerID to customer_id', () => {
    const input = customerOrderSchema();
    const result = reconcileReferences(input);

    const reference = result.schema.entities[1]?.attributes[1];
    expect(reference?.referencesColumn).toBe('customer_id');
    expect(result.corrections).toEqual([
      {
        entity: 'Order',
        attribute: 'customer_ref',
        referencesTable: 'Customer',
        from: 'CustomerID',
        to: 'customer_id',
        rule: 'normalized-exact',
      },
    ]);
    expect(result.gaps).toEqual([]);
  });

  it('should not modify its input', () => {
    const input = customerOrderSchema();
    reconcileReferences(input);
    expect(input.entities[1]?.attributes[1]?.referencesColumn).toBe('CustomerID');
  });

  it('should leave an unmatched reference alone so validation reports it once', () => {
    const input = customerOrderSchema([primaryKey('code', { dataType: 'string' })]);
    const result = reconcileReferences(input);

    expect(result.schema.entities[1]?.attributes[1]?.referencesColumn).toBe('CustomerID');
    expect(result.corrections).toEqual([]);
    expect(result.gaps).toEqual([
      {
        entity: 'Order',
        attribute: 'customer_ref',
        referencesTable: 'Customer',
        referencesColumn: 'CustomerID',
        reason: 'no-candidate',
      },
    ]);

    const validation = validateSchema(result.schema);
    expect(validation.errors).toHaveLength(1);
    expect(validation.errors[0]?.entity).toBe('Order');
    expect(validation.errors[0]?.attribute).toBe('customer_ref');
    expect(validation.errors[0]?.message).toBe(
      'Entity Order, attribute customer_ref: referenced attribute Customer.CustomerID does not exist',
    );
  });

  it('should record references to unknown entities as gaps', () => {
    const input = schema([entity('Order', [foreignKey('user_id', 'User', 'id')])]);
    expect(reconcileReferences(input).gaps[0]?.reason).toBe('unknown-entity');
  });

  it('should skip exact matches and non-foreign-key attributes', () => {
    const input = schema([
      entity('Customer', [primaryKey('id')]),
      entity('Order', [
        foreignKey('customer_id', 'Customer', 'id'),
        attribute('note', { referencesTable: 'Customer', referencesColumn: 'ID' }),
      ]),
    ]);
    const result = reconcileReferences(input);
    expect(result.corrections).toEqual([]);
    expect(result.schema).toEqual(input);
  });

  it('should be idempotent', () => {
    const once = reconcileReferences(customerOrderSchema());
    const twice = reconcileReferences(once.schema);

    expect(twice.schema).toEqual(once.schema);
    expect(twice.corrections).toEqual([]);
  });
});
