/**
 * Generated associations loaded into Sequelize models
 * Models are defined against a mysql dialect instance that never connects.
 */

import { describe, it, expect } from 'vitest';
import { DataTypes, Sequelize, type Model, type ModelStatic } from 'sequelize';
import { synthesizeProject } from '../../src/lib/synthesizer/index.js';
import type { Schema } from '../../src/types/schema.js';
import {
  entity,
  foreignKey,
  primaryKey,
  relationship,
  schema,
} from '../fixtures/schemas.js';

/**
 * Run the association statements of the generated src/models/index.ts against fresh models
 */
function loadModels(input: Schema): Map<string, ModelStatic<Model>> {
  const source = synthesizeProject(input).get('src/models/index.ts') ?? '';
  const statements = source
    .split('\n')
    .filter((line) => line.length > 0 && !line.startsWith('import ') && !line.startsWith('export '));

  const sequelize = new Sequelize({ dialect: 'mysql', logging: false });
  const models = new Map<string, ModelStatic<Model>>();
  for (const item of input.entities) {
    models.set(
      item.name,
      sequelize.define(
        item.name,
        { id: { type: DataTypes.INTEGER, primaryKey: true, autoIncrement: true } },
        { tableName: item.tableName ?? item.name.toLowerCase() },
      ),
    );
  }

  const names = [...models.keys()];
  const associate = new Function(...names, statements.join('\n'));
  associate(...models.values());
  return models;
}

function associationNames(models: Map<string, ModelStatic<Model>>, name: string): string[] {
  return Object.keys(models.get(name)?.associations ?? {});
}

describe('Generated associations in Sequelize', () => {
  it('should load one-to-many and many-to-many associations', () => {
    const models = loadModels(
      schema(
        [
          entity('Customer', [primaryKey('id')]),
          entity('Order', [primaryKey('id'), foreignKey('customer_id', 'Customer', 'id')]),
          entity('Student', [primaryKey('id')]),
          entity('Course', [primaryKey('id')]),
        ],
        [relationship('Customer', 'Order'), relationship('Student', 'Course', 'many-to-many')],
      ),
    );

    expect(associationNames(models, 'Customer')).toEqual(['Orders']);
    expect(associationNames(models, 'Order')).toEqual(['Customer']);
    expect(associationNames(models, 'Student')).toEqual(['Courses']);
    expect(associationNames(models, 'Course')).toEqual(['Students']);
  });

  it('should load a self-referencing many-to-many association', () => {
    const models = loadModels(
      schema(
        [entity('Employee', [primaryKey('id')])],
        [relationship('Employee', 'Employee', 'many-to-many')],
      ),
    );

    expect(associationNames(models, 'Employee')).toEqual(['relatedEmployee']);
  });

  it('should load a self-referencing one-to-many association', () => {
    const models = loadModels(
      schema(
        [entity('Employee', [primaryKey('id'), foreignKey('manager_id', 'Employee', 'id')])],
        [relationship('Employee', 'Employee', 'N:1')],
      ),
    );

    expect(associationNames(models, 'Employee').sort()).toEqual(['Employee', 'Employees']);
  });
});
