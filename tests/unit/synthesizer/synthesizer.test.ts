/**
 * Unit tests for project synthesis
 */

import { describe, it, expect } from 'vitest';
import {
  FileTreeBuilder,
  resolveSynthesizerOptions,
  synthesizeProject,
} from '../../../src/lib/synthesizer/index.js';
import { SynthesisError } from '../../../src/utils/errors.js';
import type { Schema } from '../../../src/types/schema.js';
import {
  attribute,
  entity,
  foreignKey,
  primaryKey,
  relationship,
  schema,
} from '../../fixtures/schemas.js';

function shopSchema(): Schema {
  return schema(
    [
      entity('Customer', [
        primaryKey('id'),
        attribute('name', { isNullable: false }),
        attribute('email', { dataType: 'varchar', maxLength: 120, isUnique: true }),
      ]),
      entity('Order', [
        primaryKey('id'),
        foreignKey('customer_id', 'Customer', 'id', { isNullable: false }),
        attribute('total', { dataType: 'decimal' }),
      ]),
    ],
    [relationship('Customer', 'Order')],
    'Corner Shop',
  );
}

function file(output: Map<string, string>, path: string): string {
  const content = output.get(path);
  if (content === undefined) {
    throw new Error(`Missing file: ${path}`);
  }
  return content;
}

describe('synthesizeProject', () => {
  it('should emit shared units, then four units per entity in order, then aggregators', () => {
    const output = synthesizeProject(shopSchema());

    expect([...output.keys()]).toEqual([
      'package.json',
      'tsconfig.json',
      '.env.example',
      'README.md',
      'src/index.ts',
      'src/app.ts',
      'src/config/database.ts',
      'src/middleware/errorHandler.ts',
      'src/middleware/validateRequest.ts',
      'src/utils/pagination.ts',
      'src/models/Customer.ts',
      'src/services/customerService.ts',
      'src/controllers/customerController.ts',
      'src/routes/customerRoutes.ts',
      'src/models/Order.ts',
      'src/services/orderService.ts',
      'src/controllers/orderController.ts',
      'src/routes/orderRoutes.ts',
      'src/models/index.ts',
      'src/routes/index.ts',
    ]);
  });

  it('should be deterministic', () => {
    const first = synthesizeProject(shopSchema());
    const second = synthesizeProject(shopSchema());
    expect([...second.entries()]).toEqual([...first.entries()]);
  });

  it('should render the model unit', () => {
    const output = synthesizeProject(shopSchema());

    expect(file(output, 'src/models/Customer.ts')).toBe(
      [
        "import { DataTypes, Model, Optional } from 'sequelize';",
        "import { sequelize } from '../config/database';",
        '',
        'export interface CustomerAttributes {',
        '  id: number;',
        '  name: string;',
        '  email: string | null;',
        '  createdAt: Date;',
        '  updatedAt: Date;',
        '}',
        '',
        "export type CustomerCreationAttributes = Optional<CustomerAttributes, 'id' | 'email' | 'createdAt' | 'updatedAt'>;",
        '',
        'export class Customer',
        '  extends Model<CustomerAttributes, CustomerCreationAttributes>',
        '  implements CustomerAttributes',
        '{',
        '  declare id: number;',
        '  declare name: string;',
        '  declare email: string | null;',
        '  declare createdAt: Date;',
        '  declare updatedAt: Date;',
        '}',
        '',
        'Customer.init(',
        '  {',
        '    id: {',
        '      type: DataTypes.INTEGER,',
        '      primaryKey: true,',
        '      autoIncrement: true,',
        '      allowNull: false,',
        '    },',
        '    name: {',
        '      type: DataTypes.STRING,',
        '      allowNull: false,',
        '    },',
        '    email: {',
        '      type: DataTypes.STRING(120),',
        '      allowNull: true,',
        '      unique: true,',
        '    },',
        '    createdAt: {',
        '      type: DataTypes.DATE,',
        '      allowNull: false,',
        '      defaultValue: DataTypes.NOW,',
        '    },',
        '    updatedAt: {',
        '      type: DataTypes.DATE,',
        '      allowNull: false,',
        '      defaultValue: DataTypes.NOW,',
        '    },',
        '  },',
        '  {',
        '    sequelize,',
        "    modelName: 'Customer',",
        "    tableName: 'customer',",
        '    timestamps: true,',
        '  },',
        ');',
        '',
        'export default Customer;',
        '',
      ].join('\n'),
    );
  });

  it('should index foreign-key columns in the model options', () => {
    const output = synthesizeProject(shopSchema());

    expect(file(output, 'src/models/Order.ts')).toContain(
      [
        '    timestamps: true,',
        '    indexes: [',
        "      { fields: ['customer_id'] },",
        '    ],',
        '  },',
      ].join('\n'),
    );
    expect(file(output, 'src/models/Customer.ts')).not.toContain('indexes:');
  });

  it('should render routes with required-field validation', () => {
    const output = synthesizeProject(shopSchema());

    expect(file(output, 'src/routes/orderRoutes.ts')).toBe(
      [
        "import { Router } from 'express';",
        "import { orderController } from '../controllers/orderController';",
        "import { requireFields } from '../middleware/validateRequest';",
        '',
        "const REQUIRED_FIELDS = ['customer_id'];",
        '',
        'const router = Router();',
        '',
        "router.get('/', orderController.list);",
        "router.get('/search', orderController.search);",
        "router.get('/:id', orderController.getById);",
        "router.post('/', requireFields(REQUIRED_FIELDS), orderController.create);",
        "router.put('/:id', orderController.update);",
        "router.delete('/:id', orderController.remove);",
        '',
        'export default router;',
        '',
      ].join('\n'),
    );
  });

  it('should search textual fields with the dialect operator', () => {
    const postgres = synthesizeProject(shopSchema());
    const customerService = file(postgres, 'src/services/customerService.ts');
    expect(customerService).toContain("const SEARCHABLE_FIELDS: string[] = ['name', 'email'];");
    expect(customerService).toContain('[Op.iLike]: pattern');
    expect(file(postgres, 'src/services/orderService.ts')).toContain(
      'const SEARCHABLE_FIELDS: string[] = [];',
    );

    const sqlite = synthesizeProject(shopSchema(), { databaseDialect: 'sqlite' });
    expect(file(sqlite, 'src/services/customerService.ts')).toContain('[Op.like]: pattern');
  });

  it('should generate associations and the route aggregator', () => {
    const output = synthesizeProject(shopSchema());

    expect(file(output, 'src/models/index.ts')).toBe(
      [
        "import { Customer } from './Customer';",
        "import { Order } from './Order';",
        '',
        "Customer.hasMany(Order, { foreignKey: 'customer_id' });",
        "Order.belongsTo(Customer, { foreignKey: 'customer_id' });",
        '',
        'export { Customer, Order };',
        '',
      ].join('\n'),
    );
    expect(file(output, 'src/routes/index.ts')).toBe(
      [
        "import { Router } from 'express';",
        "import customerRoutes from './customerRoutes';",
        "import orderRoutes from './orderRoutes';",
        '',
        'const router = Router();',
        '',
        "router.use('/customer', customerRoutes);",
        "router.use('/order', orderRoutes);",
        '',
        'export default router;',
        '',
      ].join('\n'),
    );
  });

  it('should fold N:1 onto 1:N and skip repeated pairs and unknown endpoints', () => {
    const input = shopSchema();
    input.relationships.push(relationship('Order', 'Customer', 'N:1'), relationship('Order', 'Ghost'));

    const models = file(synthesizeProject(input), 'src/models/index.ts');
    expect(models.match(/hasMany/g)).toHaveLength(1);
    expect(models).not.toContain('Ghost');
  });

  it('should generate one-to-one and many-to-many associations', () => {
    const input = schema(
      [
        entity('User', [primaryKey('id')]),
        entity('Profile', [primaryKey('id'), foreignKey('user_id', 'User', 'id')]),
        entity('Student', [primaryKey('id')]),
        entity('Course', [primaryKey('id')]),
      ],
      [relationship('User', 'Profile', '1:1'), relationship('Student', 'Course', 'many-to-many')],
    );
    const models = file(synthesizeProject(input), 'src/models/index.ts');

    expect(models).toContain("User.hasOne(Profile, { foreignKey: 'user_id' });");
    expect(models).toContain("Profile.belongsTo(User, { foreignKey: 'user_id' });");
    expect(models).toContain("Student.belongsToMany(Course, { through: 'student_course' });");
    expect(models).toContain("Course.belongsToMany(Student, { through: 'student_course' });");
  });

  it('should alias a self-referencing many-to-many association', () => {
    const input = schema(
      [entity('Employee', [primaryKey('id')])],
      [relationship('Employee', 'Employee', 'many-to-many')],
    );
    const models = file(synthesizeProject(input), 'src/models/index.ts');

    expect(models.match(/belongsToMany/g)).toHaveLength(1);
    expect(models).toContain(
      "Employee.belongsToMany(Employee, { through: 'employee_employee', as: 'relatedEmployee', foreignKey: 'employee_id', otherKey: 'related_employee_id' });",
    );
  });

  it('should use an explicit table name for storage and the resource path', () => {
    const input = schema([entity('Person', [primaryKey('id')], 'people')]);
    const output = synthesizeProject(input, { apiPrefix: '/v1' });

    expect(file(output, 'src/models/Person.ts')).toContain("tableName: 'people',");
    expect(file(output, 'src/routes/index.ts')).toContain("router.use('/people', personRoutes);");
    expect(file(output, 'src/app.ts')).toContain("app.use('/v1', routes);");
    expect(file(output, 'README.md')).toContain('| Person | `/v1/people` | none |');
  });

  it('should suffix entity type names that clash with generated imports', () => {
    const output = synthesizeProject(schema([entity('Model', [primaryKey('id')])]));
    expect(output.has('src/models/ModelEntity.ts')).toBe(true);
    expect(output.has('src/services/modelEntityService.ts')).toBe(true);
  });

  it('should write the manifest for the chosen dialect', () => {
    const postgres = JSON.parse(file(synthesizeProject(shopSchema()), 'package.json'));
    expect(postgres.name).toBe('corner-shop');
    expect(Object.keys(postgres.dependencies)).toEqual([
      'cors',
      'dotenv',
      'express',
      'pg',
      'pg-hstore',
      'sequelize',
    ]);

    const mysql = JSON.parse(
      file(synthesizeProject(shopSchema(), { databaseDialect: 'mysql', packageName: 'shop-api' }), 'package.json'),
    );
    expect(mysql.name).toBe('shop-api');
    expect(Object.keys(mysql.dependencies)).toContain('mysql2');
    expect(Object.keys(mysql.dependencies)).not.toContain('pg');
  });

  it('should render configured pagination and environment', () => {
    const output = synthesizeProject(shopSchema(), {
      databaseDialect: 'sqlite',
      defaultPageSize: 25,
      maxPageSize: 50,
    });

    expect(file(output, 'src/utils/pagination.ts')).toContain('export const DEFAULT_PAGE_SIZE = 25;');
    expect(file(output, 'src/utils/pagination.ts')).toContain('export const MAX_PAGE_SIZE = 50;');
    expect(file(output, '.env.example')).toBe(
      'PORT=3000\nNODE_ENV=development\nDATABASE_STORAGE=database.sqlite\n',
    );
    expect(file(output, 'src/config/database.ts')).toContain("dialect: 'sqlite',");
  });

  it('should throw a SynthesisError when two entities map to the same file', () => {
    const input = schema([
      entity('OrderLine', [primaryKey('id')]),
      entity('order_line', [primaryKey('id')]),
    ]);
    expect(() => synthesizeProject(input)).toThrow(SynthesisError);
  });
});

describe('resolveSynthesizerOptions', () => {
  it('should fall back to defaults and a generic package name', () => {
    expect(resolveSynthesizerOptions({ projectName: null })).toEqual({
      apiPrefix: '/api',
      defaultPageSize: 20,
      maxPageSize: 100,
      databaseDialect: 'postgres',
      packageName: 'generated-api',
    });
    expect(resolveSynthesizerOptions({ projectName: '!!!' }).packageName).toBe('generated-api');
  });
});

describe('FileTreeBuilder', () => {
  it('should keep insertion order and reject duplicate paths', () => {
    const builder = new FileTreeBuilder().add('b.txt', 'b').add('a.txt', 'a');
    expect([...builder.build().keys()]).toEqual(['b.txt', 'a.txt']);
    expect(() => builder.add('a.txt', 'again')).toThrow('Duplicate output path: a.txt');
  });
});
