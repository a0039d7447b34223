import type { Design } from '../schema-sync/schemas/design.schema';
import { ColumnInfo, TableStructure } from './interfaces/table-structure.interface';
import { detectDrift, structureToDesign } from './schema-structure.util';

function column(name: string, overrides: Partial<ColumnInfo> = {}): ColumnInfo {
  return { name, type: 'TEXT', nullable: true, defaultValue: null, primaryKey: false, ...overrides };
}

const design: Design = {
  name: 'users',
  fields: [
    { name: 'id', type: 'INTEGER', primary: true },
    { name: 'email', type: 'TEXT' },
  ],
};

describe('detectDrift', () => {
  it('should report a table that matches its design regardless of case', () => {
    const structure: TableStructure = {
      name: 'users',
      columns: [column('ID', { type: 'INTEGER', primaryKey: true }), column('Email')],
      primaryKeys: ['ID'],
      uniqueConstraints: [],
    };

    expect(detectDrift(structure, design)).toEqual({
      inSync: true,
      missingColumns: [],
      unexpectedColumns: [],
      primaryKeyMismatch: false,
    });
  });

  it('should list missing and unexpected columns and key changes', () => {
    const structure: TableStructure = {
      name: 'users',
      columns: [column('id', { type: 'INTEGER' }), column('nickname')],
      primaryKeys: [],
      uniqueConstraints: [],
    };

    expect(detectDrift(structure, design)).toEqual({
      inSync: false,
      missingColumns: ['email'],
      unexpectedColumns: ['nickname'],
      primaryKeyMismatch: true,
    });
  });
});

describe('structureToDesign', () => {
  const structure: TableStructure = {
    name: 'prices',
    columns: [
      column('code', { type: 'VARCHAR(8)', nullable: false, primaryKey: true }),
      column('amount', { type: 'REAL', defaultValue: '-1.5' }),
      column('label', { defaultValue: "'it''s'" }),
      column('created', { defaultValue: 'CURRENT_TIMESTAMP' }),
      column('ratio', { type: 'DECIMAL(10,2)' }),
    ],
    primaryKeys: ['code'],
    uniqueConstraints: [['label'], ['amount', 'ratio']],
  };

  it('should turn catalog columns into fields', () => {
    expect(structureToDesign(structure).fields).toEqual([
      { name: 'code', type: 'VARCHAR', length: 8, nullable: false, unique: false, primary: true },
      { name: 'amount', type: 'REAL', nullable: true, unique: false, primary: false, default: -1.5 },
      { name: 'label', type: 'TEXT', nullable: true, unique: true, primary: false, default: "it's" },
      {
        name: 'created',
        type: 'TEXT',
        nullable: true,
        unique: false,
        primary: false,
        default: 'CURRENT_TIMESTAMP',
      },
      {
        name: 'ratio',
        type: 'DECIMAL',
        length: 10,
        scale: 2,
        nullable: true,
        unique: false,
        primary: false,
      },
    ]);
  });

  it('should give untyped columns the BLOB type', () => {
    const untyped: TableStructure = {
      name: 'bag',
      columns: [column('extra', { type: '' })],
      primaryKeys: [],
      uniqueConstraints: [],
    };

    expect(structureToDesign(untyped).fields[0].type).toBe('BLOB');
  });

  it('should keep expression and blob defaults as SQL text', () => {
    const defaults: TableStructure = {
      name: 'events',
      columns: [
        column('stamp', { defaultValue: "datetime('now')" }),
        column('wrapped', { defaultValue: '(1 + 2)' }),
        column('raw', { type: 'BLOB', defaultValue: "x'00ff'" }),
        column('joined', { defaultValue: "'a' || 'b'" }),
      ],
      primaryKeys: [],
      uniqueConstraints: [],
    };

    expect(structureToDesign(defaults).fields.map((field) => field.default)).toEqual([
      "(datetime('now'))",
      '(1 + 2)',
      "x'00ff'",
      "('a' || 'b')",
    ]);
  });

  it('should carry a comment only when there is one', () => {
    expect(structureToDesign(structure, 'Price list').comment).toBe('Price list');
    expect(structureToDesign(structure, null)).not.toHaveProperty('comment');
  });
});
