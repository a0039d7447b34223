import { createInMemoryDatabase } from '../../test/helpers/in-memory-database';
import { CatalogService } from '../catalog/catalog.service';
import { SchemaException } from '../common/errors/schema.exception';
import { DatabaseService } from '../database/database.service';
import { SchemaInspectorService } from './schema-inspector.service';

describe('SchemaInspectorService', () => {
  let database: DatabaseService;
  let catalog: CatalogService;
  let inspector: SchemaInspectorService;

  beforeEach(() => {
    database = createInMemoryDatabase();
    catalog = new CatalogService(database);
    inspector = new SchemaInspectorService(database, catalog);
  });

  afterEach(() => {
    database.onModuleDestroy();
  });

  it('should describe columns as the catalog reports them', () => {
    catalog.execute(
      `CREATE TABLE products (sku VARCHAR(32) NOT NULL, title TEXT DEFAULT 'untitled', price REAL)`,
    );

    expect(inspector.describe('products')).toEqual({
      name: 'products',
      columns: [
        { name: 'sku', type: 'VARCHAR(32)', nullable: false, defaultValue: null, primaryKey: false },
        {
          name: 'title',
          type: 'TEXT',
          nullable: true,
          defaultValue: "'untitled'",
          primaryKey: false,
        },
        { name: 'price', type: 'REAL', nullable: true, defaultValue: null, primaryKey: false },
      ],
      primaryKeys: [],
      uniqueConstraints: [],
    });
  });

  it('should order composite key columns by key position', () => {
    catalog.execute('CREATE TABLE lines (a INTEGER, b TEXT, c TEXT, PRIMARY KEY (b, a))');
    expect(inspector.describe('lines').primaryKeys).toEqual(['b', 'a']);
  });

  it('should report unique constraints but not separately created indexes', () => {
    catalog.execute('CREATE TABLE pairs (a INTEGER, b INTEGER, c INTEGER, UNIQUE (b, a))');
    catalog.execute('CREATE UNIQUE INDEX pairs_c ON pairs (c)');

    expect(inspector.describe('pairs').uniqueConstraints).toEqual([['b', 'a']]);
  });

  it('should report the catalog name whatever case it was asked for', () => {
    catalog.execute('CREATE TABLE users (id INTEGER)');

    const structure = inspector.describe('USERS');

    expect(structure.name).toBe('users');
    expect(structure.columns.map((column) => column.name)).toEqual(['id']);
  });

  it('should fail for a missing table', () => {
    expect(() => inspector.describe('ghost')).toThrow(SchemaException);
  });

  it('should describe every table', () => {
    catalog.execute('CREATE TABLE b (x INTEGER)');
    catalog.execute('CREATE TABLE a (y INTEGER)');

    expect(inspector.describeAll().map((table) => table.name)).toEqual(['a', 'b']);
  });
});
