import { Injectable } from '@nestjs/common';
import type Database from 'better-sqlite3';

import { CatalogService } from '../catalog/catalog.service';
import { SchemaException } from '../common/errors/schema.exception';
import { DatabaseService } from '../database/database.service';
import { quoteIdentifier } from '../schema-sync/ddl-builder';
import { TableStructure } from './interfaces/table-structure.interface';

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

interface IndexListRow {
  name: string;
  unique: number;
  origin: string;
}

interface IndexInfoRow {
  seqno: number;
  name: string | null;
}

/**
 * Reads table structure straight from the SQLite catalog, never from stored
 * designs, so manual changes to a table show up here.
 */
@Injectable()
export class SchemaInspectorService {
  constructor(
    private readonly database: DatabaseService,
    private readonly catalog: CatalogService,
  ) {}

  private get db(): Database.Database {
    return this.database.schema;
  }

  describe(tableName: string): TableStructure {
    const name = this.catalog.canonicalName(tableName);
    if (name === null) {
      throw SchemaException.tableNotFound(tableName);
    }

    const rows = this.db
      .prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdentifier(name)})`)
      .all();

    const columns = rows.map((row) => ({
      name: row.name,
      type: row.type,
      nullable: row.notnull === 0,
      defaultValue: row.dflt_value,
      primaryKey: row.pk > 0,
    }));

    const primaryKeys = rows
      .filter((row) => row.pk > 0)
      .sort((a, b) => a.pk - b.pk)
      .map((row) => row.name);

    return {
      name,
      columns,
      primaryKeys,
      uniqueConstraints: this.uniqueConstraints(name),
    };
  }

  describeAll(): TableStructure[] {
    return this.catalog.listTables().map((name) => this.describe(name));
  }

  private uniqueConstraints(tableName: string): string[][] {
    const indexes = this.db
      .prepare<[], IndexListRow>(`PRAGMA index_list(${quoteIdentifier(tableName)})`)
      .all()
      .filter((index) => index.unique === 1 && index.origin === 'u');

    return indexes.map((index) =>
      this.db
        .prepare<[], IndexInfoRow>(`PRAGMA index_info(${quoteIdentifier(index.name)})`)
        .all()
        .sort((a, b) => a.seqno - b.seqno)
        .flatMap((column) => (column.name === null ? [] : [column.name])),
    );
  }
}
