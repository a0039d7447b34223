import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import type Database from 'better-sqlite3';

import { DatabaseService } from '../database/database.service';
import { Design, DesignSchema } from '../schema-sync/schemas/design.schema';
import { DesignRecord, DesignSummary } from './interfaces/design-record.interface';

interface DesignRow {
  table_name: string;
  design_data: string;
  version: number;
  created_at: string;
  updated_at: string;
}

interface UpsertParams {
  name: string;
  data: string;
  now: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS table_designs (
    table_name TEXT COLLATE NOCASE PRIMARY KEY,
    design_data TEXT NOT NULL,
    version INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS table_comments (
    table_name TEXT COLLATE NOCASE PRIMARY KEY,
    comment TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
`;

/**
 * Persists the latest design of every managed table, keyed by table name.
 * Every write is a single statement, so a reader sees either the previous
 * record or the new one.
 */
@Injectable()
export class DesignStoreService implements OnModuleInit {
  private readonly logger = new Logger(DesignStoreService.name);

  constructor(private readonly database: DatabaseService) {}

  private get db(): Database.Database {
    return this.database.designs;
  }

  onModuleInit(): void {
    this.db.exec(SCHEMA);
    this.logger.log('Design store ready');
  }

  put(design: Design): DesignRecord {
    const row = this.db
      .prepare<UpsertParams, DesignRow>(
        `INSERT INTO table_designs (table_name, design_data, version, created_at, updated_at)
         VALUES (@name, @data, 1, @now, @now)
         ON CONFLICT(table_name) DO UPDATE SET
           table_name = excluded.table_name,
           design_data = excluded.design_data,
           version = table_designs.version + 1,
           updated_at = excluded.updated_at
         RETURNING *`,
      )
      .get({ name: design.name, data: JSON.stringify(design), now: new Date().toISOString() });

    if (!row) {
      throw new Error(`Design of ${design.name} was not written`);
    }
    return this.toRecord(row);
  }

  get(tableName: string): DesignRecord | null {
    const row = this.db
      .prepare<[string], DesignRow>('SELECT * FROM table_designs WHERE table_name = ?')
      .get(tableName);
    return row ? this.toRecord(row) : null;
  }

  delete(tableName: string): boolean {
    const result = this.db.prepare('DELETE FROM table_designs WHERE table_name = ?').run(tableName);
    return result.changes > 0;
  }

  list(): DesignSummary[] {
    const rows = this.db
      .prepare<[], DesignRow>('SELECT * FROM table_designs ORDER BY table_name')
      .all();

    return rows.map((row) => {
      const { design, version, createdAt, updatedAt } = this.toRecord(row);
      return {
        name: design.name,
        comment: design.comment ?? null,
        fieldCount: design.fields.length,
        version,
        createdAt,
        updatedAt,
      };
    });
  }

  saveComment(tableName: string, comment: string): void {
    this.db
      .prepare(
        `INSERT INTO table_comments (table_name, comment, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(table_name) DO UPDATE SET
           comment = excluded.comment,
           updated_at = excluded.updated_at`,
      )
      .run(tableName, comment, new Date().toISOString());
  }

  getComment(tableName: string): string | null {
    const row = this.db
      .prepare<[string], { comment: string }>(
        'SELECT comment FROM table_comments WHERE table_name = ?',
      )
      .get(tableName);
    return row?.comment ?? null;
  }

  deleteComment(tableName: string): void {
    this.db.prepare('DELETE FROM table_comments WHERE table_name = ?').run(tableName);
  }

  private toRecord(row: DesignRow): DesignRecord {
    const design = DesignSchema.parse(JSON.parse(row.design_data));
    return {
      design,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
