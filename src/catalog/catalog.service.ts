import { Injectable, Logger } from '@nestjs/common';
import type Database from 'better-sqlite3';

import { SchemaException } from '../common/errors/schema.exception';
import { DatabaseService } from '../database/database.service';
import { DatabaseStatus, ExecutionResult } from './interfaces/catalog.interface';

const LEADING_TRIVIA = /^(\s+|--[^\n]*(\n|$)|\/\*[\s\S]*?\*\/)*/;
const READ_ONLY_KEYWORD = /^(SELECT|WITH|PRAGMA|EXPLAIN|VALUES)\b/i;

export function isReadOnlyQuery(sql: string): boolean {
  return READ_ONLY_KEYWORD.test(sql.replace(LEADING_TRIVIA, ''));
}

/**
 * 64-bit integers stay exact: as numbers while they are safe, as decimal
 * strings beyond that.
 */
function toJsonRow(row: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(row).map(([column, value]) => [
      column,
      typeof value === 'bigint' ? fromBigInt(value) : value,
    ]),
  );
}

function fromBigInt(value: bigint): number | string {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

/**
 * Thin gateway to the live schema database. The catalog is re-read on every
 * call; nothing about it is cached in process.
 */
@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(private readonly database: DatabaseService) {}

  private get db(): Database.Database {
    return this.database.schema;
  }

  exists(tableName: string): boolean {
    return this.canonicalName(tableName) !== null;
  }

  /** The table's name as the catalog spells it, or null when there is no such table. */
  canonicalName(tableName: string): string | null {
    const row = this.db
      .prepare<[string], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE",
      )
      .get(tableName);
    return row?.name ?? null;
  }

  listTables(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((row) => row.name);
  }

  size(): number {
    return this.pragmaNumber('page_count') * this.pragmaNumber('page_size');
  }

  status(): DatabaseStatus {
    const tables = this.listTables();
    return {
      tablesCount: tables.length,
      tables,
      databaseSize: this.size(),
      lastUpdated: new Date().toISOString(),
    };
  }

  /**
   * Runs a caller-supplied statement as is. Nothing is validated beyond what
   * SQLite itself enforces.
   */
  execute(sql: string): ExecutionResult {
    try {
      const statement = this.db.prepare<unknown[], Record<string, unknown>>(sql);

      if (isReadOnlyQuery(sql) && statement.reader) {
        statement.safeIntegers(true);
        return {
          kind: 'query',
          columns: statement.columns().map((column) => column.name),
          rows: statement.all().map(toJsonRow),
        };
      }

      const result = statement.run();
      return { kind: 'command', rowsAffected: result.changes };
    } catch (error) {
      throw SchemaException.operationFailed(error);
    }
  }

  /**
   * Executes DDL statements in one transaction: either all of them apply or
   * the schema is left as it was.
   */
  executeDdl(statements: string[]): void {
    const apply = this.db.transaction((batch: string[]) => {
      for (const statement of batch) {
        this.logger.debug(statement);
        this.db.exec(statement);
      }
    });

    try {
      apply(statements);
    } catch (error) {
      throw SchemaException.operationFailed(error);
    }
  }

  private pragmaNumber(name: string): number {
    const value = this.db.pragma(name, { simple: true });
    if (typeof value !== 'number') {
      throw new Error(`PRAGMA ${name} returned ${String(value)}`);
    }
    return value;
  }
}
