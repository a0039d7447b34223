import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';

import type { Env } from '../config/env.validation';

/**
 * Owns the two SQLite handles of the service: the live schema that designs are
 * materialized into, and the design database that records them.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  readonly schema: Database.Database;
  readonly designs: Database.Database;

  constructor(configService: ConfigService<Env, true>) {
    const schemaPath = configService.get('DATABASE_PATH', { infer: true });
    const designPath = configService.get('DESIGN_DATABASE_PATH', { infer: true });

    this.schema = this.open(schemaPath);
    this.designs = this.open(designPath);

    this.logger.log(`Schema database: ${schemaPath}, design database: ${designPath}`);
  }

  onModuleDestroy(): void {
    for (const db of [this.schema, this.designs]) {
      if (db.open) {
        db.close();
      }
    }
  }

  private open(path: string): Database.Database {
    const db = new Database(path);
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('busy_timeout = 5000');
    return db;
  }
}
