import { Logger } from '@nestjs/common';

import type { AlterStrategyName } from '../config/env.validation';
import {
  buildCreate,
  buildDropColumn,
  buildDropTable,
  buildRenameColumn,
  hasDefault,
  renderLiteral,
} from './ddl-builder';
import type { Design, Field } from './schemas/design.schema';

export const ALTERATION_STRATEGY = Symbol('ALTERATION_STRATEGY');

export interface AlterationPlan {
  mode: 'rebuilt' | 'in-place';
  statements: string[];
}

/**
 * Decides how a changed design reaches the live table: by statements that
 * alter the existing table, or by dropping and recreating it.
 */
export interface AlterationStrategy {
  readonly name: AlterStrategyName;
  planRemoveField(tableName: string, removed: Field, next: Design): AlterationPlan;
  planUpdateField(tableName: string, previous: Field, replacement: Field, next: Design): AlterationPlan;
}

/** Drop and recreate with the full field list. Every row of the table is lost. */
export function rebuildPlan(tableName: string, next: Design): AlterationPlan {
  return {
    mode: 'rebuilt',
    statements: [buildDropTable(tableName), buildCreate(next)],
  };
}

export class RebuildStrategy implements AlterationStrategy {
  readonly name = 'rebuild';

  planRemoveField(tableName: string, _removed: Field, next: Design): AlterationPlan {
    return rebuildPlan(tableName, next);
  }

  planUpdateField(tableName: string, _previous: Field, _replacement: Field, next: Design): AlterationPlan {
    return rebuildPlan(tableName, next);
  }
}

/**
 * Uses `DROP COLUMN` and `RENAME COLUMN` where SQLite accepts them and keeps
 * the table's rows. Key and unique columns, and any change beyond a rename,
 * still go through a rebuild.
 */
export class InPlaceStrategy implements AlterationStrategy {
  readonly name = 'in-place';
  private readonly logger = new Logger(InPlaceStrategy.name);

  planRemoveField(tableName: string, removed: Field, next: Design): AlterationPlan {
    if (isConstrained(removed)) {
      this.logger.warn(`Column ${removed.name} of ${tableName} is constrained, rebuilding`);
      return rebuildPlan(tableName, next);
    }
    return { mode: 'in-place', statements: [buildDropColumn(tableName, removed.name)] };
  }

  planUpdateField(tableName: string, previous: Field, replacement: Field, next: Design): AlterationPlan {
    if (isConstrained(previous) || !sameDefinition(previous, replacement)) {
      return rebuildPlan(tableName, next);
    }
    if (previous.name === replacement.name) {
      return { mode: 'in-place', statements: [] };
    }
    return {
      mode: 'in-place',
      statements: [buildRenameColumn(tableName, previous.name, replacement.name)],
    };
  }
}

export function createAlterationStrategy(name: AlterStrategyName): AlterationStrategy {
  return name === 'in-place' ? new InPlaceStrategy() : new RebuildStrategy();
}

function isConstrained(field: Field): boolean {
  return Boolean(field.primary || field.unique);
}

function definitionOf(field: Field): string {
  return JSON.stringify([
    field.type.toUpperCase(),
    field.length ?? null,
    field.scale ?? null,
    field.nullable !== false,
    Boolean(field.unique),
    Boolean(field.primary),
    hasDefault(field) ? renderLiteral(field.default) : null,
  ]);
}

function sameDefinition(a: Field, b: Field): boolean {
  return definitionOf(a) === definitionOf(b);
}
