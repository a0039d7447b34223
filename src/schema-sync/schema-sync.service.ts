import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';

import { CatalogService } from '../catalog/catalog.service';
import { errorMessage, SchemaException } from '../common/errors/schema.exception';
import { DesignRecord } from '../design-store/interfaces/design-record.interface';
import { DesignStoreService } from '../design-store/design-store.service';
import { TableStructure } from '../schema-inspector/interfaces/table-structure.interface';
import { SchemaInspectorService } from '../schema-inspector/schema-inspector.service';
import { detectDrift, structureToDesign } from '../schema-inspector/schema-structure.util';
import {
  ALTERATION_STRATEGY,
  AlterationPlan,
  AlterationStrategy,
  rebuildPlan,
} from './alteration-strategy';
import {
  assertValidDesign,
  assertValidField,
  buildAddColumn,
  buildCreate,
  buildDropTable,
  findFieldIndex,
  sameName,
} from './ddl-builder';
import {
  CreateOptions,
  DropOutcome,
  SyncOutcome,
  TableDetail,
} from './interfaces/sync-outcome.interface';
import { SYNC_OPERATIONS_METRIC } from './schema-sync.metrics';
import { Design, Field } from './schemas/design.schema';
import { TableLockService } from './table-lock.service';

/**
 * Keeps live tables and their recorded designs in step.
 *
 * Every mutation runs under the table's lock as: read the stored design,
 * compute the next one, execute DDL, record the design. DDL failures leave
 * both stores untouched. A failure to record after successful DDL is reported
 * as `DesignPersistenceFailed`; the two stores have diverged at that point and
 * `reconcile` is the way back.
 */
@Injectable()
export class SchemaSyncService {
  private readonly logger = new Logger(SchemaSyncService.name);

  constructor(
    private readonly catalog: CatalogService,
    private readonly designStore: DesignStoreService,
    private readonly inspector: SchemaInspectorService,
    private readonly locks: TableLockService,
    @Inject(ALTERATION_STRATEGY) private readonly strategy: AlterationStrategy,
    @InjectMetric(SYNC_OPERATIONS_METRIC) private readonly operations: Counter<string>,
  ) {}

  /**
   * Creates the table, or fails with `TableAlreadyExists` unless `replace` is
   * set. Replacing drops the existing table and its rows.
   */
  create(design: Design, options: CreateOptions = {}): Promise<SyncOutcome> {
    return this.mutate('create', design.name, () => {
      const statement = buildCreate(design);
      if (!options.replace && this.catalog.exists(design.name)) {
        throw SchemaException.tableAlreadyExists(design.name);
      }
      return this.applyDesign(design, statement);
    });
  }

  createOrReplace(design: Design): Promise<SyncOutcome> {
    return this.mutate('createOrReplace', design.name, () =>
      this.applyDesign(design, buildCreate(design)),
    );
  }

  /** Full-design replacement of an existing table, keyed by the path name. */
  replace(tableName: string, design: Design): Promise<SyncOutcome> {
    return this.mutate('replace', tableName, () => {
      if (design.name && !sameName(design.name, tableName)) {
        throw SchemaException.invalidDesign(
          `Design name ${design.name} does not match table ${tableName}`,
        );
      }
      const named: Design = { ...design, name: design.name || tableName };
      const statement = buildCreate(named);
      if (!this.catalog.exists(tableName)) {
        throw SchemaException.tableNotFound(tableName);
      }
      return this.applyDesign(named, statement);
    });
  }

  /**
   * Adds a column in place. Key and unique columns cannot be added by SQLite's
   * ADD COLUMN, so those rebuild the table from the stored design instead.
   */
  addField(tableName: string, field: Field): Promise<SyncOutcome> {
    return this.mutate<SyncOutcome>('addField', tableName, () => {
      const statement = buildAddColumn(tableName, field);
      if (!this.catalog.exists(tableName)) {
        throw SchemaException.tableNotFound(tableName);
      }

      const stored = this.designStore.get(tableName);
      const existing = stored
        ? stored.design.fields.map((current) => current.name)
        : this.inspector.describe(tableName).columns.map((column) => column.name);
      if (existing.some((name) => sameName(name, field.name))) {
        throw SchemaException.duplicateField(tableName, field.name);
      }

      if (field.primary || field.unique) {
        if (!stored) {
          throw SchemaException.designNotFound(tableName);
        }
        const next = { ...stored.design, fields: [...stored.design.fields, field] };
        return this.applyPlan(tableName, next, rebuildPlan(tableName, next));
      }

      this.catalog.executeDdl([statement]);

      if (!stored) {
        this.logger.warn(`Added ${field.name} to ${tableName}, which has no stored design`);
        return { table: tableName, mode: 'in-place', record: null };
      }
      const record = this.persist({ ...stored.design, fields: [...stored.design.fields, field] });
      return { table: tableName, mode: 'in-place', record };
    });
  }

  removeField(tableName: string, fieldName: string): Promise<SyncOutcome> {
    return this.mutate('removeField', tableName, () => {
      const { design } = this.requireDesign(tableName);
      const index = findFieldIndex(design.fields, fieldName);
      if (index < 0) {
        throw SchemaException.fieldNotFound(tableName, fieldName);
      }

      const fields = design.fields.filter((_, position) => position !== index);
      if (fields.length === 0) {
        throw SchemaException.invalidDesign(
          `Cannot remove ${fieldName}: table ${tableName} would have no fields`,
        );
      }

      const next = { ...design, fields };
      return this.applyPlan(
        tableName,
        next,
        this.strategy.planRemoveField(tableName, design.fields[index], next),
      );
    });
  }

  /** Replaces a field's definition, keeping its position in the field list. */
  updateField(tableName: string, fieldName: string, replacement: Field): Promise<SyncOutcome> {
    return this.mutate('updateField', tableName, () => {
      assertValidField(replacement);
      const { design } = this.requireDesign(tableName);
      const index = findFieldIndex(design.fields, fieldName);
      if (index < 0) {
        throw SchemaException.fieldNotFound(tableName, fieldName);
      }
      const clash = findFieldIndex(design.fields, replacement.name);
      if (clash >= 0 && clash !== index) {
        throw SchemaException.duplicateField(tableName, replacement.name);
      }

      const fields = design.fields.map((field, position) =>
        position === index ? replacement : field,
      );
      const next = { ...design, fields };
      return this.applyPlan(
        tableName,
        next,
        this.strategy.planUpdateField(tableName, design.fields[index], replacement, next),
      );
    });
  }

  drop(tableName: string): Promise<DropOutcome> {
    return this.mutate('drop', tableName, () => {
      if (!this.catalog.exists(tableName)) {
        throw SchemaException.tableNotFound(tableName);
      }
      this.catalog.executeDdl([buildDropTable(tableName)]);

      let designDeleted: boolean;
      try {
        designDeleted = this.designStore.delete(tableName);
      } catch (error) {
        this.logger.error(`Dropped ${tableName} but could not delete its design`, error);
        throw SchemaException.persistenceFailed(tableName, error);
      }
      this.forgetComment(tableName);

      return { table: tableName, designDeleted };
    });
  }

  /** Rewrites the stored design from the live table, keeping the stored comment. */
  reconcile(tableName: string): Promise<SyncOutcome> {
    return this.mutate<SyncOutcome>('reconcile', tableName, () => {
      const structure = this.inspector.describe(tableName);
      const stored = this.designStore.get(tableName);
      const design = structureToDesign(structure, stored?.design.comment);
      this.assertRebuildable(design);
      const record = this.persist(design);
      return { table: tableName, mode: 'reconciled', record };
    });
  }

  getTable(tableName: string): TableDetail {
    const table = this.inspector.describe(tableName);
    const record = this.designStore.get(tableName);
    return {
      table,
      design: record?.design ?? null,
      comment: this.readComment(tableName) ?? record?.design.comment ?? null,
      drift: record ? detectDrift(table, record.design) : null,
    };
  }

  listTables(): TableStructure[] {
    return this.inspector.describeAll();
  }

  private applyDesign(design: Design, createStatement: string): SyncOutcome {
    const replaced = this.catalog.exists(design.name);
    this.catalog.executeDdl(
      replaced ? [buildDropTable(design.name), createStatement] : [createStatement],
    );
    if (replaced) {
      this.logger.warn(`Table ${design.name} was dropped and recreated, existing rows are lost`);
    }

    const record = this.persist(design);
    this.rememberComment(design);
    return { table: design.name, mode: replaced ? 'rebuilt' : 'created', record };
  }

  private applyPlan(tableName: string, next: Design, plan: AlterationPlan): SyncOutcome {
    assertValidDesign(next);
    if (plan.statements.length > 0) {
      this.catalog.executeDdl(plan.statements);
    }
    if (plan.mode === 'rebuilt') {
      this.logger.warn(`Table ${tableName} was rebuilt, existing rows are lost`);
    }
    return { table: tableName, mode: plan.mode, record: this.persist(next) };
  }

  /** A recorded design drives later rebuilds, so it has to render. */
  private assertRebuildable(design: Design): void {
    try {
      buildCreate(design);
    } catch (error) {
      if (error instanceof SchemaException) {
        throw SchemaException.invalidDesign(
          `Table ${design.name} cannot be recorded as a design: ${error.message}`,
        );
      }
      throw error;
    }
  }

  private requireDesign(tableName: string): DesignRecord {
    if (!this.catalog.exists(tableName)) {
      throw SchemaException.tableNotFound(tableName);
    }
    const record = this.designStore.get(tableName);
    if (!record) {
      throw SchemaException.designNotFound(tableName);
    }
    return record;
  }

  private persist(design: Design): DesignRecord {
    try {
      return this.designStore.put(design);
    } catch (error) {
      this.logger.error(`Schema of ${design.name} changed but its design was not recorded`, error);
      throw SchemaException.persistenceFailed(design.name, error);
    }
  }

  // Comments are best effort: a failure is logged and never fails the operation.
  private rememberComment(design: Design): void {
    try {
      if (design.comment) {
        this.designStore.saveComment(design.name, design.comment);
      } else {
        this.designStore.deleteComment(design.name);
      }
    } catch (error) {
      this.logger.warn(`Could not save comment of ${design.name}: ${errorMessage(error)}`);
    }
  }

  private forgetComment(tableName: string): void {
    try {
      this.designStore.deleteComment(tableName);
    } catch (error) {
      this.logger.warn(`Could not delete comment of ${tableName}: ${errorMessage(error)}`);
    }
  }

  private readComment(tableName: string): string | null {
    try {
      return this.designStore.getComment(tableName);
    } catch (error) {
      this.logger.warn(`Could not read comment of ${tableName}: ${errorMessage(error)}`);
      return null;
    }
  }

  private mutate<T>(operation: string, tableName: string, task: () => T): Promise<T> {
    return this.locks.runExclusive(tableName, () => {
      try {
        const result = task();
        this.operations.inc({ operation, outcome: 'success' });
        return result;
      } catch (error) {
        const outcome = error instanceof SchemaException ? error.kind : 'error';
        this.operations.inc({ operation, outcome });
        throw error;
      }
    });
  }
}
