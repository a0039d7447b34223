import { isBlobLiteral, isParenthesizedExpression } from '../schema-sync/ddl-builder';
import type { Design, Field, FieldDefault } from '../schema-sync/schemas/design.schema';
import { DriftReport, TableStructure } from './interfaces/table-structure.interface';

const SIZED_TYPE = /^(.*?)\s*\(\s*(\d+)\s*(?:,\s*(\d+)\s*)?\)$/;
const QUOTED_STRING = /^'((?:[^']|'')*)'$/;
const BARE_WORD = /^[A-Za-z_][A-Za-z0-9_]*$/;
// Columns declared without a type have BLOB affinity
const UNTYPED = 'BLOB';
const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Compares a live table with its recorded design by column names and
 * primary-key membership. Names compare case-insensitively, like SQLite.
 */
export function detectDrift(structure: TableStructure, design: Design): DriftReport {
  const live = new Set(structure.columns.map((column) => column.name.toLowerCase()));
  const declared = new Set(design.fields.map((field) => field.name.toLowerCase()));

  const missingColumns = design.fields
    .filter((field) => !live.has(field.name.toLowerCase()))
    .map((field) => field.name);
  const unexpectedColumns = structure.columns
    .filter((column) => !declared.has(column.name.toLowerCase()))
    .map((column) => column.name);

  const livePrimaryKeys = structure.primaryKeys.map((name) => name.toLowerCase()).sort();
  const declaredPrimaryKeys = design.fields
    .filter((field) => field.primary)
    .map((field) => field.name.toLowerCase())
    .sort();
  const primaryKeyMismatch = livePrimaryKeys.join('\u0000') !== declaredPrimaryKeys.join('\u0000');

  return {
    inSync: missingColumns.length === 0 && unexpectedColumns.length === 0 && !primaryKeyMismatch,
    missingColumns,
    unexpectedColumns,
    primaryKeyMismatch,
  };
}

/**
 * Rebuilds a design from what the catalog reports, for tables whose recorded
 * design is missing or stale.
 */
export function structureToDesign(structure: TableStructure, comment?: string | null): Design {
  const uniqueColumns = new Set(
    structure.uniqueConstraints
      .filter((columns) => columns.length === 1)
      .map(([column]) => column.toLowerCase()),
  );

  const fields = structure.columns.map((column): Field => {
    const sized = SIZED_TYPE.exec(column.type);
    const field: Field = {
      name: column.name,
      type: (sized ? sized[1] : column.type) || UNTYPED,
      nullable: column.nullable,
      unique: uniqueColumns.has(column.name.toLowerCase()),
      primary: column.primaryKey,
    };
    if (sized) {
      field.length = Number(sized[2]);
      if (sized[3] !== undefined) {
        field.scale = Number(sized[3]);
      }
    }
    const defaultValue = parseDefault(column.defaultValue);
    if (defaultValue !== undefined) {
      field.default = defaultValue;
    }
    return field;
  });

  return comment ? { name: structure.name, comment, fields } : { name: structure.name, fields };
}

function parseDefault(text: string | null): FieldDefault | undefined {
  if (text === null) {
    return undefined;
  }
  const quoted = QUOTED_STRING.exec(text);
  if (quoted) {
    return quoted[1].replace(/''/g, "'");
  }
  if (NUMERIC.test(text)) {
    return Number(text);
  }
  // Bare words (keywords included) and blob literals render back unchanged
  if (BARE_WORD.test(text) || isBlobLiteral(text)) {
    return text;
  }
  return isParenthesizedExpression(text) ? text : `(${text})`;
}
