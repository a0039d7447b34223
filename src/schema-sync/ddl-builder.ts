import { SchemaException } from '../common/errors/schema.exception';
import type { Design, Field, FieldDefault } from './schemas/design.schema';

/**
 * A statement is assembled from tagged clauses and turned into text only by
 * `render`. Caller-supplied identifiers, types and defaults never reach the
 * statement any other way.
 */
export type Clause =
  | { kind: 'keyword'; value: string }
  | { kind: 'identifier'; value: string }
  | { kind: 'type'; name: string; length?: number; scale?: number }
  | { kind: 'literal'; value: FieldDefault }
  | { kind: 'list'; items: Clause[][] };

const TYPE_PATTERN = /^[A-Za-z][A-Za-z0-9_ ]*$/;
const NUMERIC_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const BLOB_LITERAL = /^[xX]'([0-9a-fA-F]{2})*'$/;
const LITERAL_KEYWORDS = new Set([
  'NULL',
  'TRUE',
  'FALSE',
  'CURRENT_TIMESTAMP',
  'CURRENT_DATE',
  'CURRENT_TIME',
]);

const keyword = (value: string): Clause => ({ kind: 'keyword', value });
const identifier = (value: string): Clause => ({ kind: 'identifier', value });
const list = (items: Clause[][]): Clause => ({ kind: 'list', items });

export function render(clauses: Clause[]): string {
  return clauses.map(renderClause).join(' ');
}

function renderClause(clause: Clause): string {
  switch (clause.kind) {
    case 'keyword':
      return clause.value;
    case 'identifier':
      return quoteIdentifier(clause.value);
    case 'type':
      if (clause.length === undefined) {
        return clause.name;
      }
      return clause.scale === undefined
        ? `${clause.name}(${clause.length})`
        : `${clause.name}(${clause.length},${clause.scale})`;
    case 'literal':
      return renderLiteral(clause.value);
    case 'list':
      return `(${clause.items.map(render).join(', ')})`;
  }
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function isBlobLiteral(text: string): boolean {
  return BLOB_LITERAL.test(text);
}

/**
 * `(expr)` whose parentheses balance and close only at the very end, with no
 * statement separator, quoted identifier or comment outside string literals.
 * Such text cannot leave the DEFAULT clause it is rendered into.
 */
export function isParenthesizedExpression(text: string): boolean {
  if (!text.startsWith('(') || !text.endsWith(')')) {
    return false;
  }

  let depth = 0;
  let quoted = false;
  for (let index = 0; index < text.length; index++) {
    const char = text[index];
    if (quoted) {
      // '' inside a literal closes and reopens it
      quoted = char !== "'";
      continue;
    }
    const pair = text.slice(index, index + 2);
    if (char === ';' || char === '"' || char === '`' || pair === '--' || pair === '/*') {
      return false;
    }
    if (char === "'") {
      quoted = true;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0 && index !== text.length - 1) {
        return false;
      }
    }
  }
  return depth === 0 && !quoted;
}

/**
 * Default-value policy: numbers and booleans are emitted as numbers; numeric
 * strings, the SQL constant keywords, blob literals and parenthesized
 * expressions verbatim; everything else as a quoted string literal.
 */
export function renderLiteral(value: FieldDefault): string {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw SchemaException.invalidField(`Default value ${value} is not a finite number`);
    }
    return String(value);
  }
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }

  const trimmed = value.trim();
  if (NUMERIC_LITERAL.test(trimmed)) {
    return trimmed;
  }
  if (LITERAL_KEYWORDS.has(trimmed.toUpperCase())) {
    return trimmed.toUpperCase();
  }
  if (isBlobLiteral(trimmed) || isParenthesizedExpression(trimmed)) {
    return trimmed;
  }
  if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
    return quoteString(trimmed.slice(1, -1).replace(/''/g, "'"));
  }
  return quoteString(value);
}

/** An empty string or null default means "no default". */
export function hasDefault(field: Field): field is Field & { default: FieldDefault } {
  return field.default !== undefined && field.default !== null && field.default !== '';
}

export function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function findFieldIndex(fields: readonly Field[], name: string): number {
  return fields.findIndex((field) => sameName(field.name, name));
}

export function assertValidField(field: Field): void {
  if (!field.name) {
    throw SchemaException.invalidField('Field name must not be empty');
  }
  if (!field.type) {
    throw SchemaException.invalidField(`Field ${field.name} has no type`);
  }
  if (!TYPE_PATTERN.test(field.type)) {
    throw SchemaException.invalidField(`Field ${field.name} has an invalid type: ${field.type}`);
  }
  if (field.scale !== undefined && field.length === undefined) {
    throw SchemaException.invalidField(`Field ${field.name} has a scale but no length`);
  }
}

export function assertValidDesign(design: Design): void {
  if (!design.name) {
    throw SchemaException.invalidDesign('Table name must not be empty');
  }
  if (design.fields.length === 0) {
    throw SchemaException.invalidDesign(`Table ${design.name} must have at least one field`);
  }

  const seen = new Set<string>();
  for (const field of design.fields) {
    if (!field.name) {
      throw SchemaException.invalidDesign(`Table ${design.name} has a field without a name`);
    }
    const key = field.name.toLowerCase();
    if (seen.has(key)) {
      throw SchemaException.invalidDesign(
        `Table ${design.name} declares field ${field.name} more than once`,
      );
    }
    seen.add(key);
  }
}

/**
 * Column definition: name, type(+length, scale), NOT NULL, UNIQUE, DEFAULT. Primary
 * keys are declared at table level so composite keys work the same way.
 */
export function fieldClauses(field: Field): Clause[] {
  assertValidField(field);

  const clauses: Clause[] = [
    identifier(field.name),
    { kind: 'type', name: field.type, length: field.length, scale: field.scale },
  ];
  if (field.nullable === false) {
    clauses.push(keyword('NOT NULL'));
  }
  if (field.unique) {
    clauses.push(keyword('UNIQUE'));
  }
  if (hasDefault(field)) {
    clauses.push(keyword('DEFAULT'), { kind: 'literal', value: field.default });
  }
  return clauses;
}

export function buildCreate(design: Design): string {
  assertValidDesign(design);

  const definitions = design.fields.map(fieldClauses);
  const primaryKeys = design.fields.filter((field) => field.primary);
  if (primaryKeys.length > 0) {
    definitions.push([
      keyword('PRIMARY KEY'),
      list(primaryKeys.map((field) => [identifier(field.name)])),
    ]);
  }

  return render([keyword('CREATE TABLE'), identifier(design.name), list(definitions)]);
}

export function buildAddColumn(tableName: string, field: Field): string {
  if (!field.name) {
    throw SchemaException.invalidField('Field name must not be empty');
  }
  return render([
    keyword('ALTER TABLE'),
    identifier(tableName),
    keyword('ADD COLUMN'),
    ...fieldClauses(field),
  ]);
}

export function buildDropTable(tableName: string): string {
  return render([keyword('DROP TABLE'), identifier(tableName)]);
}

export function buildDropColumn(tableName: string, columnName: string): string {
  return render([
    keyword('ALTER TABLE'),
    identifier(tableName),
    keyword('DROP COLUMN'),
    identifier(columnName),
  ]);
}

export function buildRenameColumn(tableName: string, from: string, to: string): string {
  return render([
    keyword('ALTER TABLE'),
    identifier(tableName),
    keyword('RENAME COLUMN'),
    identifier(from),
    keyword('TO'),
    identifier(to),
  ]);
}
