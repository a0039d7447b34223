export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  defaultValue: string | null;
  primaryKey: boolean;
}

export interface TableStructure {
  name: string;
  columns: ColumnInfo[];
  primaryKeys: string[];
  uniqueConstraints: string[][];
}

export interface DriftReport {
  inSync: boolean;
  missingColumns: string[];
  unexpectedColumns: string[];
  primaryKeyMismatch: boolean;
}
