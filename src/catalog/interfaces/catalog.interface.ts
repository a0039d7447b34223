export interface QueryResult {
  kind: 'query';
  columns: string[];
  rows: Record<string, unknown>[];
}

export interface CommandResult {
  kind: 'command';
  rowsAffected: number;
}

export type ExecutionResult = QueryResult | CommandResult;

export interface DatabaseStatus {
  tablesCount: number;
  tables: string[];
  databaseSize: number;
  lastUpdated: string;
}
