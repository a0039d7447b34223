import type { DesignRecord } from '../../design-store/interfaces/design-record.interface';
import type {
  DriftReport,
  TableStructure,
} from '../../schema-inspector/interfaces/table-structure.interface';
import type { Design } from '../schemas/design.schema';

export type SyncMode = 'created' | 'rebuilt' | 'in-place' | 'reconciled';

export interface SyncOutcome {
  table: string;
  mode: SyncMode;
  /** Null when the table has no stored design and none was created. */
  record: DesignRecord | null;
}

export interface DropOutcome {
  table: string;
  designDeleted: boolean;
}

export interface TableDetail {
  table: TableStructure;
  design: Design | null;
  comment: string | null;
  drift: DriftReport | null;
}

export interface CreateOptions {
  /** Drop an existing table of the same name instead of failing. */
  replace?: boolean;
}
