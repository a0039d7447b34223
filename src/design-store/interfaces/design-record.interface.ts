import type { Design } from '../../schema-sync/schemas/design.schema';

export interface DesignRecord {
  design: Design;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface DesignSummary {
  name: string;
  comment: string | null;
  fieldCount: number;
  version: number;
  createdAt: string;
  updatedAt: string;
}
