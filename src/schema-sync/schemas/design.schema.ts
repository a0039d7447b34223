import { z } from 'zod';

export const FieldDefaultSchema = z.union([z.string(), z.number(), z.boolean()]);

export const FieldSchema = z.object({
  name: z.string().trim().describe('Column name, unique within the design'),
  type: z.string().trim().describe('SQLite type name, e.g. INTEGER, TEXT, VARCHAR'),
  length: z.number().int().positive().optional().describe('Size for sized types'),
  scale: z.number().int().nonnegative().optional().describe('Digits after the point, with length'),
  nullable: z.boolean().optional().describe('Defaults to true'),
  unique: z.boolean().optional().describe('Defaults to false'),
  primary: z.boolean().optional().describe('Member of the (composite) primary key'),
  default: FieldDefaultSchema.nullable().optional().describe('Literal default value'),
});

export const DesignSchema = z.object({
  name: z.string().trim().describe('Table name'),
  comment: z.string().nullable().optional(),
  fields: z.array(FieldSchema),
});

export type Field = z.infer<typeof FieldSchema>;
export type FieldDefault = z.infer<typeof FieldDefaultSchema>;
export type Design = z.infer<typeof DesignSchema>;
