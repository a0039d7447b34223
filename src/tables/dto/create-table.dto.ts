import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { DesignSchema } from '../../schema-sync/schemas/design.schema';

export const CreateTableSchema = z.object({
  table: DesignSchema,
  replace: z
    .boolean()
    .optional()
    .describe('Drop and recreate an existing table of the same name (its rows are lost)'),
});

export class CreateTableDto extends createZodDto(CreateTableSchema) {}
