import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { DesignSchema } from '../../schema-sync/schemas/design.schema';

export const UpdateTableSchema = z.object({
  table: DesignSchema.partial({ name: true }),
});

export class UpdateTableDto extends createZodDto(UpdateTableSchema) {}
