import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

import { FieldSchema } from '../../schema-sync/schemas/design.schema';

export const FieldBodySchema = z.object({
  field: FieldSchema,
});

export class FieldBodyDto extends createZodDto(FieldBodySchema) {}
