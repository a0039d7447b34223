import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const ExecuteSqlSchema = z.object({
  sql: z.string().trim().min(1).describe('Single SQL statement, executed verbatim'),
});

export class ExecuteSqlDto extends createZodDto(ExecuteSqlSchema) {}
