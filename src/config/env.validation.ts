import { z } from 'zod';

export const ALTER_STRATEGIES = ['rebuild', 'in-place'] as const;
export type AlterStrategyName = (typeof ALTER_STRATEGIES)[number];

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_PATH: z.string().min(1).default('database_designer.db'),
  DESIGN_DATABASE_PATH: z.string().min(1).default('design_storage.db'),
  SCHEMA_ALTER_STRATEGY: z.enum(ALTER_STRATEGIES).default('rebuild'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates process environment for `ConfigModule.forRoot({ validate })`.
 * Unknown variables are passed through untouched.
 */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return { ...config, ...result.data };
}

/**
 * Log levels enabled for a configured minimum level, most severe first.
 */
export function resolveLogLevels(level: LogLevelName): LogLevelName[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
