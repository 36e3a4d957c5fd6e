import { z } from 'zod';
import type { INestApplicationContext, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const LOG_LEVELS = ['log', 'error', 'warn', 'debug', 'verbose'] as const;

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(20),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z
    .string()
    .default('log,error,warn')
    .transform((value) => value.split(',').map((level) => level.trim()))
    .pipe(z.array(z.enum(LOG_LEVELS))),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function validateEnv(env: Record<string, unknown>): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export function resolveLogLevels(env: NodeJS.ProcessEnv = process.env): LogLevel[] {
  const parsed = EnvSchema.shape.LOG_LEVEL.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : ['log', 'error', 'warn'];
}

/**
 * Levels from `resolveLogLevels` cover boot only; once ConfigModule has read
 * `.env` files the validated `LOG_LEVEL` takes over.
 */
export function applyLogLevels(
  app: Pick<INestApplicationContext, 'get' | 'useLogger'>,
): LogLevel[] {
  const levels = app.get<ConfigService<AppConfig, true>>(ConfigService).get('LOG_LEVEL', {
    infer: true,
  });
  app.useLogger(levels);
  return levels;
}
