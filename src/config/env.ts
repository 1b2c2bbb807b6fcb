import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000').transform(Number),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string().default('catalog'),
  DB_PASSWORD: z.string().default('catalog_dev_pass'),
  DB_NAME: z.string().default('catalog'),
  DB_POOL_MAX: z.string().transform(Number).optional(),
  DB_IDLE_TIMEOUT: z.string().transform(Number).optional(),
  DB_CONNECT_TIMEOUT: z.string().transform(Number).optional(),
  CATALOG_PAGE_SIZE: z.string().default('1000').transform(Number).pipe(z.number().int().positive()),
  CATALOG_SNAPSHOT_TTL_MS: z.string().default('60000').transform(Number).pipe(z.number().int().nonnegative()),
  CATALOG_MAX_CACHED_LOCALES: z.string().default('8').transform(Number).pipe(z.number().int().positive()),
  CATALOG_ADMIN_TOKEN: z.string().min(16).optional(),
  SEARCH_RATE_LIMIT_PER_MINUTE: z.string().default('120').transform(Number).pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
