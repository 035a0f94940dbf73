import { availableParallelism } from 'os';
import { z } from 'zod';

/**
 * Parse a boolean-ish environment string.
 * `z.coerce.boolean()` treats "false" as true, so flags are matched explicitly.
 */
const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((val) => val === 'true' || val === '1' || val === 'yes');

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Dispatcher
  ROTATOR_CONCURRENCY: z.coerce.number().int().positive().optional(),
  // Read by libuv when its thread pool starts, so it must be set before the process launches
  UV_THREADPOOL_SIZE: z.coerce.number().int().min(1).max(1024).default(4),

  // Encoding
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(95),
  WEBP_QUALITY: z.coerce.number().int().min(1).max(100).default(95),

  // libvips tuning (0 = libvips default)
  SHARP_CONCURRENCY: z.coerce.number().int().min(0).default(0),
  SHARP_CACHE: booleanFlag.default('false'),

  // Preview
  PREVIEW_MAX_WIDTH: z.coerce.number().int().positive().default(400),
  PREVIEW_MAX_HEIGHT: z.coerce.number().int().positive().default(200),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (parses on first use)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}

/**
 * Number of execution units the host offers to this process
 */
export function detectParallelism(): number {
  return Math.max(1, availableParallelism());
}
