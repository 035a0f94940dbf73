import { getEnv, parseEnv, detectParallelism, type Env } from './env.js';

export { getEnv, parseEnv, detectParallelism, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logging: {
    level: string;
  };
  dispatcher: {
    concurrency: number;
    /** libuv threads available for file reads, decodes and encodes */
    threadPoolSize: number;
  };
  encoding: {
    jpegQuality: number;
    webpQuality: number;
  };
  sharp: {
    concurrency: number;
    cache: boolean;
  };
  preview: {
    maxWidth: number;
    maxHeight: number;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    env: env.NODE_ENV,
    logging: {
      level: env.LOG_LEVEL,
    },
    dispatcher: {
      concurrency: env.ROTATOR_CONCURRENCY ?? detectParallelism(),
      threadPoolSize: env.UV_THREADPOOL_SIZE,
    },
    encoding: {
      jpegQuality: env.JPEG_QUALITY,
      webpQuality: env.WEBP_QUALITY,
    },
    sharp: {
      concurrency: env.SHARP_CONCURRENCY,
      cache: env.SHARP_CACHE,
    },
    preview: {
      maxWidth: env.PREVIEW_MAX_WIDTH,
      maxHeight: env.PREVIEW_MAX_HEIGHT,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
