/**
 * Environment configuration
 *
 * Read once at startup and passed explicitly to every component; nothing
 * below index.ts reads process.env.
 */

import { z } from 'zod';
import { TIMEOUTS } from '@streamclip/shared';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

const envSchema = z.object({
  PLEX_URL: z.url(),
  PLEX_TOKEN: z.string().min(1),
  STATIC_ROOT: z.string().min(1).default('data/static'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  CORS_ORIGIN: z.string().optional(),
  PLEX_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUTS.PLEX_REQUEST_MS),
  TRANSCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUTS.TRANSCODE_MS),
  FFMPEG_PATH: z.string().optional(),
  FFPROBE_PATH: z.string().optional(),
});

export interface AppConfig {
  plex: {
    url: string;
    token: string;
    timeoutMs: number;
  };
  transcode: {
    timeoutMs: number;
    ffmpegPath?: string;
    ffprobePath?: string;
  };
  staticRoot: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  prettyLogs: boolean;
  /** true reflects the request origin */
  corsOrigin: string | boolean;
}

/**
 * Validate an environment and build the application config
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = result.data;
  return {
    plex: {
      url: vars.PLEX_URL,
      token: vars.PLEX_TOKEN,
      timeoutMs: vars.PLEX_TIMEOUT_MS,
    },
    transcode: {
      timeoutMs: vars.TRANSCODE_TIMEOUT_MS,
      ffmpegPath: vars.FFMPEG_PATH,
      ffprobePath: vars.FFPROBE_PATH,
    },
    staticRoot: vars.STATIC_ROOT,
    host: vars.HOST,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    prettyLogs: vars.NODE_ENV === 'development',
    corsOrigin: vars.CORS_ORIGIN ?? true,
  };
}
