/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3030),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Redis
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().default(6379),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().default(0),
  REDIS_TLS: z.enum(['true', 'false', '1', '0', '']).default('').transform(v => v === 'true' || v === '1'),

  // Meetings
  MEETING_CODE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(20),

  // Security
  CORS_ORIGINS: z.string().default('http://localhost:5173').transform(s => s.split(',').map(o => o.trim()).filter(Boolean)),
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

export const isDev = config.NODE_ENV === 'development';
export const isProd = config.NODE_ENV === 'production';
