import { z } from 'zod';
import dotenv from 'dotenv';
import { MAX_CHART_POINTS, MAX_SAMPLE_ROWS, MAX_TOP_N } from './limits.js';

const positiveInt = (fallback: number, max?: number) => {
  const base = z.coerce.number().int().positive();
  return (max === undefined ? base : base.max(max)).default(fallback);
};

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  // SQLite store, populated by the import step and opened read-only here
  DATABASE_PATH: z.string().default('./data/ecommerce.db'),
  DATABASE_READONLY: z
    .string()
    .transform((val) => val !== 'false')
    .optional()
    .default('true'),
  QUERY_TIMEOUT_MS: positiveInt(10000),
  MAX_QUERY_RESULTS: positiveInt(10000),
  DEFAULT_QUERY_LIMIT: positiveInt(1000),
  SAMPLE_DEFAULT_ROWS: positiveInt(10, MAX_SAMPLE_ROWS),

  // Analytics presets
  ANALYTICS_TOP_N: positiveInt(20, MAX_TOP_N),
  GEOGRAPHIC_MIN_SESSIONS: positiveInt(5),
  // Upper click bounds of each engagement tier; the last tier is open-ended
  SEGMENT_THRESHOLDS: z
    .string()
    .regex(/^\d+(,\d+)*$/, 'Expected comma-separated integers')
    .default('1,5,15,30'),

  // Chart rendering
  CHART_WIDTH: positiveInt(800, 4000),
  CHART_HEIGHT: positiveInt(500, 4000),
  CHART_SCALE: z.coerce.number().positive().max(4).default(1),
  CHART_MAX_POINTS: positiveInt(20, MAX_CHART_POINTS),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: positiveInt(900000), // 15 minutes
  RATE_LIMIT_MAX_REQUESTS: positiveInt(100),

  // Comma-separated origins allowed by the HTTP API
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:5173'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Chat client
  ANALYTICS_SERVER_COMMAND: z.string().default('node'),
  ANALYTICS_SERVER_ARGS: z.string().default('dist/mcp/index.js'),
  CHART_SAVE_DIR: z.string().default('./charts'),
  CLIENT_TIMEOUT_MS: positiveInt(30000),
});

export type Environment = z.infer<typeof envSchema>;

export function parseEnvironment(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

function loadEnvironment(): Environment {
  const envFile =
    process.env.NODE_ENV === 'production'
      ? '.env'
      : process.env.NODE_ENV === 'staging'
        ? '.env.staging'
        : '.env.local';

  if (process.env.NODE_ENV !== 'test') {
    dotenv.config({ path: envFile, override: true });
  }

  const result = parseEnvironment(process.env);

  if (!result.success) {
    // stdout may be an MCP stream, so diagnostics go to stderr
    console.error('Environment validation failed:', result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnvironment();
