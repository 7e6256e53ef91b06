// ──────────────────────────────────────────
// Configuration — environment variables validated with zod
// ──────────────────────────────────────────

import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseOrigins(value: string): string[] {
  const trimmed = value.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return parsed.map((origin) => String(origin).trim()).filter(Boolean);
      }
    } catch {
      // not JSON, fall through to the comma list
    }
  }
  return trimmed.split(',').map((origin) => origin.trim()).filter(Boolean);
}

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => ['1', 'true', 'yes', 'on'].includes((v ?? '').trim().toLowerCase()));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(3306),
  DB_USER: z.string().default('root'),
  DB_PASSWORD: z.string().default(''),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SUBDOMAINS_FILE: z.string().default('static/subdomains.json'),
  ALLOWED_ORIGINS: z.string().default('*').transform(parseOrigins),
  DEBUG: booleanFlag,
  REPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  REPORT_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(1),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
});

export interface DbSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  connectTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  db: DbSettings;
  subdomainsFile: string;
  allowedOrigins: string[];
  debug: boolean;
  reportTimeoutMs: number;
  reportConcurrency: number;
  apiPrefix: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration — ${problems}`);
  }

  const e = result.data;
  return {
    port: e.PORT,
    host: e.HOST,
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
    },
    subdomainsFile: e.SUBDOMAINS_FILE,
    allowedOrigins: e.ALLOWED_ORIGINS,
    debug: e.DEBUG,
    reportTimeoutMs: e.REPORT_TIMEOUT_MS,
    reportConcurrency: e.REPORT_CONCURRENCY,
    apiPrefix: e.API_PREFIX,
  };
}
