// ──────────────────────────────────────────
// Database connection — one short-lived Knex handle per subdomain
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { DbSettings } from '../config';

/**
 * Opens a fresh handle on the MySQL server, bound to `database` when given.
 * Handles are never cached; callers destroy them when done.
 */
export function createSubdomainDb(settings: DbSettings, database?: string): Knex {
  return knex({
    client: 'mysql2',
    connection: {
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database,
      charset: 'utf8mb4',
      connectTimeout: settings.connectTimeoutMs,
      dateStrings: true,
    },
    pool: { min: 0, max: 1 },
    acquireConnectionTimeout: settings.connectTimeoutMs,
  });
}
