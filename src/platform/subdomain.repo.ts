// ──────────────────────────────────────────
// Platform: per-subdomain schema checks, probes and periods
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { Period, ProbeResult } from '../shared/types';

export const REPORT_TABLES = [
  'users',
  'people',
  'liquidations',
  'roles',
  'programs_users',
  'programs',
  'variables',
  'periods',
] as const;

// Enough of the schema to run the liquidation joins
export const MIN_REPORT_TABLES = 6;

interface CountRow {
  table_count: number | string;
}

interface ProbeRow {
  test_query_result: number | string | null;
  server_time: string | Date | null;
  database_name: string | null;
  mysql_version: string | null;
}

interface PeriodRow {
  id: number;
  start_date: string | null;
  end_date: string | null;
  name: string | null;
}

/** mysql2 resolves raw queries to `[rows, fields]`. */
export function rawRows<T>(result: T[][]): T[] {
  return result[0] ?? [];
}

export class SubdomainRepo {
  constructor(private db: Knex) {}

  async hasReportTables(): Promise<boolean> {
    const count = await this.countTables(REPORT_TABLES);
    return count >= MIN_REPORT_TABLES;
  }

  async probe(): Promise<ProbeResult> {
    const result = await this.db.raw(
      `SELECT 1 AS test_query_result,
              NOW() AS server_time,
              DATABASE() AS database_name,
              VERSION() AS mysql_version`
    );
    const row = rawRows<ProbeRow>(result)[0];
    const tableCount = await this.countTables();

    return {
      test_query_result: row?.test_query_result == null ? null : Number(row.test_query_result),
      current_time: row?.server_time == null ? null : String(row.server_time),
      database_name_actual: row?.database_name ?? null,
      mysql_version: row?.mysql_version ?? null,
      table_count: tableCount,
    };
  }

  async listPeriods(limit = 20): Promise<Period[]> {
    const rows: PeriodRow[] = await this.db('periods')
      .select('id', 'start_date', 'end_date', 'name')
      .orderBy('start_date', 'desc')
      .limit(limit);

    return rows.map((row) => ({
      id: Number(row.id),
      start_date: row.start_date ?? null,
      end_date: row.end_date ?? null,
      name: row.name || `Periodo ${row.id}`,
    }));
  }

  private async countTables(names?: readonly string[]): Promise<number> {
    let sql = 'SELECT COUNT(*) AS table_count FROM information_schema.tables WHERE table_schema = DATABASE()';
    const bindings: string[] = [];
    if (names && names.length > 0) {
      sql += ` AND table_name IN (${names.map(() => '?').join(', ')})`;
      bindings.push(...names);
    }
    const result = await this.db.raw(sql, bindings);
    return Number(rawRows<CountRow>(result)[0]?.table_count ?? 0);
  }
}
