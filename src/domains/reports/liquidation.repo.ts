// ──────────────────────────────────────────
// Reports: Liquidation repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { LiquidationRecord, ReportRoleName } from '../../shared/types';

export const REPORT_ROLES: ReportRoleName[] = ['supervisor', 'vendor', 'supernumerary'];

export type Numeric = number | string | null;

export interface LiquidationRow {
  variable_id: number;
  variable_name: string | null;
  period_id: number;
  period_start: string | null;
  user_id: number;
  goal: Numeric;
  results: Numeric;
  rule_points: Numeric;
  liquidation_points: Numeric;
  approved: Numeric;
  point_value: Numeric;
}

export class LiquidationRepo {
  constructor(private db: Knex) {}

  /**
   * One row per liquidation of a reportable role, joined to the owning
   * program's point value and the user's rule for that variable.
   */
  async findLiquidations(periodId?: number): Promise<LiquidationRecord[]> {
    const rows: LiquidationRow[] = await this.liquidationQuery(periodId);
    return rows.map(toRecord);
  }

  liquidationQuery(periodId?: number): Knex.QueryBuilder {
    return this.db('liquidations as l')
      .join('people as p', 'l.nin', 'p.nin')
      .join('users as u', 'p.id', 'u.person_id')
      .join('programs_users as pu', 'u.id', 'pu.user_id')
      .join('programs as pr', function () {
        this.on('pu.program_id', '=', 'pr.id').andOn('l.program_id', '=', 'pr.id');
      })
      .join('roles as r', 'u.role_id', 'r.id')
      .join('variables as v', 'l.variable_id', 'v.id')
      .join('periods as pe', 'l.period_id', 'pe.id')
      .leftJoin('rules as ru', function () {
        this.on('ru.user_id', '=', 'u.id').andOn('ru.variable_id', '=', 'l.variable_id');
      })
      .leftJoin('rule_periods as rp', function () {
        this.on('rp.rule_id', '=', 'ru.id').andOn('rp.period_id', '=', 'l.period_id');
      })
      .whereIn('r.name', REPORT_ROLES)
      .modify((qb) => {
        if (periodId !== undefined) qb.where('l.period_id', periodId);
      })
      .select(
        'v.id as variable_id',
        'v.name as variable_name',
        'l.period_id as period_id',
        'pe.start_date as period_start',
        'u.id as user_id',
        'l.goal as goal',
        'l.results as results',
        'ru.points as rule_points',
        'l.points as liquidation_points',
        'l.approved as approved',
        'pr.pointValue as point_value'
      )
      .orderBy('v.name', 'asc');
  }
}

export function toNumber(value: Numeric | undefined): number {
  if (value === null || value === undefined) return 0;
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

export function toRecord(row: LiquidationRow): LiquidationRecord {
  return {
    variable_id: Number(row.variable_id),
    variable_name: row.variable_name ?? '',
    period_id: Number(row.period_id),
    period_start: row.period_start ?? null,
    user_id: Number(row.user_id),
    goal: toNumber(row.goal),
    results: toNumber(row.results),
    rule_points: toNumber(row.rule_points),
    liquidation_points: toNumber(row.liquidation_points),
    approved: toNumber(row.approved) === 1,
    point_value: toNumber(row.point_value),
  };
}
