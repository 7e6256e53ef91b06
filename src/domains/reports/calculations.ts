// ──────────────────────────────────────────
// Reports: goal and incentive arithmetic
// ──────────────────────────────────────────

import { LiquidationRecord, VariableTotals } from '../../shared/types';

export const MONTH_NAMES = [
  'Enero',
  'Febrero',
  'Marzo',
  'Abril',
  'Mayo',
  'Junio',
  'Julio',
  'Agosto',
  'Septiembre',
  'Octubre',
  'Noviembre',
  'Diciembre',
] as const;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Share of the assigned goal that was achieved; 0 when nothing was assigned. */
export function goalPercentage(distributed: number, assigned: number): number {
  if (!(assigned > 0)) return 0;
  return round2((distributed / assigned) * 100);
}

export function completionPercentage(completed: number, total: number): number {
  if (!(total > 0)) return 0;
  return round2((completed / total) * 100);
}

export function incentive(points: number, pointValue: number): number {
  return points * pointValue;
}

/** "Agosto 2025" from a `YYYY-MM-DD...` start date. */
export function formatPeriodLabel(periodStart: string | null, periodId: number): string {
  const match = periodStart ? /^(\d{4})-(\d{2})/.exec(periodStart) : null;
  if (!match) return `Periodo ${periodId}`;
  const month = MONTH_NAMES[Number(match[2]) - 1];
  return month ? `${month} ${match[1]}` : `Periodo ${periodId}`;
}

interface Accumulator {
  totals: VariableTotals;
  users: Set<number>;
  completed: Set<number>;
}

/**
 * Groups liquidations by variable and period. Sums are taken over rows;
 * user counts are distinct. A user completed a variable when any of their
 * rows for it has results > 0.
 */
export function aggregateLiquidations(records: LiquidationRecord[]): VariableTotals[] {
  const groups = new Map<string, Accumulator>();

  for (const rec of records) {
    const key = `${rec.variable_id}:${rec.period_id}`;
    let acc = groups.get(key);
    if (!acc) {
      acc = {
        totals: {
          variable_id: rec.variable_id,
          variable_name: rec.variable_name,
          period_id: rec.period_id,
          period_start: rec.period_start,
          assigned_goal: 0,
          distributed_goal: 0,
          assigned_incentive: 0,
          distributed_incentive: 0,
          total_users: 0,
          completed_users: 0,
        },
        users: new Set(),
        completed: new Set(),
      };
      groups.set(key, acc);
    }

    const t = acc.totals;
    t.assigned_goal += rec.goal;
    t.distributed_goal += rec.results;
    t.assigned_incentive += incentive(rec.rule_points, rec.point_value);
    if (rec.approved) {
      t.distributed_incentive += incentive(rec.liquidation_points, rec.point_value);
    }
    acc.users.add(rec.user_id);
    if (rec.results > 0) acc.completed.add(rec.user_id);
  }

  return Array.from(groups.values())
    .map(({ totals, users, completed }) => ({
      ...totals,
      total_users: users.size,
      completed_users: completed.size,
    }))
    .sort((a, b) => a.variable_name.localeCompare(b.variable_name) || a.period_id - b.period_id);
}
