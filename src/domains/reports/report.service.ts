// ──────────────────────────────────────────
// Reports: Report service — fan out over subdomains, aggregate, merge
// ──────────────────────────────────────────

import { SubdomainSourceFactory } from '../../shared/contracts';
import { ReportTimeoutError } from '../../shared/errors';
import {
  Period,
  ReportResponse,
  ReportRow,
  Subdomain,
  SubdomainFailure,
  VariableTotals,
} from '../../shared/types';
import { SubdomainRegistry } from '../../platform/subdomains';
import {
  aggregateLiquidations,
  completionPercentage,
  formatPeriodLabel,
  goalPercentage,
  round2,
} from './calculations';

export interface ReportServiceOptions {
  concurrency?: number;
  debug?: boolean;
}

type SubdomainOutcome =
  | { ok: true; rows: ReportRow[] }
  | { ok: false; error: string };

export class ReportService {
  private concurrency: number;
  private debug: boolean;

  constructor(
    private registry: SubdomainRegistry,
    private openSource: SubdomainSourceFactory,
    options: ReportServiceOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.debug = options.debug ?? false;
  }

  async generateReport(periodId?: number): Promise<ReportResponse> {
    const subdomains = this.registry.list();
    const startedAt = Date.now();
    console.log(
      `[Reports] Generating report for ${subdomains.length} subdomains (period ${periodId ?? 'all'})`
    );

    const outcomes: SubdomainOutcome[] = new Array(subdomains.length);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < subdomains.length) {
        const index = next++;
        outcomes[index] = await this.processSubdomain(subdomains[index], periodId, index, subdomains.length);
      }
    };
    const workers = Math.min(this.concurrency, subdomains.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const data: ReportRow[] = [];
    const processed: string[] = [];
    const failed: SubdomainFailure[] = [];
    outcomes.forEach((outcome, index) => {
      const name = subdomains[index].name;
      if (outcome.ok) {
        data.push(...outcome.rows);
        processed.push(name);
      } else {
        failed.push({ subdomain: name, error: outcome.error });
      }
    });

    const seconds = ((Date.now() - startedAt) / 1000).toFixed(2);
    console.log(
      `[Reports] Completed in ${seconds}s — ${data.length} records from ${processed.length} subdomains, ${failed.length} failed`
    );

    return {
      data,
      total_records: data.length,
      subdomains_processed: processed,
      subdomains_failed: failed,
      period_id: periodId ?? null,
      generated_at: new Date().toISOString(),
    };
  }

  /** Rejects with ReportTimeoutError when the report is not ready in time. */
  async generateReportWithin(periodId: number | undefined, timeoutMs: number): Promise<ReportResponse> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ReportTimeoutError(timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([this.generateReport(periodId), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Periods known to the first configured subdomain, newest first. */
  async listPeriods(limit = 20): Promise<Period[]> {
    const [first] = this.registry.list();
    if (!first) return [];

    const source = this.openSource(first.database);
    try {
      return await source.listPeriods(limit);
    } finally {
      await source.close();
    }
  }

  async getSubdomainRows(subdomain: Subdomain, periodId?: number): Promise<ReportRow[]> {
    const source = this.openSource(subdomain.database);
    try {
      if (!(await source.hasReportTables())) {
        console.warn(`[Reports] Report tables missing in ${subdomain.name} (${subdomain.database})`);
        return [];
      }
      const records = await source.findLiquidations(periodId);
      if (this.debug) {
        console.debug(`[Reports] ${subdomain.name}: ${records.length} liquidation rows`);
      }
      const agentName = this.registry.agentName(subdomain.name);
      return aggregateLiquidations(records).map((totals) => toReportRow(subdomain.name, agentName, totals));
    } finally {
      await source.close();
    }
  }

  private async processSubdomain(
    subdomain: Subdomain,
    periodId: number | undefined,
    index: number,
    total: number
  ): Promise<SubdomainOutcome> {
    const startedAt = Date.now();
    try {
      const rows = await this.getSubdomainRows(subdomain, periodId);
      const seconds = ((Date.now() - startedAt) / 1000).toFixed(2);
      console.log(`[Reports] ${index + 1}/${total} ${subdomain.name} completed in ${seconds}s — ${rows.length} records`);
      return { ok: true, rows };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Reports] ${index + 1}/${total} ${subdomain.name} failed:`, message);
      return { ok: false, error: message };
    }
  }
}

export function toReportRow(agentCode: string, agentName: string, totals: VariableTotals): ReportRow {
  return {
    codigo_agente: agentCode,
    nombre_agente: agentName,
    periodo_tiempo: formatPeriodLabel(totals.period_start, totals.period_id),
    period_id: totals.period_id,
    variable: totals.variable_name,
    meta_asignada: round2(totals.assigned_goal),
    meta_distribuida: round2(totals.distributed_goal),
    porcentaje_meta: goalPercentage(totals.distributed_goal, totals.assigned_goal),
    incentivo_asignado: round2(totals.assigned_incentive),
    incentivo_distribuido: round2(totals.distributed_incentive),
    porcentaje_variables_completadas: completionPercentage(totals.completed_users, totals.total_users),
  };
}
