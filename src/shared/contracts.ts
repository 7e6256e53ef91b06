// ──────────────────────────────────────────
// Contracts — typed interfaces between platform and domains
// ──────────────────────────────────────────

import { LiquidationRecord, Period, ProbeResult } from './types';

/**
 * Everything the report domain needs from one subdomain database.
 * A source is opened per use and must be closed by the caller.
 */
export interface SubdomainSource {
  hasReportTables(): Promise<boolean>;
  findLiquidations(periodId?: number): Promise<LiquidationRecord[]>;
  listPeriods(limit?: number): Promise<Period[]>;
  probe(): Promise<ProbeResult>;
  close(): Promise<void>;
}

/** Opens a fresh source for a database name; never cached. */
export type SubdomainSourceFactory = (database: string) => SubdomainSource;
