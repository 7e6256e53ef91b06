// ──────────────────────────────────────────
// Subdomain source — Knex-backed implementation of SubdomainSource
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { DbSettings } from '../config';
import { SubdomainSource, SubdomainSourceFactory } from '../shared/contracts';
import { LiquidationRecord, Period, ProbeResult } from '../shared/types';
import { SubdomainRepo } from '../platform/subdomain.repo';
import { LiquidationRepo } from '../domains/reports/liquidation.repo';
import { createSubdomainDb } from './connection';

export class KnexSubdomainSource implements SubdomainSource {
  private subdomainRepo: SubdomainRepo;
  private liquidationRepo: LiquidationRepo;

  constructor(private db: Knex) {
    this.subdomainRepo = new SubdomainRepo(db);
    this.liquidationRepo = new LiquidationRepo(db);
  }

  hasReportTables(): Promise<boolean> {
    return this.subdomainRepo.hasReportTables();
  }

  findLiquidations(periodId?: number): Promise<LiquidationRecord[]> {
    return this.liquidationRepo.findLiquidations(periodId);
  }

  listPeriods(limit?: number): Promise<Period[]> {
    return this.subdomainRepo.listPeriods(limit);
  }

  probe(): Promise<ProbeResult> {
    return this.subdomainRepo.probe();
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}

export function createSourceFactory(settings: DbSettings): SubdomainSourceFactory {
  return (database) => new KnexSubdomainSource(createSubdomainDb(settings, database));
}
