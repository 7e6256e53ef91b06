// ──────────────────────────────────────────
// Script: Export — write the incentive report spreadsheet to disk
// Usage: tsx scripts/export-report.ts [--period 12] [--out report.xlsx]
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs';
import path from 'path';
import { loadConfig } from '../src/config';
import { createSourceFactory } from '../src/db/source';
import { SubdomainRegistry } from '../src/platform/subdomains';
import { ReportService, createExcelReport, reportFileName } from '../src/domains/reports';
import { parsePeriodId } from '../src/domains/reports/routes';

function argValue(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

async function exportReport() {
  const config = loadConfig();
  const periodId = parsePeriodId(argValue('--period'));
  const outFile = path.resolve(argValue('--out') ?? reportFileName(periodId ?? null));

  const registry = SubdomainRegistry.fromFile(config.subdomainsFile);
  const reportService = new ReportService(registry, createSourceFactory(config.db), {
    concurrency: config.reportConcurrency,
    debug: config.debug,
  });

  console.log(`[Export] Building report for ${registry.size} subdomains...`);
  const report = await reportService.generateReportWithin(periodId, config.reportTimeoutMs);
  fs.writeFileSync(outFile, createExcelReport(report.data));

  console.log(`[Export] ✅ Wrote ${report.total_records} rows to ${outFile}`);
  if (report.subdomains_failed.length > 0) {
    console.warn(`[Export] ${report.subdomains_failed.length} subdomains failed:`);
    for (const failure of report.subdomains_failed) {
      console.warn(`  - ${failure.subdomain}: ${failure.error}`);
    }
  }
}

exportReport().catch((err) => {
  console.error('[Export] Error:', err);
  process.exit(1);
});
