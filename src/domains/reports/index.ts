// ──────────────────────────────────────────
// Reports domain — barrel export
// ──────────────────────────────────────────

export { LiquidationRepo } from './liquidation.repo';
export { ReportService } from './report.service';
export { createExcelReport, reportFileName } from './excel.service';
export { createReportRoutes } from './routes';
