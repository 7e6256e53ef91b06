// ──────────────────────────────────────────
// Reports: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ReportService } from './report.service';
import { createExcelReport, reportFileName, XLSX_MIME } from './excel.service';
import { InvalidPeriodError, ReportTimeoutError } from '../../shared/errors';

export interface ReportRouteOptions {
  timeoutMs: number;
}

const periodIdSchema = z.coerce.number().int().nonnegative();

export function parsePeriodId(value: unknown): number | undefined {
  if (value === undefined || value === '') return undefined;
  const result = periodIdSchema.safeParse(value);
  if (!result.success) throw new InvalidPeriodError(value);
  return result.data;
}

export function noCacheHeaders(periodId: number | undefined, now: Date = new Date()): Record<string, string> {
  return {
    'Cache-Control': 'no-cache, no-store, must-revalidate',
    Pragma: 'no-cache',
    Expires: '0',
    'Last-Modified': now.toUTCString(),
    ETag: `"${Math.floor(now.getTime() / 1000)}-${periodId ?? 'all'}"`,
  };
}

function sendError(res: Response, err: unknown, action: string): void {
  const message = err instanceof Error ? err.message : 'Internal error';
  if (err instanceof InvalidPeriodError) {
    res.status(400).json({ error: message });
    return;
  }
  if (err instanceof ReportTimeoutError) {
    console.error(`[Routes] ${action} timed out after ${err.timeoutMs}ms`);
    res.status(408).json({ error: `${message}. Please try again.` });
    return;
  }
  console.error(`[Routes] Error ${action}:`, message);
  res.status(500).json({ error: `Error ${action}: ${message}` });
}

export function createReportRoutes(reportService: ReportService, options: ReportRouteOptions): Router {
  const router = Router();

  const sendJsonReport = async (res: Response, rawPeriodId: unknown): Promise<void> => {
    try {
      const periodId = parsePeriodId(rawPeriodId);
      const report = await reportService.generateReportWithin(periodId, options.timeoutMs);
      res.set(noCacheHeaders(periodId)).json(report);
    } catch (err) {
      sendError(res, err, 'generating report');
    }
  };

  const sendExcelReport = async (res: Response, rawPeriodId: unknown): Promise<void> => {
    try {
      const periodId = parsePeriodId(rawPeriodId);
      const report = await reportService.generateReportWithin(periodId, options.timeoutMs);
      const buffer = createExcelReport(report.data);
      res
        .set(noCacheHeaders(periodId))
        .set('Content-Type', XLSX_MIME)
        .set('Content-Disposition', `attachment; filename=${reportFileName(periodId ?? null)}`)
        .send(buffer);
    } catch (err) {
      sendError(res, err, 'generating Excel report');
    }
  };

  // GET /reports?period_id=12 — JSON report (all periods when omitted)
  router.get('/reports', (req: Request, res: Response) => sendJsonReport(res, req.query.period_id));

  // GET /reports/excel?period_id=12 — spreadsheet download
  router.get('/reports/excel', (req: Request, res: Response) => sendExcelReport(res, req.query.period_id));

  // GET /reports/:periodId and /reports/:periodId/excel — path-style period
  router.get('/reports/:periodId', (req: Request, res: Response) => sendJsonReport(res, req.params.periodId));
  router.get('/reports/:periodId/excel', (req: Request, res: Response) =>
    sendExcelReport(res, req.params.periodId)
  );

  // GET /periods — periods of the first configured subdomain
  router.get('/periods', async (_req: Request, res: Response) => {
    try {
      const periods = await reportService.listPeriods();
      if (periods.length === 0) {
        res.json({ periods, message: 'No periods available' });
        return;
      }
      res.json({ periods });
    } catch (err) {
      sendError(res, err, 'getting periods');
    }
  });

  return router;
}
