// ──────────────────────────────────────────
// Reports: Spreadsheet writer (xlsx)
// ──────────────────────────────────────────

import * as XLSX from 'xlsx';
import { ReportRow } from '../../shared/types';

export const SHEET_NAME = 'Reporte de Incentivos';
export const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const REPORT_HEADERS = [
  'Código de Agente',
  'Nombre del Agente',
  'Período de Tiempo',
  'Variable',
  'Meta Asignada',
  'Meta Distribuida',
  '% Meta',
  'Incentivo Asignado',
  'Incentivo Distribuido',
  '% Variables Completadas',
] as const;

const MAX_COLUMN_WIDTH = 50;

type Cell = string | number;

export function formatPercent(value: number | null | undefined): string {
  return value == null ? '0%' : `${value}%`;
}

export function toSheetRow(row: ReportRow): Cell[] {
  return [
    row.codigo_agente,
    row.nombre_agente,
    row.periodo_tiempo,
    row.variable,
    row.meta_asignada,
    row.meta_distribuida,
    formatPercent(row.porcentaje_meta),
    row.incentivo_asignado,
    row.incentivo_distribuido,
    formatPercent(row.porcentaje_variables_completadas),
  ];
}

/** Longest rendered cell per column plus padding, capped. */
export function columnWidths(table: Cell[][]): number[] {
  const widths: number[] = [];
  for (const line of table) {
    line.forEach((cell, col) => {
      widths[col] = Math.max(widths[col] ?? 0, String(cell).length);
    });
  }
  return widths.map((w) => Math.min(w + 2, MAX_COLUMN_WIDTH));
}

export function createExcelReport(rows: ReportRow[]): Buffer {
  const table: Cell[][] = [[...REPORT_HEADERS], ...rows.map(toSheetRow)];
  const sheet = XLSX.utils.aoa_to_sheet(table);

  sheet['!cols'] = columnWidths(table).map((wch) => ({ wch }));
  // Header plus data rows
  sheet['!autofilter'] = {
    ref: XLSX.utils.encode_range({ s: { r: 0, c: 0 }, e: { r: table.length - 1, c: REPORT_HEADERS.length - 1 } }),
  };

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);

  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

export function reportFileName(periodId: number | null, now: Date = new Date()): string {
  const stamp = Math.floor(now.getTime() / 1000);
  const scope = periodId === null ? 'all_periods' : `period_${periodId}`;
  return `incentive_report_${scope}_${stamp}.xlsx`;
}
