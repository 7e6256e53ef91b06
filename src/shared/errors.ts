// ──────────────────────────────────────────
// Shared error types
// ──────────────────────────────────────────

export class ReportTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Report generation timed out after ${formatDuration(timeoutMs)}`);
    this.name = 'ReportTimeoutError';
  }
}

export class InvalidPeriodError extends Error {
  constructor(value: unknown) {
    super(`Invalid period id: ${String(value)}`);
    this.name = 'InvalidPeriodError';
  }
}

function formatDuration(ms: number): string {
  if (ms % 60_000 === 0) {
    const minutes = ms / 60_000;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}
