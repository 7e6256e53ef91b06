// ──────────────────────────────────────────
// App entry point — bootstrap + Express server
// ──────────────────────────────────────────
// Bootstrap order:
// 1. Load and validate configuration
// 2. Load the subdomain map
// 3. Instantiate services with the per-subdomain source factory
// 4. Mount routes and listen

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { createSourceFactory } from './db/source';
import { SubdomainRegistry } from './platform/subdomains';
import { ConnectionTester } from './platform/diagnostics';
import { ReportService } from './domains/reports';
import { createServer, SERVICE_NAME } from './server';

async function main() {
  const config = loadConfig();

  // ── Platform ──
  const registry = SubdomainRegistry.fromFile(config.subdomainsFile);
  const openSource = createSourceFactory(config.db);
  const connectionTester = new ConnectionTester(registry, openSource, config.db, config.subdomainsFile);
  console.log(`[App] Loaded ${registry.size} subdomains from ${config.subdomainsFile}`);

  // ── Reports ──
  const reportService = new ReportService(registry, openSource, {
    concurrency: config.reportConcurrency,
    debug: config.debug,
  });

  // ── Express app ──
  const app = createServer({
    registry,
    reportService,
    connectionTester,
    allowedOrigins: config.allowedOrigins,
    apiPrefix: config.apiPrefix,
    reportTimeoutMs: config.reportTimeoutMs,
  });

  const server = app.listen(config.port, config.host, () => {
    console.log(`[App] ${SERVICE_NAME} listening on ${config.host}:${config.port}`);
  });

  // Graceful shutdown — connections are per request, so only the listener needs closing
  const shutdown = () => {
    console.log('[App] Shutting down...');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
