// ──────────────────────────────────────────
// Express application — middleware and route mounting
// ──────────────────────────────────────────

import express, { Express } from 'express';
import cors from 'cors';
import { ReportService, createReportRoutes } from './domains/reports';
import { SubdomainRegistry } from './platform/subdomains';
import { ConnectionTester } from './platform/diagnostics';
import { createPlatformRoutes } from './platform/routes';

export const SERVICE_NAME = 'Incentive Reports API';

export interface ServerDeps {
  registry: SubdomainRegistry;
  reportService: ReportService;
  connectionTester: ConnectionTester;
  allowedOrigins: string[];
  apiPrefix: string;
  reportTimeoutMs: number;
}

export function createServer(deps: ServerDeps): Express {
  const app = express();
  app.use(express.json());
  app.use(
    cors({
      origin: deps.allowedOrigins.includes('*') ? true : deps.allowedOrigins,
      credentials: true,
    })
  );

  app.use(deps.apiPrefix, createReportRoutes(deps.reportService, { timeoutMs: deps.reportTimeoutMs }));
  app.use(deps.apiPrefix, createPlatformRoutes(deps.registry, deps.connectionTester));

  app.get('/', (_req, res) => {
    res.json({ message: `${SERVICE_NAME} is running` });
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  return app;
}
