// ──────────────────────────────────────────
// Platform: API routes — subdomain listing and connection checks
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { SubdomainRegistry } from './subdomains';
import { ConnectionTester } from './diagnostics';

export function createPlatformRoutes(registry: SubdomainRegistry, tester: ConnectionTester): Router {
  const router = Router();

  // GET /subdomains — configured subdomain names
  router.get('/subdomains', (_req: Request, res: Response) => {
    res.json({ subdomains: registry.names() });
  });

  // GET /test-subdomains — probe the first few subdomain databases
  router.get('/test-subdomains', async (_req: Request, res: Response) => {
    try {
      const report = await tester.testSubdomains();
      res.json(report);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      console.error('[Routes] Error testing subdomains:', message);
      res.status(500).json({
        status: 'error',
        error: message,
        error_type: err instanceof Error ? err.name : typeof err,
      });
    }
  });

  return router;
}
