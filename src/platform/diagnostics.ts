// ──────────────────────────────────────────
// Platform: Subdomain connection diagnostics
// ──────────────────────────────────────────

import { DbSettings } from '../config';
import { SubdomainSource, SubdomainSourceFactory } from '../shared/contracts';
import { ConnectionTestReport, ConnectionTestResults, Subdomain, SubdomainProbe } from '../shared/types';
import { SubdomainRegistry } from './subdomains';

export const DEFAULT_PROBE_LIMIT = 5;

export class ConnectionTester {
  constructor(
    private registry: SubdomainRegistry,
    private openSource: SubdomainSourceFactory,
    private settings: DbSettings,
    private subdomainsFile: string
  ) {}

  /** Probes the first `limit` configured subdomains one after another. */
  async testSubdomains(limit = DEFAULT_PROBE_LIMIT): Promise<ConnectionTestReport> {
    const all = this.registry.list();
    const tested = all.slice(0, limit);

    const results: ConnectionTestResults = {
      total_subdomains_configured: all.length,
      total_subdomains_tested: tested.length,
      successful_connections: 0,
      failed_connections: 0,
      subdomain_results: {},
      summary: null,
    };

    if (all.length === 0) {
      return {
        status: 'warning',
        message: 'No subdomains configured',
        subdomains_file: this.subdomainsFile,
        results,
      };
    }

    for (const subdomain of tested) {
      const probe = await this.probeSubdomain(subdomain);
      results.subdomain_results[subdomain.name] = probe;
      if (probe.status === 'connected') results.successful_connections++;
      else results.failed_connections++;
    }

    results.summary = {
      connection_success_rate: successRate(results.successful_connections, results.total_subdomains_tested),
      all_connected: results.failed_connections === 0,
      connection_params: {
        host: this.settings.host,
        port: this.settings.port,
        user: this.settings.user,
        password: this.settings.password ? '***' : 'None',
      },
    };

    return {
      status: 'completed',
      message: `Tested ${tested.length} of ${all.length} subdomains (first ${limit} only)`,
      results,
    };
  }

  private async probeSubdomain(subdomain: Subdomain): Promise<SubdomainProbe> {
    const source = this.openSource(subdomain.database);
    try {
      const probe = await source.probe();
      return { status: 'connected', database_name: subdomain.database, ...probe };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Diagnostics] ${subdomain.name} unreachable:`, message);
      return {
        status: 'error',
        database_name: subdomain.database,
        error: message,
        error_type: err instanceof Error ? err.name : typeof err,
      };
    } finally {
      await this.closeSource(subdomain, source);
    }
  }

  private async closeSource(subdomain: Subdomain, source: SubdomainSource): Promise<void> {
    try {
      await source.close();
    } catch (err) {
      console.error(`[Diagnostics] Failed to close ${subdomain.name}:`, err instanceof Error ? err.message : err);
    }
  }
}

export function successRate(successful: number, tested: number): string {
  if (tested === 0) return '0%';
  return `${((successful / tested) * 100).toFixed(1)}%`;
}
