import test from 'node:test';
import assert from 'node:assert/strict';
import { ConnectionTester, successRate } from './diagnostics';
import { SubdomainRegistry } from './subdomains';
import { SubdomainSource, SubdomainSourceFactory } from '../shared/contracts';
import { ProbeResult, Subdomain } from '../shared/types';
import { DbSettings } from '../config';

const settings: DbSettings = {
  host: 'db.internal',
  port: 3306,
  user: 'report_reader',
  password: 'test-secret',
  connectTimeoutMs: 1000,
};

const probe: ProbeResult = {
  test_query_result: 1,
  current_time: '2025-08-15 10:00:00',
  database_name_actual: 'db_a',
  mysql_version: '8.0.36',
  table_count: 42,
};

function factory(failing: Set<string>, closed: string[] = []): SubdomainSourceFactory {
  return (database) => {
    const source: SubdomainSource = {
      async hasReportTables() {
        return true;
      },
      async findLiquidations() {
        return [];
      },
      async listPeriods() {
        return [];
      },
      async probe() {
        if (failing.has(database)) {
          const err = new Error(`Access denied for database '${database}'`);
          err.name = 'AccessDeniedError';
          throw err;
        }
        return { ...probe, database_name_actual: database };
      },
      async close() {
        closed.push(database);
      },
    };
    return source;
  };
}

function subdomains(count: number): Subdomain[] {
  return Array.from({ length: count }, (_, i) => ({ name: `s${i + 1}`, database: `db_${i + 1}`, agentName: null }));
}

test('successRate formats one decimal', () => {
  assert.strictEqual(successRate(2, 3), '66.7%');
  assert.strictEqual(successRate(5, 5), '100.0%');
  assert.strictEqual(successRate(0, 0), '0%');
});

test('testSubdomains probes only the first five', async () => {
  const closed: string[] = [];
  const tester = new ConnectionTester(new SubdomainRegistry(subdomains(7)), factory(new Set(), closed), settings, 'static/subdomains.json');

  const report = await tester.testSubdomains();

  assert.strictEqual(report.status, 'completed');
  assert.strictEqual(report.message, 'Tested 5 of 7 subdomains (first 5 only)');
  assert.strictEqual(report.results.total_subdomains_configured, 7);
  assert.strictEqual(report.results.total_subdomains_tested, 5);
  assert.deepStrictEqual(Object.keys(report.results.subdomain_results), ['s1', 's2', 's3', 's4', 's5']);
  assert.deepStrictEqual(closed, ['db_1', 'db_2', 'db_3', 'db_4', 'db_5']);
});

test('testSubdomains records failures and masks the password', async () => {
  const registry = new SubdomainRegistry(subdomains(2));
  const tester = new ConnectionTester(registry, factory(new Set(['db_2'])), settings, 'static/subdomains.json');

  const report = await tester.testSubdomains();

  assert.deepStrictEqual(report.results.subdomain_results.s1, {
    status: 'connected',
    database_name: 'db_1',
    ...probe,
    database_name_actual: 'db_1',
  });
  assert.deepStrictEqual(report.results.subdomain_results.s2, {
    status: 'error',
    database_name: 'db_2',
    error: "Access denied for database 'db_2'",
    error_type: 'AccessDeniedError',
  });
  assert.strictEqual(report.results.successful_connections, 1);
  assert.strictEqual(report.results.failed_connections, 1);
  assert.deepStrictEqual(report.results.summary, {
    connection_success_rate: '50.0%',
    all_connected: false,
    connection_params: { host: 'db.internal', port: 3306, user: 'report_reader', password: '***' },
  });
});

test('testSubdomains warns when nothing is configured', async () => {
  const tester = new ConnectionTester(new SubdomainRegistry([]), factory(new Set()), settings, 'static/subdomains.json');

  const report = await tester.testSubdomains();

  assert.strictEqual(report.status, 'warning');
  assert.strictEqual(report.message, 'No subdomains configured');
  assert.strictEqual(report.subdomains_file, 'static/subdomains.json');
  assert.strictEqual(report.results.total_subdomains_tested, 0);
  assert.strictEqual(report.results.summary, null);
});

test('testSubdomains keeps going when closing a connection fails', async () => {
  const base = factory(new Set());
  const flaky: SubdomainSourceFactory = (database) => {
    const source = base(database);
    if (database !== 'db_2') return source;
    return {
      ...source,
      async close() {
        throw new Error('destroy failed');
      },
    };
  };
  const tester = new ConnectionTester(new SubdomainRegistry(subdomains(3)), flaky, settings, 'static/subdomains.json');

  const report = await tester.testSubdomains();

  assert.strictEqual(report.status, 'completed');
  assert.deepStrictEqual(Object.keys(report.results.subdomain_results), ['s1', 's2', 's3']);
  assert.strictEqual(report.results.subdomain_results.s2.status, 'connected');
  assert.strictEqual(report.results.successful_connections, 3);
});
