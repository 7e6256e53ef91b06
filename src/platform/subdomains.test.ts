import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SubdomainRegistry, defaultAgentName, loadSubdomains, parseSubdomains } from './subdomains';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'subdomains-'));

test.after(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeMap(name: string, contents: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, contents, 'utf-8');
  return file;
}

test('parseSubdomains accepts plain database names and detailed entries', () => {
  assert.deepStrictEqual(
    parseSubdomains({
      norte: 'db_norte',
      sur: { database: 'db_sur', agent_name: 'DISTRIBUIDORA SUR' },
      centro: { database: 'db_centro' },
    }),
    [
      { name: 'norte', database: 'db_norte', agentName: null },
      { name: 'sur', database: 'db_sur', agentName: 'DISTRIBUIDORA SUR' },
      { name: 'centro', database: 'db_centro', agentName: null },
    ]
  );
});

test('parseSubdomains rejects entries without a database', () => {
  assert.throws(() => parseSubdomains({ norte: { agent_name: 'X' } }));
  assert.throws(() => parseSubdomains(['db_norte']));
});

test('loadSubdomains reads the map file in key order', () => {
  const file = writeMap('ok.json', JSON.stringify({ b: 'db_b', a: 'db_a' }));
  assert.deepStrictEqual(
    loadSubdomains(file).map((s) => s.name),
    ['b', 'a']
  );
});

test('loadSubdomains: missing file yields no subdomains', () => {
  assert.deepStrictEqual(loadSubdomains(path.join(tmpDir, 'absent.json')), []);
});

test('loadSubdomains: malformed JSON yields no subdomains', () => {
  const file = writeMap('broken.json', '{ not json');
  assert.deepStrictEqual(loadSubdomains(file), []);
});

test('registry resolves agent names with a fallback', () => {
  const registry = new SubdomainRegistry([
    { name: 'norte', database: 'db_norte', agentName: 'DISTRIBUIDORA NORTE' },
    { name: 'maxgol', database: 'db_maxgol', agentName: null },
  ]);

  assert.strictEqual(registry.agentName('norte'), 'DISTRIBUIDORA NORTE');
  assert.strictEqual(registry.agentName('maxgol'), 'AGENCIA COMERCIAL MAXGOL');
  assert.strictEqual(registry.agentName('unknown'), 'AGENCIA COMERCIAL UNKNOWN');
  assert.deepStrictEqual(registry.names(), ['norte', 'maxgol']);
  assert.strictEqual(registry.find('maxgol')?.database, 'db_maxgol');
  assert.strictEqual(registry.find('nope'), null);
  assert.strictEqual(registry.size, 2);
});

test('defaultAgentName upper-cases the code', () => {
  assert.strictEqual(defaultAgentName('1030773'), 'AGENCIA COMERCIAL 1030773');
  assert.strictEqual(defaultAgentName('comercruz'), 'AGENCIA COMERCIAL COMERCRUZ');
});

test('SubdomainRegistry.fromFile loads from disk', () => {
  const file = writeMap('from-file.json', JSON.stringify({ norte: { database: 'db_norte' } }));
  const registry = SubdomainRegistry.fromFile(file);
  assert.deepStrictEqual(registry.list(), [{ name: 'norte', database: 'db_norte', agentName: null }]);
});
