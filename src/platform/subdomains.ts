// ──────────────────────────────────────────
// Platform: Subdomain registry (name → database map file)
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Subdomain } from '../shared/types';

export function defaultAgentName(code: string): string {
  return `AGENCIA COMERCIAL ${code.toUpperCase()}`;
}

const entrySchema = z.union([
  z.string().min(1),
  z.object({
    database: z.string().min(1),
    agent_name: z.string().min(1).optional(),
  }),
]);

const fileSchema = z.record(z.string(), entrySchema);

export function parseSubdomains(raw: unknown): Subdomain[] {
  const parsed = fileSchema.parse(raw);
  return Object.entries(parsed).map(([name, entry]) =>
    typeof entry === 'string'
      ? { name, database: entry, agentName: null }
      : { name, database: entry.database, agentName: entry.agent_name ?? null }
  );
}

/** Reads the map file; a missing or malformed file yields no subdomains. */
export function loadSubdomains(file: string): Subdomain[] {
  const resolved = path.resolve(file);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[Subdomains] Cannot read ${resolved}: ${message}`);
    return [];
  }

  try {
    return parseSubdomains(JSON.parse(text));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Subdomains] Invalid subdomain map in ${resolved}: ${message}`);
    return [];
  }
}

export class SubdomainRegistry {
  private byName: Map<string, Subdomain>;

  constructor(private subdomains: Subdomain[]) {
    this.byName = new Map(subdomains.map((s) => [s.name, s]));
  }

  static fromFile(file: string): SubdomainRegistry {
    return new SubdomainRegistry(loadSubdomains(file));
  }

  list(): Subdomain[] {
    return [...this.subdomains];
  }

  names(): string[] {
    return this.subdomains.map((s) => s.name);
  }

  find(name: string): Subdomain | null {
    return this.byName.get(name) ?? null;
  }

  agentName(name: string): string {
    return this.byName.get(name)?.agentName ?? defaultAgentName(name);
  }

  get size(): number {
    return this.subdomains.length;
  }
}
