/**
 * Catalog — the process-wide Counters every probe shares.
 *
 * Each Counter is constructed exactly once; Subjects key on the instance, so
 * probes must always use these constants rather than building their own.
 */

import { readFileSync } from 'node:fs';
import { Ajv } from 'ajv';
import type { JSONSchemaType } from 'ajv';
import { CatalogError } from './errors.js';
import { Counter } from './measurable.js';

// ── Host counters ──

export const intr = new Counter('intr', 'Interrupts', ['cpu']);
export const ctxt = new Counter('ctxt', 'Context switches', ['cpu']);
export const cpuNice = new Counter('cpu_nice', 'CPU ticks in nice user mode', ['cpu']);
export const cpuSystem = new Counter('cpu_system', 'CPU ticks in system mode', ['cpu']);
export const cpuIdle = new Counter('cpu_idle', 'CPU ticks idle', ['cpu']);
export const cpuIowait = new Counter('cpu_iowait', 'CPU ticks waiting for I/O', ['cpu']);
export const pgfault = new Counter('pgfault', 'Page faults', ['memory']);
export const diskReadSectors = new Counter('disk_read_sectors', 'Sectors read', ['disk']);
export const diskWriteSectors = new Counter('disk_write_sectors', 'Sectors written', ['disk']);
export const netRxBytes = new Counter('net_rx_bytes', 'Bytes received', ['net']);
export const netTxBytes = new Counter('net_tx_bytes', 'Bytes transmitted', ['net']);

// ── KVM counters ──

export interface KvmCounterEntry {
  name: string;
  description: string;
  tags: string[];
}

const kvmCatalogSchema: JSONSchemaType<KvmCounterEntry[]> = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      name: { type: 'string', pattern: '^[a-z0-9_]+$' },
      description: { type: 'string', minLength: 1 },
      tags: { type: 'array', items: { type: 'string' }, uniqueItems: true },
    },
    required: ['name', 'description', 'tags'],
    additionalProperties: false,
  },
};

const ajv = new Ajv({ allErrors: true });
const validateKvmCatalog = ajv.compile(kvmCatalogSchema);

/** Validate a parsed registry and build one Counter per entry. */
export function buildKvmCounters(raw: unknown): Counter[] {
  if (!validateKvmCatalog(raw)) {
    throw new CatalogError(`Invalid KVM counter registry: ${ajv.errorsText(validateKvmCatalog.errors)}`);
  }
  const seen = new Set<string>();
  return raw.map((entry) => {
    if (seen.has(entry.name)) {
      throw new CatalogError(`Duplicate KVM counter "${entry.name}"`);
    }
    seen.add(entry.name);
    return new Counter(entry.name, entry.description, entry.tags);
  });
}

// Resolves to <package>/data from both src/core and dist/core.
const KVM_CATALOG_URL = new URL('../../data/kvm-counters.json', import.meta.url);

export const kvmCounters: readonly Counter[] = Object.freeze(
  buildKvmCounters(JSON.parse(readFileSync(KVM_CATALOG_URL, 'utf8'))),
);
