import { describe, it, expect } from 'vitest';
import * as catalog from '../src/core/catalog.js';
import { CatalogError } from '../src/core/errors.js';
import { isCounter } from '../src/core/measurable.js';

describe('host counters', () => {
  it('are counters tagged by subsystem', () => {
    expect(isCounter(catalog.intr)).toBe(true);
    expect(catalog.cpuIdle.hasTag('cpu')).toBe(true);
    expect(catalog.pgfault.hasTag('memory')).toBe(true);
    expect(catalog.diskWriteSectors.hasTag('disk')).toBe(true);
    expect(catalog.netTxBytes.hasTag('net')).toBe(true);
  });

  it('have distinct identities', () => {
    const ids = [
      catalog.intr, catalog.ctxt, catalog.cpuNice, catalog.cpuSystem, catalog.cpuIdle,
      catalog.cpuIowait, catalog.pgfault, catalog.diskReadSectors, catalog.diskWriteSectors,
      catalog.netRxBytes, catalog.netTxBytes,
    ].map((c) => c.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

describe('KVM counter registry', () => {
  it('loads every entry from the data file', () => {
    expect(catalog.kvmCounters).toHaveLength(32);
    expect(catalog.kvmCounters.every(isCounter)).toBe(true);
    expect(Object.isFrozen(catalog.kvmCounters)).toBe(true);
  });

  it('carries descriptions and subsystem tags', () => {
    const pfFixed = catalog.kvmCounters.find((c) => c.name === 'pf_fixed');
    expect(pfFixed?.description).toBe('KVM page faults fixed by the host');
    expect(pfFixed?.hasTag('kvm_paging')).toBe(true);
    const tlb = catalog.kvmCounters.filter((c) => c.hasTag('kvm_tlb')).map((c) => c.name);
    expect(tlb).toEqual(['tlb_flush', 'remote_tlb_flush', 'invlpg']);
  });

  it('builds counters from valid entries', () => {
    const counters = catalog.buildKvmCounters([
      { name: 'exits', description: 'KVM exits', tags: ['kvm_exits'] },
    ]);
    expect(counters).toHaveLength(1);
    expect(counters[0].name).toBe('exits');
    expect([...counters[0].tags]).toEqual(['kvm_exits']);
  });

  it('rejects entries missing a field', () => {
    expect(() => catalog.buildKvmCounters([{ name: 'exits', tags: [] }])).toThrow(CatalogError);
  });

  it('rejects names that are not file names', () => {
    expect(() => catalog.buildKvmCounters([{ name: '../exits', description: 'x', tags: [] }])).toThrow(
      'Invalid KVM counter registry',
    );
  });

  it('rejects duplicate names', () => {
    const entry = { name: 'exits', description: 'KVM exits', tags: [] };
    expect(() => catalog.buildKvmCounters([entry, entry])).toThrow('Duplicate KVM counter "exits"');
  });
});
