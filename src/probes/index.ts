/**
 * Probe registry.
 */

import type { Clock, Probe } from '../core/types.js';
import { systemClock } from '../core/types.js';
import { DiskstatsProbe } from './diskstats.js';
import { KvmProbe } from './kvm.js';
import { NetdevProbe } from './netdev.js';
import { StatProbe } from './stat.js';
import { VmstatProbe } from './vmstat.js';

export interface ProbeRoots {
  procRoot: string;
  debugfsRoot: string;
  enableKvm: boolean;
}

/** The probes a sampling cycle runs, in their fixed order. */
export function defaultProbes(roots: ProbeRoots, clock: Clock = systemClock): Probe[] {
  const probes: Probe[] = [
    new StatProbe(roots.procRoot, clock),
    new VmstatProbe(roots.procRoot, clock),
    new DiskstatsProbe(roots.procRoot, clock),
    new NetdevProbe(roots.procRoot, clock),
  ];
  if (roots.enableKvm) {
    probes.push(new KvmProbe(roots.debugfsRoot, clock));
  }
  return probes;
}

export { DiskstatsProbe, parseDiskstats } from './diskstats.js';
export { KvmProbe } from './kvm.js';
export { NetdevProbe, parseNetdev } from './netdev.js';
export { StatProbe, parseStat } from './stat.js';
export { VmstatProbe, parseVmstat } from './vmstat.js';
