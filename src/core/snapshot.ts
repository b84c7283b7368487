/**
 * Snapshot assembly.
 */

import { createLogger } from './logger.js';
import type { Sample } from './sample.js';
import type { Probe } from './types.js';

const log = createLogger('snapshot');

/** Every Sample gathered by one pass over the probes, in probe order. */
export type Snapshot = readonly Sample[];

/**
 * Run each probe once, in array order, and concatenate the results.
 * Probe failures propagate to the caller.
 */
export async function probeAll(probes: readonly Probe[]): Promise<Snapshot> {
  const samples: Sample[] = [];
  for (const probe of probes) {
    const collected = await probe.collect();
    log.debug('Probe collected', { probe: probe.name, samples: collected.length });
    samples.push(...collected);
  }
  return samples;
}
