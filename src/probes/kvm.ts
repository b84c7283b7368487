/**
 * KVM debugfs counters — one integer per file under <debugfs>/kvm.
 */

import { join } from 'node:path';
import { kvmCounters } from '../core/catalog.js';
import { ProbeReadError } from '../core/errors.js';
import type { Counter } from '../core/measurable.js';
import { Sample } from '../core/sample.js';
import { Source } from '../core/source.js';
import { Subject } from '../core/subject.js';
import { systemClock } from '../core/types.js';
import type { Clock, Probe } from '../core/types.js';
import { parseCounter, readText } from './common.js';

const KVM_SOURCE = new Source(['kvm']);

export class KvmProbe implements Probe {
  readonly name = 'kvm';
  private readonly dir: string;

  constructor(
    debugfsRoot: string,
    private readonly clock: Clock = systemClock,
    private readonly counters: readonly Counter[] = kvmCounters,
  ) {
    this.dir = join(debugfsRoot, 'kvm');
  }

  async collect(): Promise<Sample[]> {
    const samples: Sample[] = [];
    for (const counter of this.counters) {
      const path = join(this.dir, counter.name);
      const text = await readText(this.name, path);
      const value = parseCounter(text.trim());
      if (value === undefined) {
        throw new ProbeReadError(this.name, path, new Error(`not an integer: ${JSON.stringify(text.trim())}`));
      }
      samples.push(new Sample(new Subject(KVM_SOURCE, counter), this.clock(), value));
    }
    return samples;
  }
}
