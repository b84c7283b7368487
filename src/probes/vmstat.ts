/**
 * /proc/vmstat — page faults.
 */

import { join } from 'node:path';
import { pgfault } from '../core/catalog.js';
import { createLogger } from '../core/logger.js';
import { Sample } from '../core/sample.js';
import { Source } from '../core/source.js';
import { Subject } from '../core/subject.js';
import { systemClock } from '../core/types.js';
import type { Clock, Probe, Timestamp } from '../core/types.js';
import { parseCounter, readText, tokenizeLines } from './common.js';

const log = createLogger('probe.vmstat');

export function parseVmstat(text: string, timestamp: Timestamp): Sample[] {
  const samples: Sample[] = [];
  for (const row of tokenizeLines(text)) {
    if (row[0] !== 'pgfault') continue;
    const value = parseCounter(row[1]);
    if (value === undefined || row.length !== 2) {
      log.debug('Skipping malformed line', { name: row[0] });
      continue;
    }
    samples.push(new Sample(new Subject(Source.HOST, pgfault), timestamp, value));
  }
  return samples;
}

export class VmstatProbe implements Probe {
  readonly name = 'vmstat';
  private readonly path: string;

  constructor(procRoot: string, private readonly clock: Clock = systemClock) {
    this.path = join(procRoot, 'vmstat');
  }

  async collect(): Promise<Sample[]> {
    const text = await readText(this.name, this.path);
    return parseVmstat(text, this.clock());
  }
}
