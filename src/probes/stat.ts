/**
 * /proc/stat — interrupts, context switches and per-CPU tick counters.
 */

import { join } from 'node:path';
import { cpuIdle, cpuIowait, cpuNice, cpuSystem, ctxt, intr } from '../core/catalog.js';
import { createLogger } from '../core/logger.js';
import type { Counter } from '../core/measurable.js';
import { Sample } from '../core/sample.js';
import { Source } from '../core/source.js';
import { Subject } from '../core/subject.js';
import { systemClock } from '../core/types.js';
import type { Clock, Probe, Timestamp } from '../core/types.js';
import { parseCounter, readText, tokenizeLines } from './common.js';

const log = createLogger('probe.stat');

const CPU_SOURCE = new Source(['cpu']);

// Columns after the line name: user nice system idle iowait ...
const CPU_COLUMNS: ReadonlyArray<[number, Counter]> = [
  [2, cpuNice],
  [3, cpuSystem],
  [4, cpuIdle],
  [5, cpuIowait],
];

function readColumns(row: string[]): Array<[Counter, bigint]> | undefined {
  const readings: Array<[Counter, bigint]> = [];
  for (const [column, counter] of CPU_COLUMNS) {
    const value = parseCounter(row[column]);
    if (value === undefined) return undefined;
    readings.push([counter, value]);
  }
  return readings;
}

export function parseStat(text: string, timestamp: Timestamp): Sample[] {
  const samples: Sample[] = [];
  for (const row of tokenizeLines(text)) {
    const name = row[0];
    if (name === 'intr' || name === 'ctxt') {
      // intr is followed by per-IRQ counts; the first number is the total
      const value = parseCounter(row[1]);
      if (value === undefined) {
        log.debug('Skipping malformed line', { name });
        continue;
      }
      samples.push(new Sample(new Subject(Source.HOST, name === 'intr' ? intr : ctxt), timestamp, value));
    } else if (name.startsWith('cpu')) {
      const readings = readColumns(row);
      if (readings === undefined) {
        log.debug('Skipping malformed line', { name, columns: row.length });
        continue;
      }
      const source = CPU_SOURCE.child(name);
      for (const [counter, value] of readings) {
        samples.push(new Sample(new Subject(source, counter), timestamp, value));
      }
    }
  }
  return samples;
}

export class StatProbe implements Probe {
  readonly name = 'stat';
  private readonly path: string;

  constructor(procRoot: string, private readonly clock: Clock = systemClock) {
    this.path = join(procRoot, 'stat');
  }

  async collect(): Promise<Sample[]> {
    const text = await readText(this.name, this.path);
    return parseStat(text, this.clock());
  }
}
