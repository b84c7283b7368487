/**
 * /proc/diskstats — sectors read and written per whole disk.
 *
 * Line layout: major minor name reads merged sectors_read ms writes merged
 * sectors_written ... Partitions have a non-zero minor number and are skipped.
 */

import { join } from 'node:path';
import { diskReadSectors, diskWriteSectors } from '../core/catalog.js';
import { createLogger } from '../core/logger.js';
import { Sample } from '../core/sample.js';
import { Source } from '../core/source.js';
import { Subject } from '../core/subject.js';
import { systemClock } from '../core/types.js';
import type { Clock, Probe, Timestamp } from '../core/types.js';
import { parseCounter, readText, tokenizeLines } from './common.js';

const log = createLogger('probe.diskstats');

const DISKS_SOURCE = new Source(['disks']);

const MINOR = 1;
const NAME = 2;
const SECTORS_READ = 5;
const SECTORS_WRITTEN = 9;

export function parseDiskstats(text: string, timestamp: Timestamp): Sample[] {
  const samples: Sample[] = [];
  for (const row of tokenizeLines(text)) {
    if (row[MINOR] !== '0') continue;
    const read = parseCounter(row[SECTORS_READ]);
    const written = parseCounter(row[SECTORS_WRITTEN]);
    if (read === undefined || written === undefined) {
      log.debug('Skipping malformed line', { device: row[NAME], columns: row.length });
      continue;
    }
    const source = DISKS_SOURCE.child(row[NAME]);
    samples.push(
      new Sample(new Subject(source, diskReadSectors), timestamp, read),
      new Sample(new Subject(source, diskWriteSectors), timestamp, written),
    );
  }
  return samples;
}

export class DiskstatsProbe implements Probe {
  readonly name = 'diskstats';
  private readonly path: string;

  constructor(procRoot: string, private readonly clock: Clock = systemClock) {
    this.path = join(procRoot, 'diskstats');
  }

  async collect(): Promise<Sample[]> {
    const text = await readText(this.name, this.path);
    return parseDiskstats(text, this.clock());
  }
}
