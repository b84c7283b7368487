/**
 * /proc/net/dev — bytes received and transmitted per interface.
 *
 * After two header lines each row is "<iface>: <8 rx fields> <8 tx fields>";
 * the counters may abut the colon ("eth0:1234 ...").
 */

import { join } from 'node:path';
import { netRxBytes, netTxBytes } from '../core/catalog.js';
import { createLogger } from '../core/logger.js';
import { Sample } from '../core/sample.js';
import { Source } from '../core/source.js';
import { Subject } from '../core/subject.js';
import { systemClock } from '../core/types.js';
import type { Clock, Probe, Timestamp } from '../core/types.js';
import { parseCounter, readText } from './common.js';

const log = createLogger('probe.netdev');

const NET_SOURCE = new Source(['net']);

const RX_BYTES = 0;
const TX_BYTES = 8;

export function parseNetdev(text: string, timestamp: Timestamp): Sample[] {
  const samples: Sample[] = [];
  for (const line of text.split('\n')) {
    const colon = line.indexOf(':');
    if (colon < 0) continue;
    const iface = line.slice(0, colon).trim();
    const fields = line.slice(colon + 1).trim().split(/\s+/);
    const rx = parseCounter(fields[RX_BYTES]);
    const tx = parseCounter(fields[TX_BYTES]);
    if (iface.length === 0 || rx === undefined || tx === undefined) {
      log.debug('Skipping malformed line', { iface, fields: fields.length });
      continue;
    }
    const source = NET_SOURCE.child(iface);
    samples.push(
      new Sample(new Subject(source, netRxBytes), timestamp, rx),
      new Sample(new Subject(source, netTxBytes), timestamp, tx),
    );
  }
  return samples;
}

export class NetdevProbe implements Probe {
  readonly name = 'netdev';
  private readonly path: string;

  constructor(procRoot: string, private readonly clock: Clock = systemClock) {
    this.path = join(procRoot, 'net', 'dev');
  }

  async collect(): Promise<Sample[]> {
    const text = await readText(this.name, this.path);
    return parseNetdev(text, this.clock());
  }
}
