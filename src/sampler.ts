/**
 * Sampler — the sleep/poll loop around probeAll and diffSnapshots.
 *
 * The first snapshot is kept for the sampler's whole lifetime so that the
 * final report covers everything since startup. Cycles never overlap.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { diffSnapshots } from './core/diff.js';
import { createLogger } from './core/logger.js';
import { formatReport } from './core/report.js';
import { probeAll } from './core/snapshot.js';
import type { Snapshot } from './core/snapshot.js';
import type { SubjectMap } from './core/subject-map.js';
import type { Delta, MissingSubjectPolicy, Probe } from './core/types.js';

const log = createLogger('sampler');

export const CYCLE_TITLE = 'Since the last sample';
export const FINAL_TITLE = 'Since the beginning';

export interface CycleReport {
  title: string;
  /** Formatted lines, already filtered and sorted */
  lines: string[];
  diff: SubjectMap<Delta>;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SamplerOptions {
  probes: readonly Probe[];
  intervalMs: number;
  missing?: MissingSubjectPolicy;
  onReport: (report: CycleReport) => void;
  /** Replaced in tests; must reject once the signal aborts. */
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export class Sampler {
  private first: Snapshot | null = null;
  private previous: Snapshot | null = null;
  private cycles = 0;
  private readonly sleep: Sleep;

  constructor(private readonly options: SamplerOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /** Take and retain the first snapshot. */
  async start(): Promise<void> {
    const snapshot = await probeAll(this.options.probes);
    this.first = snapshot;
    this.previous = snapshot;
    log.info('Sampler started', { probes: this.options.probes.length, samples: snapshot.length });
  }

  /** Take a snapshot and report its diff against the previous one. */
  async tick(): Promise<CycleReport> {
    const previous = this.requireStarted(this.previous);
    const current = await probeAll(this.options.probes);
    const report = this.report(CYCLE_TITLE, previous, current);
    this.previous = current;
    this.cycles++;
    return report;
  }

  /** Take a final snapshot and report its diff against the first one. */
  async finish(): Promise<CycleReport> {
    const first = this.requireStarted(this.first);
    const current = await probeAll(this.options.probes);
    this.previous = current;
    return this.report(FINAL_TITLE, first, current);
  }

  /**
   * Start, then tick every `intervalMs` until `signal` aborts, then finish.
   * Abort is observed between cycles; an in-flight cycle completes first.
   */
  async run(signal: AbortSignal): Promise<void> {
    await this.start();
    while (!signal.aborted) {
      try {
        await this.sleep(this.options.intervalMs, signal);
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
      await this.tick();
    }
    log.info('Sampler stopping', { cycles: this.cycles });
    await this.finish();
  }

  private report(title: string, older: Snapshot, newer: Snapshot): CycleReport {
    const diff = diffSnapshots(older, newer, { missing: this.options.missing });
    const report: CycleReport = { title, lines: formatReport(diff), diff };
    this.options.onReport(report);
    return report;
  }

  private requireStarted(snapshot: Snapshot | null): Snapshot {
    if (snapshot === null) {
      throw new Error('Sampler has not been started');
    }
    return snapshot;
  }
}
