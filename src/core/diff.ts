/**
 * Differencer — per-Subject deltas between two snapshots.
 */

import { MissingSubjectError } from './errors.js';
import { createLogger } from './logger.js';
import type { Snapshot } from './snapshot.js';
import { SubjectMap, indexBySubject } from './subject-map.js';
import type { Delta, MissingSubjectPolicy } from './types.js';

const log = createLogger('diff');

export interface DiffOptions {
  /** Defaults to `skip`. */
  missing?: MissingSubjectPolicy;
}

/**
 * Compute newer - older for every Subject present in both snapshots.
 *
 * Subjects only in `newer` (a disk or interface that appeared) are dropped.
 * Subjects only in `older` are skipped, or fail the diff with
 * MissingSubjectError under `missing: 'error'`. Values are subtracted as-is:
 * a counter that wrapped or reset yields a negative change.
 */
export function diffSnapshots(
  older: Snapshot,
  newer: Snapshot,
  options: DiffOptions = {},
): SubjectMap<Delta> {
  const policy = options.missing ?? 'skip';
  const before = indexBySubject(older);
  const after = indexBySubject(newer);
  const result = new SubjectMap<Delta>();
  let skipped = 0;

  for (const [subject, then] of before) {
    const now = after.get(subject);
    if (now === undefined) {
      if (policy === 'error') {
        throw new MissingSubjectError(subject.toString());
      }
      skipped++;
      continue;
    }
    result.set(subject, {
      elapsed: now.timestamp - then.timestamp,
      change: now.value - then.value,
    });
  }

  if (skipped > 0) {
    log.debug('Subjects missing from newer snapshot', { skipped });
  }
  return result;
}

/** Change per second of elapsed time; 0 when no time elapsed. */
export function ratePerSecond(delta: Delta): number {
  if (delta.elapsed <= 0) return 0;
  return (Number(delta.change) * 1000) / delta.elapsed;
}
