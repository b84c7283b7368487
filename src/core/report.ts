/**
 * Report formatting for a diff.
 */

import { compareSubjects } from './subject.js';
import type { SubjectMap } from './subject-map.js';
import type { Delta } from './types.js';

const LABEL_WIDTH = 48;
const VALUE_WIDTH = 16;

const countFormat = new Intl.NumberFormat('en-US');

/** Integer with thousands separators, e.g. 1234567n -> "1,234,567". */
export function formatCount(value: bigint): string {
  return countFormat.format(value);
}

/**
 * One line per Subject whose value increased, sorted by Subject.
 * Zero and negative changes (idle counters, resets, wraps) are left out.
 */
export function formatReport(diff: SubjectMap<Delta>): string[] {
  const rows = [...diff.entries()].sort(([a], [b]) => compareSubjects(a, b));
  const lines: string[] = [];
  for (const [subject, delta] of rows) {
    if (delta.change <= 0n) continue;
    let label = subject.measurable.description;
    if (subject.source.hasSegments()) {
      label += ` (${subject.source.toString()})`;
    }
    lines.push(`${label.padEnd(LABEL_WIDTH)} ${formatCount(delta.change).padStart(VALUE_WIDTH)}`);
  }
  return lines;
}
