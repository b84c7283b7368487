/**
 * Sample — one timestamped observation of a Subject.
 */

import type { Subject } from './subject.js';
import type { Reading, Timestamp } from './types.js';

export class Sample {
  constructor(
    readonly subject: Subject,
    readonly timestamp: Timestamp,
    readonly value: bigint,
  ) {
    Object.freeze(this);
  }

  splitBySubject(): [Subject, Reading] {
    return [this.subject, { timestamp: this.timestamp, value: this.value }];
  }
}
