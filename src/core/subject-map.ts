/**
 * SubjectMap — a Map keyed structurally by Subject.
 *
 * A plain Map<Subject, V> compares keys by reference, so two Subjects built
 * from equal parts would not collide. Entries are stored under Subject.key()
 * and iterate in insertion order.
 */

import type { Sample } from './sample.js';
import type { Subject } from './subject.js';
import type { Reading } from './types.js';

export class SubjectMap<V> implements Iterable<[Subject, V]> {
  private entriesByKey = new Map<string, [Subject, V]>();

  get size(): number {
    return this.entriesByKey.size;
  }

  get(subject: Subject): V | undefined {
    return this.entriesByKey.get(subject.key())?.[1];
  }

  has(subject: Subject): boolean {
    return this.entriesByKey.has(subject.key());
  }

  /** Replaces any existing value; the first inserted position is kept. */
  set(subject: Subject, value: V): this {
    const key = subject.key();
    const existing = this.entriesByKey.get(key);
    if (existing) {
      existing[1] = value;
    } else {
      this.entriesByKey.set(key, [subject, value]);
    }
    return this;
  }

  delete(subject: Subject): boolean {
    return this.entriesByKey.delete(subject.key());
  }

  *keys(): IterableIterator<Subject> {
    for (const [subject] of this.entriesByKey.values()) yield subject;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entriesByKey.values()) yield value;
  }

  *entries(): IterableIterator<[Subject, V]> {
    for (const [subject, value] of this.entriesByKey.values()) yield [subject, value];
  }

  [Symbol.iterator](): IterableIterator<[Subject, V]> {
    return this.entries();
  }
}

/**
 * Index samples by Subject. When a Subject occurs more than once the later
 * sample wins.
 */
export function indexBySubject(samples: Iterable<Sample>): SubjectMap<Reading> {
  const index = new SubjectMap<Reading>();
  for (const sample of samples) {
    const [subject, reading] = sample.splitBySubject();
    index.set(subject, reading);
  }
  return index;
}
