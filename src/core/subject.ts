/**
 * Subject — a Measurable at a Source. The key for correlating Samples
 * across snapshots.
 */

import { canonicalize, digest64 } from './keys.js';
import type { Measurable } from './measurable.js';
import type { Source } from './source.js';

export class Subject {
  private readonly canonicalKey: string;

  constructor(
    readonly source: Source,
    readonly measurable: Measurable,
  ) {
    this.canonicalKey = canonicalize([source.segments, measurable.id]);
    Object.freeze(this);
  }

  equals(other: Subject): boolean {
    return this.measurable === other.measurable && this.source.equals(other.source);
  }

  key(): string {
    return this.canonicalKey;
  }

  hash(): string {
    return digest64(this.canonicalKey);
  }

  toString(): string {
    return `(${this.source.toString()}, ${this.measurable.toString()})`;
  }
}

/** Orders Subjects by their string form. */
export function compareSubjects(a: Subject, b: Subject): number {
  const left = a.toString();
  const right = b.toString();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
