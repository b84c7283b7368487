/**
 * Source — where a value was measured, as an ordered path of segments
 * (e.g. ["cpu", "cpu0"], ["disks", "sda"]). The empty path is host-wide.
 */

import { canonicalize, digest64 } from './keys.js';

export class Source {
  /** Shared host-wide location. */
  static readonly HOST = new Source();

  readonly segments: readonly string[];
  private readonly canonicalKey: string;

  constructor(segments: readonly string[] = []) {
    this.segments = Object.freeze([...segments]);
    this.canonicalKey = canonicalize(this.segments);
    Object.freeze(this);
  }

  /** A new Source nested under this one. */
  child(...segments: string[]): Source {
    return new Source([...this.segments, ...segments]);
  }

  /** True iff the path has at least one segment. */
  hasSegments(): boolean {
    return this.segments.length > 0;
  }

  equals(other: Source): boolean {
    if (this === other) return true;
    if (this.segments.length !== other.segments.length) return false;
    return this.segments.every((segment, i) => segment === other.segments[i]);
  }

  /** Canonical JSON of the segments; equal Sources have equal keys. */
  key(): string {
    return this.canonicalKey;
  }

  hash(): string {
    return digest64(this.canonicalKey);
  }

  toString(): string {
    return this.segments.join('/');
  }
}
