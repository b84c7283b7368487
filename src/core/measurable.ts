/**
 * Measurable — a named class of quantity ("cpu_idle", "net_rx_bytes").
 *
 * Identity is the instance: construct each one once and share it. Tags and
 * description are metadata and never take part in equality.
 */

let nextId = 1;

export type MeasurableKind = 'measurable' | 'counter';

export class Measurable {
  readonly kind: MeasurableKind = 'measurable';
  /** Process-unique, assigned at construction. */
  readonly id: number;
  private readonly tagSet: Set<string>;

  constructor(
    readonly name: string,
    readonly description: string = name,
    tags: Iterable<string> = [],
  ) {
    this.id = nextId++;
    this.tagSet = new Set(tags);
  }

  get tags(): ReadonlySet<string> {
    return this.tagSet;
  }

  /** Idempotent. */
  addTag(tag: string): this {
    this.tagSet.add(tag);
    return this;
  }

  hasTag(tag: string): boolean {
    return this.tagSet.has(tag);
  }

  toString(): string {
    return this.name;
  }
}

/**
 * A Measurable whose value never decreases over the lifetime of the source it
 * describes. Deltas between two readings are only meaningful for Counters;
 * nothing checks this at runtime.
 */
export class Counter extends Measurable {
  override readonly kind: MeasurableKind = 'counter';
}

export function isCounter(measurable: Measurable): measurable is Counter {
  return measurable.kind === 'counter';
}
