import { describe, it, expect } from 'vitest';
import { Counter } from '../src/core/measurable.js';
import { Sample } from '../src/core/sample.js';
import { Source } from '../src/core/source.js';
import { Subject } from '../src/core/subject.js';
import { SubjectMap, indexBySubject } from '../src/core/subject-map.js';

const rx = new Counter('net_rx_bytes', 'Bytes received');
const eth0 = new Subject(new Source(['net', 'eth0']), rx);
const eth1 = new Subject(new Source(['net', 'eth1']), rx);
const lo = new Subject(new Source(['net', 'lo']), rx);

describe('Sample', () => {
  it('splits into subject and reading', () => {
    const sample = new Sample(eth0, 1500, 42n);
    const [subject, reading] = sample.splitBySubject();
    expect(subject).toBe(eth0);
    expect(reading).toEqual({ timestamp: 1500, value: 42n });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(new Sample(eth0, 0, 1n))).toBe(true);
  });
});

describe('SubjectMap', () => {
  it('finds entries by an equal but distinct Subject', () => {
    const map = new SubjectMap<number>();
    map.set(eth0, 1);
    const lookup = new Subject(new Source(['net', 'eth0']), rx);
    expect(map.has(lookup)).toBe(true);
    expect(map.get(lookup)).toBe(1);
    expect(map.get(eth1)).toBeUndefined();
  });

  it('overwrites in place and keeps insertion order', () => {
    const map = new SubjectMap<number>();
    map.set(eth0, 1).set(eth1, 2).set(eth0, 3);
    expect(map.size).toBe(2);
    expect([...map.values()]).toEqual([3, 2]);
    expect([...map.keys()]).toEqual([eth0, eth1]);
  });

  it('deletes entries', () => {
    const map = new SubjectMap<number>();
    map.set(eth0, 1);
    expect(map.delete(new Subject(new Source(['net', 'eth0']), rx))).toBe(true);
    expect(map.size).toBe(0);
  });
});

describe('indexBySubject', () => {
  it('yields one entry per distinct subject', () => {
    const index = indexBySubject([
      new Sample(eth0, 10, 100n),
      new Sample(eth1, 11, 200n),
      new Sample(lo, 12, 300n),
    ]);
    expect(index.size).toBe(3);
    expect(index.get(eth0)).toEqual({ timestamp: 10, value: 100n });
    expect(index.get(eth1)).toEqual({ timestamp: 11, value: 200n });
    expect(index.get(lo)).toEqual({ timestamp: 12, value: 300n });
  });

  it('keeps the last sample when a subject repeats', () => {
    const index = indexBySubject([
      new Sample(eth0, 10, 100n),
      new Sample(new Subject(new Source(['net', 'eth0']), rx), 20, 150n),
    ]);
    expect(index.size).toBe(1);
    expect(index.get(eth0)).toEqual({ timestamp: 20, value: 150n });
  });

  it('is empty for no samples', () => {
    expect(indexBySubject([]).size).toBe(0);
  });
});
