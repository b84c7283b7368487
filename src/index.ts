/**
 * hostdelta — point-in-time sampler and differencer for host and KVM
 * kernel counters.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  Timestamp,
  Reading,
  Delta,
  Clock,
  Probe,
  MissingSubjectPolicy,
} from './core/types.js';
export { systemClock } from './core/types.js';

// ── Identity ──
export { Source } from './core/source.js';
export { Measurable, Counter, isCounter } from './core/measurable.js';
export type { MeasurableKind } from './core/measurable.js';
export { Subject, compareSubjects } from './core/subject.js';

// ── Observations ──
export { Sample } from './core/sample.js';
export { SubjectMap, indexBySubject } from './core/subject-map.js';
export { probeAll } from './core/snapshot.js';
export type { Snapshot } from './core/snapshot.js';

// ── Diff & Report ──
export { diffSnapshots, ratePerSecond } from './core/diff.js';
export type { DiffOptions } from './core/diff.js';
export { formatReport, formatCount } from './core/report.js';

// ── Catalog ──
export * as catalog from './core/catalog.js';
export type { KvmCounterEntry } from './core/catalog.js';

// ── Probes ──
export {
  defaultProbes,
  StatProbe,
  VmstatProbe,
  DiskstatsProbe,
  NetdevProbe,
  KvmProbe,
  parseStat,
  parseVmstat,
  parseDiskstats,
  parseNetdev,
} from './probes/index.js';
export type { ProbeRoots } from './probes/index.js';

// ── Errors ──
export {
  HostDeltaError,
  ProbeReadError,
  MissingSubjectError,
  ConfigError,
  CatalogError,
} from './core/errors.js';
export type { HostDeltaErrorCode } from './core/errors.js';

// ── Logging ──
export {
  createLogger,
  ConsoleLogger,
  LogLevel,
  logLevelFromName,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
} from './core/logger.js';
export type { Logger, LogEntry, LogLevelName } from './core/logger.js';

// ── Sampler ──
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { SamplerConfig } from './config.js';
export { Sampler, CYCLE_TITLE, FINAL_TITLE } from './sampler.js';
export type { SamplerOptions, CycleReport, Sleep } from './sampler.js';
