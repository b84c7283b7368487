/**
 * Error taxonomy for the sampler.
 */

export type HostDeltaErrorCode = 'PROBE_READ' | 'MISSING_SUBJECT' | 'CONFIG' | 'CATALOG';

/** Base class; `code` is stable across releases, messages are not. */
export class HostDeltaError extends Error {
  constructor(
    readonly code: HostDeltaErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HostDeltaError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** A probe could not read its data source. Fatal for the current cycle. */
export class ProbeReadError extends HostDeltaError {
  constructor(
    readonly probe: string,
    readonly path: string,
    cause: unknown,
  ) {
    super('PROBE_READ', `Probe "${probe}" failed to read ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'ProbeReadError';
  }
}

/** A subject observed in the older snapshot is absent from the newer one. */
export class MissingSubjectError extends HostDeltaError {
  constructor(readonly subject: string) {
    super('MISSING_SUBJECT', `Subject ${subject} is missing from the newer snapshot`);
    this.name = 'MissingSubjectError';
  }
}

export class ConfigError extends HostDeltaError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

/** The KVM counter registry file is malformed. */
export class CatalogError extends HostDeltaError {
  constructor(message: string) {
    super('CATALOG', message);
    this.name = 'CatalogError';
  }
}
