/**
 * Sampler configuration, read from HOSTDELTA_* environment variables and
 * validated against a JSON schema. Unset variables take the defaults below.
 */

import { Ajv } from 'ajv';
import type { JSONSchemaType } from 'ajv';
import { ConfigError } from './core/errors.js';
import type { LogLevelName } from './core/logger.js';
import type { MissingSubjectPolicy, Result } from './core/types.js';

export interface SamplerConfig {
  /** Mount point of procfs */
  procRoot: string;
  /** Mount point of debugfs; KVM counters live in <debugfsRoot>/kvm */
  debugfsRoot: string;
  /** Delay between sampling cycles */
  intervalMs: number;
  enableKvm: boolean;
  missingPolicy: MissingSubjectPolicy;
  logLevel: LogLevelName;
}

export const DEFAULT_CONFIG: Readonly<SamplerConfig> = Object.freeze({
  procRoot: '/proc',
  debugfsRoot: '/sys/kernel/debug',
  intervalMs: 1000,
  enableKvm: false,
  missingPolicy: 'skip',
  logLevel: 'info',
});

const ENV_KEYS: Record<keyof SamplerConfig, string> = {
  procRoot: 'HOSTDELTA_PROC_ROOT',
  debugfsRoot: 'HOSTDELTA_DEBUGFS_ROOT',
  intervalMs: 'HOSTDELTA_INTERVAL_MS',
  enableKvm: 'HOSTDELTA_KVM',
  missingPolicy: 'HOSTDELTA_MISSING',
  logLevel: 'HOSTDELTA_LOG_LEVEL',
};

const configSchema: JSONSchemaType<SamplerConfig> = {
  type: 'object',
  properties: {
    procRoot: { type: 'string', minLength: 1 },
    debugfsRoot: { type: 'string', minLength: 1 },
    intervalMs: { type: 'integer', minimum: 10, maximum: 3_600_000 },
    enableKvm: { type: 'boolean' },
    missingPolicy: { type: 'string', enum: ['skip', 'error'] },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'] },
  },
  required: ['procRoot', 'debugfsRoot', 'intervalMs', 'enableKvm', 'missingPolicy', 'logLevel'],
  additionalProperties: false,
};

// coerceTypes turns "2000" into 2000 and "true" into true
const ajv = new Ajv({ allErrors: true, coerceTypes: true });
const validateConfig = ajv.compile(configSchema);

/** Merge environment overrides over the defaults and validate the result. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<SamplerConfig, ConfigError> {
  const raw: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      raw[field] = value.trim();
    }
  }
  if (!validateConfig(raw)) {
    return {
      ok: false,
      error: new ConfigError(`Invalid configuration: ${ajv.errorsText(validateConfig.errors, { dataVar: 'config' })}`),
    };
  }
  return { ok: true, value: raw };
}
