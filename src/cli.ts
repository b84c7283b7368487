#!/usr/bin/env node
// hostdelta — print counter deltas every interval until interrupted.

import { loadConfig } from './config.js';
import { createLogger, logLevelFromName, setGlobalLogLevel } from './core/logger.js';
import { defaultProbes } from './probes/index.js';
import { Sampler } from './sampler.js';
import type { CycleReport } from './sampler.js';

const log = createLogger('cli');

function header(): void {
  console.log('═'.repeat(65));
  console.log('  hostdelta — host and KVM counter deltas (Ctrl-C to stop)');
  console.log('═'.repeat(65));
}

function printReport(report: CycleReport): void {
  console.log(`\n── ${report.title} ${'─'.repeat(Math.max(0, 60 - report.title.length))}`);
  for (const line of report.lines) console.log(`  ${line}`);
}

async function main(): Promise<number> {
  const config = loadConfig();
  if (!config.ok) {
    log.error(config.error.message);
    return 1;
  }
  setGlobalLogLevel(logLevelFromName(config.value.logLevel));

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  header();
  const sampler = new Sampler({
    probes: defaultProbes(config.value),
    intervalMs: config.value.intervalMs,
    missing: config.value.missingPolicy,
    onReport: printReport,
  });
  await sampler.run(controller.signal);
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error('Sampler failed', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
  },
);
