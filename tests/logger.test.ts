import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger,
  ConsoleLogger,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
  logLevelFromName,
  LogLevel,
} from '../src/core/logger.js';
import type { LogEntry } from '../src/core/logger.js';

describe('Structured Logging', () => {
  let captured: LogEntry[];

  beforeEach(() => {
    captured = [];
    setLogOutput((entry) => captured.push(entry));
    setGlobalLogLevel(LogLevel.DEBUG);
  });

  afterEach(() => {
    resetLogOutput();
    setGlobalLogLevel(LogLevel.INFO);
    vi.restoreAllMocks();
  });

  it('tags entries with the module name', () => {
    const log = createLogger('probe.stat');
    log.info('hello');
    expect(captured).toHaveLength(1);
    expect(captured[0].module).toBe('probe.stat');
    expect(captured[0].message).toBe('hello');
    expect(captured[0].level).toBe('INFO');
  });

  it('logs all levels', () => {
    const log = createLogger('m');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    expect(captured.map(e => e.level)).toEqual(['DEBUG', 'INFO', 'WARN', 'ERROR']);
  });

  it('omits empty context', () => {
    const log = createLogger('m');
    log.info('empty', {});
    expect(captured[0].context).toBeUndefined();
  });

  it('respects global log level', () => {
    setGlobalLogLevel(LogLevel.WARN);
    const log = createLogger('m');
    log.debug('d');
    log.info('i');
    log.warn('w');
    expect(captured.map(e => e.level)).toEqual(['WARN']);
    expect(getGlobalLogLevel()).toBe(LogLevel.WARN);
  });

  it('per-logger level overrides global', () => {
    const log = new ConsoleLogger('m', LogLevel.ERROR);
    log.warn('w');
    log.error('e');
    expect(captured.map(e => e.level)).toEqual(['ERROR']);
  });

  it('maps configuration names to levels', () => {
    expect(logLevelFromName('debug')).toBe(LogLevel.DEBUG);
    expect(logLevelFromName('warn')).toBe(LogLevel.WARN);
    expect(logLevelFromName('silent')).toBe(LogLevel.SILENT);
  });

  it('writes JSON lines with bigint context to stderr by default', () => {
    resetLogOutput();
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger('diff').info('delta', { change: 12345678901234567890n });
    expect(write).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(write.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'INFO', module: 'diff', message: 'delta', context: { change: '12345678901234567890' } });
  });

  it('keeps every level off stdout by default', () => {
    resetLogOutput();
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const log = createLogger('cli');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(4);
  });
});
