import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  LogLevel,
  DEFAULT_LOG_FILE_NAME,
  createLogger,
  getLogger,
  resetLogger,
  parseLogLevel,
  getLogLevelFromEnv,
} from '../../../src/utils/logger.js';

describe('Logger Module', () => {
  const testDir = path.join(os.tmpdir(), 'interface-map-logger-test-' + Date.now());
  const testLogDir = path.join(testDir, 'logs');

  beforeEach(() => {
    resetLogger();
    fs.rmSync(testDir, { recursive: true, force: true });
    fs.mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    resetLogger();
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
      expect(parseLogLevel(' Warning ')).toBe(LogLevel.WARN);
      expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    });

    it('should fall back to INFO for unknown names', () => {
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });
  });

  describe('getLogLevelFromEnv', () => {
    it('should enable debug from either debug variable', () => {
      expect(getLogLevelFromEnv({ DEBUG: '1' })).toBe(LogLevel.DEBUG);
      expect(getLogLevelFromEnv({ INTERFACE_MAP_DEBUG: 'true' })).toBe(LogLevel.DEBUG);
    });

    it('should read an explicit level', () => {
      expect(getLogLevelFromEnv({ INTERFACE_MAP_LOG_LEVEL: 'error' })).toBe(LogLevel.ERROR);
      expect(getLogLevelFromEnv({ LOG_LEVEL: 'warn' })).toBe(LogLevel.WARN);
    });

    it('should default to INFO', () => {
      expect(getLogLevelFromEnv({})).toBe(LogLevel.INFO);
      expect(getLogLevelFromEnv({ DEBUG: 'express:*' })).toBe(LogLevel.INFO);
    });
  });

  describe('getLogger', () => {
    it('should return the same instance until reset', () => {
      const first = getLogger();
      expect(getLogger()).toBe(first);
      resetLogger();
      expect(getLogger()).not.toBe(first);
    });

    it('should write to stderr and honour the silent switch', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = getLogger();
      logger.setLevel(LogLevel.INFO);

      logger.warn('Scanner', 'Skipping file', { file: 'A.cs' });
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy.mock.calls[0][0]).toMatch(/\] \[WARN\] \[Scanner\] Skipping file \{"file":"A\.cs"\}$/);

      logger.setSilentConsole(true);
      logger.error('Scanner', 'Hidden');
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should drop entries above the current level', () => {
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const logger = getLogger();
      logger.setLevel(LogLevel.INFO);
      logger.debug('Scanner', 'Too chatty');
      expect(debugSpy).not.toHaveBeenCalled();
      expect(logger.getLevel()).toBe(LogLevel.INFO);
    });
  });

  describe('createLogger', () => {
    it('should append formatted entries to the log file', async () => {
      const logger = createLogger(testLogDir, { level: LogLevel.DEBUG });
      logger.info('Mapper', 'Model built', { units: 2 });
      logger.debug('Mapper', 'Details');
      await logger.flush();

      const lines = fs.readFileSync(path.join(testLogDir, DEFAULT_LOG_FILE_NAME), 'utf-8').trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\[.+\] \[INFO\] \[Mapper\] Model built \{"units":2\}$/);
      expect(lines[1]).toMatch(/^\[.+\] \[DEBUG\] \[Mapper\] Details$/);
    });

    it('should become the shared logger', () => {
      const logger = createLogger(testLogDir);
      expect(getLogger()).toBe(logger);
    });

    it('should rotate the file once it reaches the size limit', async () => {
      const logger = createLogger(testLogDir, { level: LogLevel.INFO, maxFileSize: 10, maxFiles: 3 });
      logger.info('Rotate', 'first entry');
      logger.info('Rotate', 'second entry');
      logger.info('Rotate', 'third entry');
      await logger.flush();

      const stem = path.basename(DEFAULT_LOG_FILE_NAME, '.log');
      const active = fs.readFileSync(path.join(testLogDir, DEFAULT_LOG_FILE_NAME), 'utf-8');
      const previous = fs.readFileSync(path.join(testLogDir, `${stem}.1.log`), 'utf-8');
      const oldest = fs.readFileSync(path.join(testLogDir, `${stem}.2.log`), 'utf-8');
      expect(active).toContain('third entry');
      expect(previous).toContain('second entry');
      expect(oldest).toContain('first entry');
    });
  });
});
