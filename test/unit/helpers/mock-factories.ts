import { vi } from 'vitest';
import { ConfigService } from '@nestjs/config';
import pino from 'pino';
import { AppConfig } from '../../../src/config/configuration';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';

/**
 * Mock Factories for configuration, logging and timing
 * Used across adapter and use case unit tests
 */

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: 'test',
    logLevel: 'silent',
    discovery: {
      url: 'https://discovery.test/taxid2wgs.cgi',
      timeoutMs: 1000,
    },
    ftp: {
      host: '127.0.0.1',
      port: 2121,
      baseDir: '/sra/wgs_aux',
      timeoutMs: 2000,
      keepAliveIntervalMs: 1000,
      archiveSuffix: '.fsa_nt.gz',
    },
    retry: {
      scheduleSeconds: [0, 5, 15, 30, 60, 120],
    },
    ...overrides,
  };
}

export function createConfigService(overrides: Partial<AppConfig> = {}): ConfigService<AppConfig, true> {
  return new ConfigService<AppConfig, true>(createTestConfig(overrides));
}

/**
 * Structured log lines written by a PinoLoggerService, parsed back
 */
export interface CapturedLog {
  level: number;
  msg: string;
  context?: string;
  [key: string]: unknown;
}

/**
 * Create a real PinoLoggerService; with `capture` its lines are kept in memory
 */
export function createTestLogger(capture?: CapturedLog[]): PinoLoggerService {
  const destination = {
    write(line: string): void {
      capture?.push(JSON.parse(line));
    },
  };
  const instance = pino({ level: capture ? 'trace' : 'silent' }, destination);
  return new PinoLoggerService(createConfigService(), instance);
}

/**
 * Sleeper that resolves at once and remembers every requested delay
 */
export function createRecordingSleeper() {
  const delays: number[] = [];
  const sleeper = vi.fn(async (ms: number, signal?: AbortSignal) => {
    delays.push(ms);
    signal?.throwIfAborted();
  });
  return { sleeper, delays };
}
