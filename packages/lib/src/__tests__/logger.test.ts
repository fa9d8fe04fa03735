/**
 * Structured Logger Tests
 *
 * @module __tests__/logger
 */

import { describe, test, expect } from 'vitest';
import { StructuredLogger, type LogLevel, type LoggerConfig } from '../logger';

type TestEvent = 'thing_happened';

class TestLogger extends StructuredLogger<TestEvent> {
  constructor(config: Partial<LoggerConfig>) {
    super({ ...config, metadata: { agent: 'test', ...config.metadata } });
  }

  happened(level: LogLevel, data: Record<string, unknown>): void {
    this.log(level, 'thing_happened', data);
  }
}

function capture(level: LogLevel = 'debug') {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = [];
  const logger = new TestLogger({
    level,
    output: (message, emittedLevel) => {
      const parsed: unknown = JSON.parse(message);
      if (parsed !== null && typeof parsed === 'object') {
        lines.push({ level: emittedLevel, entry: Object.fromEntries(Object.entries(parsed)) });
      }
    },
  });
  return { logger, lines };
}

describe('StructuredLogger', () => {
  test('writes one JSON entry with metadata and data', () => {
    const { logger, lines } = capture();

    logger.happened('info', { lead_id: 'L1', count: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('info');
    expect(lines[0].entry).toMatchObject({
      event: 'thing_happened',
      level: 'info',
      agent: 'test',
      lead_id: 'L1',
      count: 2,
    });
    expect(typeof lines[0].entry.timestamp).toBe('string');
  });

  test('drops entries below the configured level', () => {
    const { logger, lines } = capture('warn');

    logger.happened('info', {});
    logger.happened('debug', {});
    logger.happened('error', {});

    expect(lines.map((line) => line.level)).toEqual(['error']);
  });

  test('omits undefined fields', () => {
    const { logger, lines } = capture();

    logger.happened('info', { lead_id: undefined, source: 'web' });

    expect('lead_id' in lines[0].entry).toBe(false);
    expect('session_id' in lines[0].entry).toBe(false);
    expect(lines[0].entry.source).toBe('web');
  });

  test('startTimer measures elapsed time', () => {
    const { logger } = capture();
    const elapsed = logger.startTimer();

    expect(elapsed()).toBeGreaterThanOrEqual(0);
  });
});

describe('StructuredLogger configuration', () => {
  test('stamps the session id once set', () => {
    const { logger, lines } = capture();

    logger.setSessionId('sess_1');
    logger.happened('info', {});

    expect(lines[0].entry.session_id).toBe('sess_1');
  });

  test('configure changes the level at run time', () => {
    const { logger, lines } = capture('error');

    logger.happened('info', {});
    logger.configure({ level: 'info' });
    logger.happened('info', {});

    expect(lines).toHaveLength(1);
  });
});
