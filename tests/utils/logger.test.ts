import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { logger, LogLevel, parseLogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
  let lines: string[];
  let previousLevel: LogLevel;

  beforeEach(() => {
    lines = [];
    previousLevel = logger.getLevel();
    logger.setSink(line => lines.push(line));
  });

  afterEach(() => {
    logger.setSink(line => console.error(line));
    logger.setLevel(previousLevel);
  });

  it('parses level names', () => {
    expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose', LogLevel.ERROR)).toBe(LogLevel.ERROR);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
  });

  it('drops entries below the configured level', () => {
    logger.setLevel(LogLevel.WARN);

    logger.info('Case loaded', { sessionId: 's1' });
    logger.warn('Engine call failed', { sessionId: 's1' });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'warn',
      message: 'Engine call failed',
      service: 'gridsim-mcp-server',
      context: { sessionId: 's1' }
    });
  });

  it('summarizes long tool parameters', () => {
    logger.setLevel(LogLevel.DEBUG);

    const traceId = logger.startToolCall('get_tds_results', {
      session_id: 'x'.repeat(250),
      variables: Array.from({ length: 11 }, (_, i) => `v${i}`),
      filter: { bus: 1 },
      max_points: 100
    });

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      message: 'Tool call started: get_tds_results',
      traceId,
      context: {
        tool: 'get_tds_results',
        params: {
          session_id: `${'x'.repeat(200)}... [truncated, 250 chars]`,
          variables: '[Array of 11 items]',
          filter: '[Object]',
          max_points: 100
        }
      }
    });
  });
});
