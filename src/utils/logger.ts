/**
 * GridSim MCP Server - Structured logging
 *
 * JSON log lines on stderr; stdout belongs to the stdio transport.
 */

import { randomUUID } from 'node:crypto';
import { LOG_CONFIG, SERVER_NAME } from '../constants.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

const LOG_LEVEL_VALUE: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? fallback;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  traceId?: string;
  durationMs?: number;
  service: string;
}

interface ToolTrace {
  traceId: string;
  toolName: string;
  startTime: number;
}

export type SessionEndReason = 'closed' | 'evicted' | 'expired' | 'shutdown';

type LogSink = (line: string) => void;

const MAX_STRING_LENGTH = 200;
const MAX_ARRAY_LENGTH = 10;

class Logger {
  private minLevel: LogLevel = parseLogLevel(LOG_CONFIG.DEFAULT_LEVEL);
  private service: string = SERVER_NAME;
  private activeTraces: Map<string, ToolTrace> = new Map();
  private sink: LogSink = line => console.error(line);

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Redirect output, e.g. to capture lines in tests.
   */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUE[level] >= LOG_LEVEL_VALUE[this.minLevel];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    traceId?: string,
    durationMs?: number
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.service,
      ...(context && { context }),
      ...(traceId && { traceId }),
      ...(durationMs !== undefined && { durationMs })
    };

    this.sink(JSON.stringify(entry));
  }

  debug(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.DEBUG, message, context, traceId);
  }

  info(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.INFO, message, context, traceId);
  }

  warn(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.WARN, message, context, traceId);
  }

  error(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.ERROR, message, context, traceId);
  }

  /**
   * Start tool call tracing. Returns the trace id to pass to endToolCall/toolError.
   */
  startToolCall(toolName: string, params?: Record<string, unknown>): string {
    const traceId = randomUUID();
    this.activeTraces.set(traceId, { traceId, toolName, startTime: Date.now() });

    this.debug(`Tool call started: ${toolName}`, {
      tool: toolName,
      params: this.sanitizeParams(params)
    }, traceId);

    return traceId;
  }

  endToolCall(traceId: string, success: boolean, result?: Record<string, unknown>): void {
    const trace = this.activeTraces.get(traceId);
    if (!trace) {
      this.warn('Attempted to end unknown trace', { traceId });
      return;
    }

    const durationMs = Date.now() - trace.startTime;
    this.activeTraces.delete(traceId);

    this.log(
      success ? LogLevel.INFO : LogLevel.WARN,
      `Tool call ${success ? 'completed' : 'failed'}: ${trace.toolName}`,
      {
        tool: trace.toolName,
        success,
        ...(result && { result: this.sanitizeParams(result) })
      },
      traceId,
      durationMs
    );
  }

  /**
   * Record an unexpected tool error and close its trace.
   */
  toolError(traceId: string, error: Error | string): void {
    const trace = this.activeTraces.get(traceId);
    const durationMs = trace ? Date.now() - trace.startTime : undefined;
    this.activeTraces.delete(traceId);

    this.log(LogLevel.ERROR, `Tool call error: ${trace?.toolName ?? 'unknown'}`, {
      tool: trace?.toolName,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined
    }, traceId, durationMs);
  }

  // Case paths and ids are short; long variable lists and arrays are summarized.
  private sanitizeParams(params?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!params) return undefined;

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(params)) {
      if (typeof value === 'string') {
        sanitized[key] = value.length > MAX_STRING_LENGTH
          ? `${value.slice(0, MAX_STRING_LENGTH)}... [truncated, ${value.length} chars]`
          : value;
      } else if (Array.isArray(value)) {
        sanitized[key] = value.length > MAX_ARRAY_LENGTH
          ? `[Array of ${value.length} items]`
          : value;
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = '[Object]';
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  serverStarted(mode: string, details?: Record<string, unknown>): void {
    this.info('Server started', { mode, ...details });
  }

  serverStopped(reason?: string): void {
    this.info('Server stopped', { reason });
  }

  sessionCreated(sessionId: string, sourcePath: string): void {
    this.debug('Session created', { sessionId, sourcePath });
  }

  sessionDestroyed(sessionId: string, reason: SessionEndReason): void {
    this.debug('Session destroyed', { sessionId, reason });
  }

  /**
   * Engine runs slower than five seconds are worth a warning.
   */
  performance(operation: string, durationMs: number, details?: Record<string, unknown>): void {
    const level = durationMs > 5000 ? LogLevel.WARN : LogLevel.DEBUG;
    this.log(level, `Performance: ${operation}`, details, undefined, durationMs);
  }
}

export const logger = new Logger();
