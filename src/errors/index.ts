/**
 * GridSim MCP Server - Structured error handling
 *
 * Provides consistent error types and codes for diagnostics.
 */

import type { CallToolResult, TextContent } from '@modelcontextprotocol/sdk/types.js';

/**
 * Error code enumeration
 */
export enum ErrorCode {
  // Lookup errors (1xxx, 2xxx)
  CASE_NOT_FOUND = 1001,
  SESSION_NOT_FOUND = 2001,

  // Precondition errors (3xxx)
  POWER_FLOW_NOT_CONVERGED = 3001,
  TDS_NOT_INITIALIZED = 3002,
  EIGEN_NOT_RUN = 3003,

  // Engine errors (4xxx)
  ENGINE_LOAD_FAILED = 4001,
  ENGINE_CALL_FAILED = 4002,
  WORKER_PROTOCOL_ERROR = 4003,
  WORKER_TIMEOUT = 4004,

  // Validation errors (6xxx)
  INVALID_INPUT = 6001,

  // System errors (9xxx)
  INTERNAL_ERROR = 9001,
}

/**
 * Error kinds surfaced to callers.
 */
export type ErrorKind =
  | 'not_found'
  | 'precondition_failed'
  | 'engine_failure'
  | 'invalid_input'
  | 'internal';

export const ErrorKinds: Record<ErrorCode, ErrorKind> = {
  [ErrorCode.CASE_NOT_FOUND]: 'not_found',
  [ErrorCode.SESSION_NOT_FOUND]: 'not_found',

  [ErrorCode.POWER_FLOW_NOT_CONVERGED]: 'precondition_failed',
  [ErrorCode.TDS_NOT_INITIALIZED]: 'precondition_failed',
  [ErrorCode.EIGEN_NOT_RUN]: 'precondition_failed',

  [ErrorCode.ENGINE_LOAD_FAILED]: 'engine_failure',
  [ErrorCode.ENGINE_CALL_FAILED]: 'engine_failure',
  [ErrorCode.WORKER_PROTOCOL_ERROR]: 'engine_failure',
  [ErrorCode.WORKER_TIMEOUT]: 'engine_failure',

  [ErrorCode.INVALID_INPUT]: 'invalid_input',

  [ErrorCode.INTERNAL_ERROR]: 'internal',
};

/**
 * GridSim-specific error type
 */
export class SimError extends Error {
  public readonly timestamp: Date;
  public readonly traceId?: string;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    traceId?: string
  ) {
    super(message);
    this.name = 'SimError';
    this.timestamp = new Date();
    this.traceId = traceId;

    // Preserve the prototype chain for instanceof checks.
    Object.setPrototypeOf(this, SimError.prototype);
  }

  get kind(): ErrorKind {
    return ErrorKinds[this.code];
  }

  /**
   * Serialize error details to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: this.message,
      code: this.code,
      kind: this.kind,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      traceId: this.traceId
    };
  }

  /**
   * Convert to the MCP tool response shape.
   */
  toMCPResponse(): CallToolResult {
    const content: TextContent[] = [{
      type: 'text',
      text: JSON.stringify(this.toJSON(), null, 2)
    }];

    return {
      content,
      isError: true
    };
  }

  /**
   * Wrap an unknown error as a SimError.
   */
  static fromError(error: unknown, traceId?: string): SimError {
    if (error instanceof SimError) {
      return error;
    }

    if (error instanceof Error) {
      return new SimError(
        ErrorCode.INTERNAL_ERROR,
        error.message,
        { originalError: error.name, stack: error.stack },
        traceId
      );
    }

    return new SimError(
      ErrorCode.INTERNAL_ERROR,
      String(error),
      undefined,
      traceId
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Helper factory functions for common errors.
 */
export const Errors = {
  sessionNotFound: (sessionId: string) =>
    new SimError(ErrorCode.SESSION_NOT_FOUND, `Session not found: ${sessionId}`, { sessionId }),

  caseNotFound: (casePath: string, resolvedPath: string) =>
    new SimError(
      ErrorCode.CASE_NOT_FOUND,
      `Case file not found: ${casePath}. Path resolved to: ${resolvedPath}`,
      { casePath, resolvedPath }
    ),

  powerFlowNotConverged: (analysis: string) =>
    new SimError(
      ErrorCode.POWER_FLOW_NOT_CONVERGED,
      `Power flow must be run successfully before ${analysis}`,
      { analysis }
    ),

  tdsNotInitialized: () =>
    new SimError(ErrorCode.TDS_NOT_INITIALIZED, 'Time-domain simulation not initialized'),

  eigenNotRun: () =>
    new SimError(ErrorCode.EIGEN_NOT_RUN, 'Eigenvalue analysis has not been run yet'),

  engineLoadFailed: (casePath: string, reason: string) =>
    new SimError(ErrorCode.ENGINE_LOAD_FAILED, `Error loading case: ${reason}`, { casePath, reason }),

  engineCallFailed: (operation: string, reason: string) =>
    new SimError(ErrorCode.ENGINE_CALL_FAILED, `Error running ${operation}: ${reason}`, { operation, reason }),

  workerProtocol: (reason: string) =>
    new SimError(ErrorCode.WORKER_PROTOCOL_ERROR, `Engine worker protocol error: ${reason}`, { reason }),

  workerTimeout: (method: string, timeoutMs: number) =>
    new SimError(ErrorCode.WORKER_TIMEOUT, `Engine worker did not answer "${method}" within ${timeoutMs}ms`, { method, timeoutMs }),

  invalidInput: (field: string, reason: string) =>
    new SimError(ErrorCode.INVALID_INPUT, `Invalid input for ${field}: ${reason}`, { field, reason }),
};
