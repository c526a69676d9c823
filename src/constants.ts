/**
 * GridSim MCP Server Constants
 * Centralized configuration constants.
 */

import path from 'node:path';

// ===========================================
// Environment parsing
// ===========================================
const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseFloatValue = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

// ===========================================
// Server Info
// ===========================================
export const SERVER_NAME = 'gridsim-mcp-server';
export const SERVER_VERSION = '0.1.0';
export const SERVER_DESCRIPTION = 'MCP server exposing power system simulation sessions';

// ===========================================
// Session Management
// ===========================================
export const SESSION_CONFIG = {
  // Max concurrently live sessions
  MAX_SESSIONS: parseNumber(process.env.GRIDSIM_MAX_SESSIONS, 100),

  // Idle time before a session expires (1 hour)
  TIMEOUT_MS: parseNumber(process.env.GRIDSIM_SESSION_TIMEOUT_MS, 3600000),

  // Background expiry sweep (0 disables)
  SWEEP_INTERVAL_MS: parseNumber(process.env.GRIDSIM_SESSION_SWEEP_INTERVAL_MS, 60000),
};

// ===========================================
// Simulation Defaults
// ===========================================
export const SIMULATION_CONFIG = {
  // Time-domain end time when the caller gives none (seconds)
  DEFAULT_TDS_TF: parseFloatValue(process.env.GRIDSIM_DEFAULT_TDS_TF, 20.0),

  // Max data points returned by a single result query
  MAX_RESULT_POINTS: parseNumber(process.env.GRIDSIM_MAX_RESULT_POINTS, 10000),
};

// Component types whose p/q arrays are reported as generator output, in order.
export const GENERATOR_MODELS = ['Slack', 'PV', 'PQ'] as const;

// ===========================================
// Case Library
// ===========================================
export const CASE_CONFIG = {
  // Directory scanned for built-in cases
  CASES_DIR: process.env.GRIDSIM_CASES_DIR?.trim() || path.join(process.cwd(), 'cases'),

  // File extensions listed as cases
  EXTENSIONS: ['.xlsx', '.raw'],
};

// ===========================================
// Engine Worker
// ===========================================
export const WORKER_CONFIG = {
  // Command line that starts one engine worker process
  COMMAND: process.env.GRIDSIM_WORKER_COMMAND?.trim() || 'python3 -m gridsim_worker',

  // Upper bound on a single worker request (10 minutes)
  REQUEST_TIMEOUT_MS: parseNumber(process.env.GRIDSIM_WORKER_TIMEOUT_MS, 600000),

  // Time allowed for a graceful worker exit before it is killed
  SHUTDOWN_GRACE_MS: 2000,
};

// ===========================================
// HTTP Server Configuration
// ===========================================
export const HTTP_CONFIG = {
  // Request body size limit
  MAX_BODY_SIZE: process.env.GRIDSIM_HTTP_MAX_BODY_SIZE || '1mb',

  // Default port
  DEFAULT_PORT: parseNumber(process.env.PORT, 3000),

  // Max concurrent HTTP requests
  MAX_CONCURRENT_REQUESTS: parseNumber(process.env.GRIDSIM_HTTP_MAX_CONCURRENT_REQUESTS, 8),
};

// ===========================================
// Logging Configuration
// ===========================================
export const LOG_CONFIG = {
  // Default log level
  DEFAULT_LEVEL: process.env.GRIDSIM_LOG_LEVEL || 'info',
};
