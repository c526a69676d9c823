#!/usr/bin/env node
/**
 * GridSim MCP Server
 *
 * Exposes power system simulation sessions to MCP clients: load a case,
 * solve the power flow, run time-domain and eigenvalue analyses, and read
 * results back as JSON.
 *
 * The simulation engine runs out of process; one worker per loaded case.
 */

import http from 'node:http';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CASE_CONFIG,
  HTTP_CONFIG,
  LOG_CONFIG,
  SERVER_NAME,
  SERVER_VERSION,
  SESSION_CONFIG,
  SIMULATION_CONFIG,
  WORKER_CONFIG
} from './constants.js';
import { Errors, errorMessage } from './errors/index.js';
import type { ServerInfoSettings } from './resources/server-resources.js';
import { createHttpApp, createMcpServer, type ServerDependencies } from './server.js';
import { CaseLibrary } from './services/case-library.js';
import { SessionManager } from './services/session-manager.js';
import { SimulationService } from './services/simulation-service.js';
import { WorkerEngine } from './services/worker-engine.js';
import { logger, LogLevel, parseLogLevel } from './utils/logger.js';

/**
 * Start server with stdio transport (default)
 */
async function startStdioServer(deps: ServerDependencies): Promise<void> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.serverStarted('stdio', { version: SERVER_VERSION });
}

/**
 * Start server with HTTP transport
 */
async function startHttpServer(deps: ServerDependencies, port: number): Promise<http.Server> {
  const app = createHttpApp(deps);
  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    const onError = (error: unknown) => {
      server.removeListener('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.removeListener('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port);
  });

  const address = server.address();
  const boundPort = address && typeof address === 'object' ? address.port : port;
  logger.serverStarted('http', {
    port: boundPort,
    version: SERVER_VERSION,
    endpoints: {
      mcp: `POST http://localhost:${boundPort}/mcp`,
      health: `GET http://localhost:${boundPort}/health`,
      info: `GET http://localhost:${boundPort}/info`,
      metrics: `GET http://localhost:${boundPort}/metrics`
    }
  });

  return server;
}

/**
 * Print usage instructions
 */
function printUsage(): void {
  console.error(`
${SERVER_NAME} v${SERVER_VERSION}
MCP server for power system simulation sessions

USAGE:
  node dist/index.js [OPTIONS]

OPTIONS:
  --stdio          Run with stdio transport (default)
  --http           Run with HTTP transport
  --port=PORT      HTTP port (default: ${HTTP_CONFIG.DEFAULT_PORT})
  --debug          Enable debug logging
  --help           Show this help message

ENVIRONMENT:
  GRIDSIM_CASES_DIR           Case directory (default: ./cases)
  GRIDSIM_WORKER_COMMAND      Engine worker command (default: ${WORKER_CONFIG.COMMAND})
  GRIDSIM_MAX_SESSIONS        Live session limit (default: ${SESSION_CONFIG.MAX_SESSIONS})
  GRIDSIM_SESSION_TIMEOUT_MS  Idle session timeout (default: ${SESSION_CONFIG.TIMEOUT_MS})
  GRIDSIM_LOG_LEVEL           debug | info | warn | error

EXAMPLES:
  node dist/index.js                    # Start with stdio
  node dist/index.js --http --port=8080 # Start HTTP server on port 8080
`);
}

function parsePort(args: string[]): number {
  const portArg = args.find(arg => arg.startsWith('--port='));
  if (!portArg) return HTTP_CONFIG.DEFAULT_PORT;

  const port = Number.parseInt(portArg.slice('--port='.length), 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw Errors.invalidInput('--port', `expected an integer between 0 and 65535, got "${portArg.slice('--port='.length)}"`);
  }
  return port;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  logger.setLevel(args.includes('--debug')
    ? LogLevel.DEBUG
    : parseLogLevel(LOG_CONFIG.DEFAULT_LEVEL, LogLevel.INFO));

  const httpMode = args.includes('--http');
  const port = parsePort(args);

  logger.info(`${SERVER_NAME} v${SERVER_VERSION} starting`, {
    mode: httpMode ? 'http' : 'stdio',
    nodeVersion: process.version,
    platform: process.platform
  });

  const sessions = new SessionManager();
  const cases = new CaseLibrary();
  const service = new SimulationService({
    sessions,
    cases,
    engine: new WorkerEngine()
  });
  const settings: ServerInfoSettings = {
    maxSessions: SESSION_CONFIG.MAX_SESSIONS,
    sessionTimeoutMs: SESSION_CONFIG.TIMEOUT_MS,
    casesDir: CASE_CONFIG.CASES_DIR,
    maxResultPoints: SIMULATION_CONFIG.MAX_RESULT_POINTS,
    defaultTdsTf: SIMULATION_CONFIG.DEFAULT_TDS_TF
  };
  const deps: ServerDependencies = { service, settings };

  let httpServer: http.Server | undefined;
  let stopping = false;

  const shutdown = async (reason: string): Promise<void> => {
    logger.serverStopped(reason);
    httpServer?.close();
    await sessions.shutdown();
  };

  const stop = (reason: string, exitCode: number) => {
    if (stopping) return;
    stopping = true;
    shutdown(reason).then(
      () => process.exit(exitCode),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => stop('SIGINT', 0));
  process.on('SIGTERM', () => stop('SIGTERM', 0));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack
    });
    stop('uncaughtException', 1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  });

  if (httpMode) {
    httpServer = await startHttpServer(deps, port);
  } else {
    await startStdioServer(deps);
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  process.exit(1);
});
