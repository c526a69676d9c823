/**
 * Server assembly: the MCP server and the HTTP app around it.
 * Both take their collaborators explicitly so one SessionManager can be
 * shared by every transport and replaced in tests.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { HTTP_CONFIG, SERVER_DESCRIPTION, SERVER_NAME, SERVER_VERSION } from './constants.js';
import { errorMessage } from './errors/index.js';
import { registerServerResources, SERVER_INFO_URI, type ServerInfoSettings } from './resources/server-resources.js';
import type { SimulationService } from './services/simulation-service.js';
import { registerSimulationTools } from './tools/simulation-tools.js';
import { logger } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

export const TOOL_NAMES = [
  'list_available_cases',
  'load_case',
  'get_system_info',
  'list_sessions',
  'close_session',
  'run_power_flow',
  'run_time_domain',
  'run_eigenvalue',
  'get_pflow_results',
  'get_tds_results',
  'list_tds_variables'
] as const;

export interface ServerDependencies {
  service: SimulationService;
  settings: ServerInfoSettings;
}

export interface HttpAppOptions {
  maxConcurrentRequests?: number;
  maxBodySize?: string;
}

/**
 * Create and configure the MCP server
 */
export function createMcpServer(deps: ServerDependencies): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  registerSimulationTools(server, deps.service);
  registerServerResources(server, deps.settings);

  return server;
}

interface ConcurrencyLimiter {
  tryAcquire: (res: Response) => boolean;
  getActive: () => number;
}

function createConcurrencyLimiter(maxConcurrent: number): ConcurrencyLimiter {
  let active = 0;

  return {
    tryAcquire(res: Response): boolean {
      if (active >= maxConcurrent) {
        return false;
      }

      active += 1;
      let released = false;

      const release = () => {
        if (released) return;
        released = true;
        active = Math.max(0, active - 1);
      };

      res.on('finish', release);
      res.on('close', release);

      return true;
    },
    getActive(): number {
      return active;
    }
  };
}

function isBodyTooLarge(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

/**
 * Express app serving stateless streamable HTTP on POST /mcp plus
 * health, info and metrics endpoints.
 */
export function createHttpApp(deps: ServerDependencies, options: HttpAppOptions = {}): Express {
  const maxConcurrent = options.maxConcurrentRequests ?? HTTP_CONFIG.MAX_CONCURRENT_REQUESTS;
  const maxBodySize = options.maxBodySize ?? HTTP_CONFIG.MAX_BODY_SIZE;
  const app = express();
  const limiter = createConcurrencyLimiter(maxConcurrent);

  app.use(express.json({ limit: maxBodySize }));

  // A new MCP server per request (stateless); simulation sessions live in the shared service.
  app.post('/mcp', async (req: Request, res: Response) => {
    if (!limiter.tryAcquire(res)) {
      logger.warn('HTTP request rejected due to concurrency limit', {
        active: limiter.getActive(),
        maxConcurrent
      });
      res.status(429).json({
        error: 'Too many concurrent requests',
        max_concurrent: maxConcurrent
      });
      return;
    }

    const server = createMcpServer(deps);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined
    });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warn('Failed to close per-request MCP server', { error: errorMessage(error) });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('HTTP MCP request failed', { error: errorMessage(error) });
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: SERVER_NAME,
      version: SERVER_VERSION,
      uptime_ms: metrics.getAll().uptime_ms,
      active_sessions: deps.service.sessions.size
    });
  });

  app.get('/info', (_req: Request, res: Response) => {
    res.json({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      description: SERVER_DESCRIPTION,
      tools: TOOL_NAMES,
      resources: [SERVER_INFO_URI],
      config: {
        max_sessions: deps.settings.maxSessions,
        session_timeout_ms: deps.settings.sessionTimeoutMs,
        max_result_points: deps.settings.maxResultPoints,
        default_tds_tf: deps.settings.defaultTdsTf,
        cases_dir: deps.settings.casesDir
      }
    });
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    res.json({
      server: metrics.getAll(),
      sessions: deps.service.sessions.getStats()
    });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isBodyTooLarge(err)) {
      res.status(413).json({
        error: 'Request body too large',
        max_size: maxBodySize
      });
      return;
    }

    next(err);
  });

  return app;
}
