/**
 * GridSim MCP Server Tools
 *
 * Tool layer with centralized error handling, logging, and metrics.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, TextContent } from '@modelcontextprotocol/sdk/types.js';
import { SimError } from '../errors/index.js';
import type { SimulationService } from '../services/simulation-service.js';
import type { Outcome, Payload } from '../types.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import {
  GetTdsResultsInputSchema,
  ListCasesInputSchema,
  ListSessionsInputSchema,
  LoadCaseInputSchema,
  RunPowerFlowInputSchema,
  RunTimeDomainInputSchema,
  SessionInputSchema
} from '../schemas/tools.js';

/**
 * Tool execution wrapper with consistent error handling and logging.
 * Failed outcomes are logged as warnings, thrown errors as errors; both
 * become `isError` responses.
 */
async function executeWithTracking(
  toolName: string,
  params: Record<string, unknown>,
  handler: () => Promise<Outcome<Payload>> | Outcome<Payload>
): Promise<CallToolResult> {
  const traceId = logger.startToolCall(toolName, params);
  const timer = metrics.startTimer(MetricNames.TOOL_DURATION_MS);

  metrics.increment(MetricNames.TOOL_CALLS_TOTAL);

  let outcome: Outcome<Payload>;
  try {
    outcome = await handler();
  } catch (error) {
    timer.stop();
    const simError = SimError.fromError(error, traceId);
    metrics.increment(MetricNames.TOOL_CALLS_FAILED);
    logger.toolError(traceId, simError);
    return simError.toMCPResponse();
  }
  timer.stop();

  if (!outcome.ok) {
    metrics.increment(MetricNames.TOOL_CALLS_FAILED);
    logger.endToolCall(traceId, false, { code: outcome.error.code, error: outcome.error.message });
    return outcome.error.toMCPResponse();
  }

  metrics.increment(MetricNames.TOOL_CALLS_SUCCESS);
  logger.endToolCall(traceId, true);

  const result: Payload = { success: true, ...outcome.value };
  const content: TextContent[] = [{ type: 'text', text: JSON.stringify(result, null, 2) }];
  return { content, structuredContent: result };
}

/**
 * Register all simulation tools against one service instance.
 */
export function registerSimulationTools(server: McpServer, service: SimulationService): void {

  // ============================================
  // Cases & sessions
  // ============================================

  server.registerTool(
    'list_available_cases',
    {
      title: 'List Available Cases',
      description: `List the case files bundled in the server's cases directory.

Returned paths can be passed directly to load_case.`,
      inputSchema: ListCasesInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async () => executeWithTracking('list_available_cases', {}, () => service.listCases())
  );

  server.registerTool(
    'load_case',
    {
      title: 'Load Case',
      description: `Load a power system case file into a new simulation session.

The path is looked up in the cases directory first, then used as given.
Returns the session ID that every other tool takes.

Typical workflow:
1. load_case - Load a case and get a session_id
2. run_power_flow - Solve the steady state
3. run_time_domain or run_eigenvalue - Dynamic analysis
4. get_tds_results - Read trajectories
5. close_session - Free the session`,
      inputSchema: LoadCaseInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('load_case', params, () =>
      service.loadCase({
        casePath: params.case_path,
        setup: params.setup,
        noOutput: params.no_output
      })
    )
  );

  server.registerTool(
    'get_system_info',
    {
      title: 'Get System Info',
      description: 'Summarize a loaded system: component counts, DAE sizes and base configuration.',
      inputSchema: SessionInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('get_system_info', params, () =>
      service.getSystemInfo(params.session_id)
    )
  );

  server.registerTool(
    'list_sessions',
    {
      title: 'List Sessions',
      description: `List live simulation sessions.

Idle sessions expire after the configured timeout and are not listed.`,
      inputSchema: ListSessionsInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async () => executeWithTracking('list_sessions', {}, () => service.listSessions())
  );

  server.registerTool(
    'close_session',
    {
      title: 'Close Session',
      description: 'Close a session and release its simulation model. Calls already running on it finish first.',
      inputSchema: SessionInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: false,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('close_session', params, () =>
      service.closeSession(params.session_id)
    )
  );

  // ============================================
  // Analyses
  // ============================================

  server.registerTool(
    'run_power_flow',
    {
      title: 'Run Power Flow',
      description: `Solve the steady-state power flow.

Time-domain simulation and eigenvalue analysis require a converged power flow.
Returns bus voltages and angles and generator injections.`,
      inputSchema: RunPowerFlowInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('run_power_flow', params, () =>
      service.runPowerFlow(params.session_id, {
        tol: params.tol,
        maxIter: params.max_iter,
        method: params.method
      })
    )
  );

  server.registerTool(
    'run_time_domain',
    {
      title: 'Run Time-Domain Simulation',
      description: `Integrate the system from the power flow solution up to tf seconds.

Returns a run summary only; use get_tds_results for the trajectories.`,
      inputSchema: RunTimeDomainInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('run_time_domain', params, () =>
      service.runTimeDomain(params.session_id, {
        tf: params.tf,
        tstep: params.tstep,
        tol: params.tol,
        method: params.method
      })
    )
  );

  server.registerTool(
    'run_eigenvalue',
    {
      title: 'Run Eigenvalue Analysis',
      description: 'Small-signal stability analysis around the power flow operating point.',
      inputSchema: SessionInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('run_eigenvalue', params, () =>
      service.runEigenvalue(params.session_id)
    )
  );

  // ============================================
  // Results
  // ============================================

  server.registerTool(
    'get_pflow_results',
    {
      title: 'Get Power Flow Results',
      description: 'Read the current power flow solution without solving again.',
      inputSchema: SessionInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('get_pflow_results', params, () =>
      service.getPowerFlowResults(params.session_id)
    )
  );

  server.registerTool(
    'get_tds_results',
    {
      title: 'Get Time-Domain Results',
      description: `Read time-domain trajectories.

Without variables, every state variable is returned. Long runs are
downsampled by a fixed stride applied to time and all series alike.`,
      inputSchema: GetTdsResultsInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('get_tds_results', params, () =>
      service.getTimeDomainResults(params.session_id, {
        variables: params.variables,
        maxPoints: params.max_points
      })
    )
  );

  server.registerTool(
    'list_tds_variables',
    {
      title: 'List Time-Domain Variables',
      description: 'List state and algebraic variable names available to get_tds_results.',
      inputSchema: SessionInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async params => executeWithTracking('list_tds_variables', params, () =>
      service.listTimeDomainVariables(params.session_id)
    )
  );
}
