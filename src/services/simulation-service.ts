/**
 * Simulation Service
 * The tool operations: session lookup, engine calls under the session lock,
 * and payload serialization. Engine failures come back as outcomes.
 */

import { SIMULATION_CONFIG } from '../constants.js';
import { Errors, SimError, errorMessage } from '../errors/index.js';
import type {
  EngineModel,
  Outcome,
  Payload,
  PowerFlowParams,
  SimulationEngine
} from '../types.js';
import { fail, ok } from '../types.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import { toNumber } from '../utils/numeric.js';
import type { CaseLibrary } from './case-library.js';
import {
  serializeEigen,
  serializePowerFlow,
  serializeSystemInfo,
  serializeTimeDomain,
  serializeVariables
} from './result-serializer.js';
import type { SessionManager } from './session-manager.js';

export interface LoadCaseRequest {
  casePath: string;
  setup: boolean;
  noOutput: boolean;
}

export interface TimeDomainRequest {
  tf?: number;
  tstep?: number;
  tol?: number;
  method?: string;
}

export interface TimeDomainResultsRequest {
  variables?: readonly string[];
  maxPoints?: number;
}

export interface SimulationServiceOptions {
  sessions: SessionManager;
  engine: SimulationEngine;
  cases: CaseLibrary;
  defaultTdsTf?: number;
  maxResultPoints?: number;
}

type ModelOperation = (model: EngineModel) => Promise<Outcome<Payload>>;

export class SimulationService {
  readonly sessions: SessionManager;
  private readonly engine: SimulationEngine;
  private readonly cases: CaseLibrary;
  private readonly defaultTdsTf: number;
  private readonly maxResultPoints: number;

  constructor(options: SimulationServiceOptions) {
    this.sessions = options.sessions;
    this.engine = options.engine;
    this.cases = options.cases;
    this.defaultTdsTf = options.defaultTdsTf ?? SIMULATION_CONFIG.DEFAULT_TDS_TF;
    this.maxResultPoints = options.maxResultPoints ?? SIMULATION_CONFIG.MAX_RESULT_POINTS;
  }

  async listCases(): Promise<Outcome<Payload>> {
    const cases = await this.cases.listCases();
    return ok({
      cases,
      count: cases.length,
      cases_dir: this.cases.casesDir
    });
  }

  async loadCase(request: LoadCaseRequest): Promise<Outcome<Payload>> {
    const resolved = this.cases.resolve(request.casePath);
    if (!resolved.exists) {
      return fail(Errors.caseNotFound(request.casePath, resolved.resolvedPath));
    }

    const timer = metrics.startTimer(MetricNames.LOAD_CASE_DURATION_MS);
    let model: EngineModel;
    try {
      model = await this.engine.load(resolved.resolvedPath, {
        setup: request.setup,
        noOutput: request.noOutput
      });
    } catch (error) {
      metrics.increment(MetricNames.CASE_LOAD_FAILURES);
      logger.warn('Case load failed', { casePath: request.casePath, error: errorMessage(error) });
      return fail(Errors.engineLoadFailed(request.casePath, errorMessage(error)));
    } finally {
      timer.stop();
    }

    // Build the summary before registering so a failure leaves nothing behind.
    let systemInfo: Payload;
    try {
      systemInfo = serializeSystemInfo(await model.summary());
    } catch (error) {
      metrics.increment(MetricNames.CASE_LOAD_FAILURES);
      await model.release().catch((releaseError: unknown) => {
        logger.error('Failed to release model after load failure', {
          casePath: request.casePath,
          error: errorMessage(releaseError)
        });
      });
      return fail(Errors.engineLoadFailed(request.casePath, errorMessage(error)));
    }

    const sessionId = this.sessions.create(model, request.casePath);
    metrics.increment(MetricNames.CASES_LOADED);
    logger.info('Case loaded', { sessionId, casePath: request.casePath });

    return ok({
      session_id: sessionId,
      case_path: request.casePath,
      system_info: systemInfo
    });
  }

  getSystemInfo(sessionId: string): Promise<Outcome<Payload>> {
    return this.withSession(sessionId, 'system info', async model =>
      ok({ session_id: sessionId, ...serializeSystemInfo(await model.summary()) })
    );
  }

  listSessions(): Outcome<Payload> {
    const sessions = this.sessions.list().map(info => ({
      session_id: info.sessionId,
      case_path: info.sourcePath,
      created_at: new Date(info.createdAt).toISOString(),
      last_accessed: new Date(info.lastAccessedAt).toISOString()
    }));

    return ok({ sessions, count: sessions.length });
  }

  async closeSession(sessionId: string): Promise<Outcome<Payload>> {
    let closed: boolean;
    try {
      closed = await this.sessions.close(sessionId);
    } catch (error) {
      // The entry is gone either way; only the engine teardown failed.
      return fail(Errors.engineCallFailed('session close', errorMessage(error)));
    }

    if (!closed) {
      return fail(Errors.sessionNotFound(sessionId));
    }
    return ok({ message: `Session ${sessionId} closed successfully` });
  }

  runPowerFlow(sessionId: string, params: PowerFlowParams): Promise<Outcome<Payload>> {
    return this.withSession(sessionId, 'power flow', async model => {
      await this.timed('power flow', MetricNames.POWER_FLOW_DURATION_MS, sessionId, () =>
        model.runPowerFlow(params)
      );
      return ok(serializePowerFlow(await model.powerFlowState()));
    });
  }

  /**
   * Requires a converged power flow; otherwise nothing is sent to the engine
   * beyond the state read.
   */
  runTimeDomain(sessionId: string, request: TimeDomainRequest): Promise<Outcome<Payload>> {
    return this.withSession(sessionId, 'time-domain simulation', async model => {
      const powerFlow = await model.powerFlowState();
      if (!powerFlow.converged) {
        return fail(Errors.powerFlowNotConverged('time-domain simulation'));
      }

      const success = await this.timed('time-domain simulation', MetricNames.TIME_DOMAIN_DURATION_MS, sessionId, () =>
        model.runTimeDomain({
          tf: request.tf ?? this.defaultTdsTf,
          tstep: request.tstep,
          tol: request.tol,
          method: request.method
        })
      );

      const state = await model.timeDomainState();
      return ok({
        converged: success && !state.busted,
        exec_time: toNumber(state.execTime),
        time_range: [toNumber(state.t0), toNumber(state.tf)],
        n_points: state.time.length,
        message: 'Time-domain simulation completed. Use get_tds_results to retrieve data.'
      });
    });
  }

  runEigenvalue(sessionId: string): Promise<Outcome<Payload>> {
    return this.withSession(sessionId, 'eigenvalue analysis', async model => {
      const powerFlow = await model.powerFlowState();
      if (!powerFlow.converged) {
        return fail(Errors.powerFlowNotConverged('eigenvalue analysis'));
      }

      await this.timed('eigenvalue analysis', MetricNames.EIGENVALUE_DURATION_MS, sessionId, () =>
        model.runEigenvalue()
      );
      return serializeEigen(await model.eigenState());
    });
  }

  getPowerFlowResults(sessionId: string): Promise<Outcome<Payload>> {
    return this.withSession(sessionId, 'power flow results', async model =>
      ok(serializePowerFlow(await model.powerFlowState()))
    );
  }

  getTimeDomainResults(sessionId: string, request: TimeDomainResultsRequest = {}): Promise<Outcome<Payload>> {
    return this.withSession(sessionId, 'time-domain results', async model =>
      serializeTimeDomain(await model.timeDomainState(), {
        variables: request.variables,
        maxPoints: request.maxPoints ?? this.maxResultPoints
      })
    );
  }

  listTimeDomainVariables(sessionId: string): Promise<Outcome<Payload>> {
    return this.withSession(sessionId, 'variable listing', async model =>
      serializeVariables(await model.timeDomainState())
    );
  }

  /**
   * Resolve the session, then run `operation` while holding its lock.
   * A session closed while waiting for the lock reads as not found.
   */
  private async withSession(
    sessionId: string,
    operation: string,
    fn: ModelOperation
  ): Promise<Outcome<Payload>> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return fail(Errors.sessionNotFound(sessionId));
    }

    try {
      const result = await session.runExclusive(fn);
      if (result.status === 'released') {
        return fail(Errors.sessionNotFound(sessionId));
      }
      return result.value;
    } catch (error) {
      metrics.increment(MetricNames.ENGINE_FAILURES);
      logger.warn('Engine call failed', { sessionId, operation, error: errorMessage(error) });
      return fail(error instanceof SimError ? error : Errors.engineCallFailed(operation, errorMessage(error)));
    }
  }

  private async timed<T>(
    operation: string,
    metric: string,
    sessionId: string,
    run: () => Promise<T>
  ): Promise<T> {
    const timer = metrics.startTimer(metric);
    try {
      return await run();
    } finally {
      logger.performance(operation, timer.stop(), { sessionId });
    }
  }
}
