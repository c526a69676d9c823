/**
 * Engine adapter backed by worker processes.
 *
 * Each loaded case gets its own worker, so a model is never shared and
 * releasing it is ending the process.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { WORKER_CONFIG } from '../constants.js';
import {
  AckSchema,
  EigenStateSchema,
  ModelSummarySchema,
  PowerFlowStateSchema,
  RunPowerFlowResultSchema,
  RunTimeDomainResultSchema,
  TimeDomainStateSchema
} from '../schemas/worker.js';
import type {
  EigenState,
  EngineModel,
  LoadOptions,
  ModelSummary,
  PowerFlowParams,
  PowerFlowState,
  SimulationEngine,
  TimeDomainParams,
  TimeDomainState
} from '../types.js';
import { logger } from '../utils/logger.js';
import { WorkerChannel, type WorkerProcess } from './worker-channel.js';

export type WorkerSpawner = () => WorkerProcess;

export interface WorkerEngineOptions {
  command?: string;
  spawnWorker?: WorkerSpawner;
  requestTimeoutMs?: number;
  shutdownGraceMs?: number;
}

/**
 * Start `command` (split on whitespace) with piped stdio. Worker stderr is
 * forwarded to the debug log.
 */
export function spawnWorkerProcess(command: string): WorkerProcess {
  const [executable, ...args] = command.split(/\s+/).filter(Boolean);
  if (!executable) {
    throw new Error('Engine worker command is empty');
  }

  const child = spawn(executable, args, { stdio: ['pipe', 'pipe', 'pipe'] });
  createInterface({ input: child.stderr }).on('line', line => {
    logger.debug('Engine worker stderr', { pid: child.pid, line });
  });

  const exitListeners: Array<(code: number | null) => void> = [];
  let exitCode: number | null | undefined;
  const notifyExit = (code: number | null) => {
    if (exitCode !== undefined) return;
    exitCode = code;
    for (const listener of exitListeners) listener(code);
  };

  child.once('exit', code => notifyExit(code));
  child.once('error', error => {
    logger.error('Engine worker failed to start', { command, error: error.message });
    notifyExit(null);
  });

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    kill: () => {
      child.kill('SIGKILL');
    },
    onExit: listener => {
      if (exitCode !== undefined) {
        listener(exitCode);
        return;
      }
      exitListeners.push(listener);
    }
  };
}

class WorkerModel implements EngineModel {
  private released = false;

  constructor(
    private readonly channel: WorkerChannel,
    private readonly shutdownGraceMs: number
  ) {}

  runPowerFlow(params: PowerFlowParams): Promise<boolean> {
    return this.channel.request('run_power_flow', {
      tol: params.tol,
      max_iter: params.maxIter,
      method: params.method
    }, RunPowerFlowResultSchema);
  }

  runTimeDomain(params: TimeDomainParams): Promise<boolean> {
    return this.channel.request('run_time_domain', {
      tf: params.tf,
      tstep: params.tstep,
      tol: params.tol,
      method: params.method
    }, RunTimeDomainResultSchema);
  }

  async runEigenvalue(): Promise<void> {
    await this.channel.request('run_eigenvalue', {}, AckSchema);
  }

  summary(): Promise<ModelSummary> {
    return this.channel.request('summary', {}, ModelSummarySchema);
  }

  powerFlowState(): Promise<PowerFlowState> {
    return this.channel.request('power_flow_state', {}, PowerFlowStateSchema);
  }

  timeDomainState(): Promise<TimeDomainState> {
    return this.channel.request('time_domain_state', {}, TimeDomainStateSchema);
  }

  eigenState(): Promise<EigenState | null> {
    return this.channel.request('eigen_state', {}, EigenStateSchema);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await this.channel.close(this.shutdownGraceMs);
  }
}

export class WorkerEngine implements SimulationEngine {
  private readonly spawnWorker: WorkerSpawner;
  private readonly requestTimeoutMs: number;
  private readonly shutdownGraceMs: number;

  constructor(options: WorkerEngineOptions = {}) {
    const command = options.command ?? WORKER_CONFIG.COMMAND;
    this.spawnWorker = options.spawnWorker ?? (() => spawnWorkerProcess(command));
    this.requestTimeoutMs = options.requestTimeoutMs ?? WORKER_CONFIG.REQUEST_TIMEOUT_MS;
    this.shutdownGraceMs = options.shutdownGraceMs ?? WORKER_CONFIG.SHUTDOWN_GRACE_MS;
  }

  /**
   * Start a worker and load the case into it. On failure the worker is
   * stopped before the error propagates.
   */
  async load(path: string, options: LoadOptions): Promise<EngineModel> {
    const channel = new WorkerChannel(this.spawnWorker(), this.requestTimeoutMs);
    const model = new WorkerModel(channel, this.shutdownGraceMs);

    try {
      await channel.request('load', {
        path,
        setup: options.setup,
        no_output: options.noOutput
      }, AckSchema);
      return model;
    } catch (error) {
      await model.release();
      throw error;
    }
  }
}
