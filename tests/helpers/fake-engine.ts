import type {
  EigenState,
  EngineModel,
  LoadOptions,
  ModelSummary,
  NumericScalar,
  PowerFlowParams,
  PowerFlowState,
  SimulationEngine,
  TimeDomainParams,
  TimeDomainState
} from '../../src/types.js';

export const STATE_NAMES = ['delta GENROU 1', 'omega GENROU 1'];
export const ALGEBRAIC_NAMES = ['v Bus 1'];

export function createDeferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

export function emptyTimeDomainState(): TimeDomainState {
  return {
    initialized: false,
    lastRunSucceeded: false,
    busted: false,
    execTime: 0,
    t0: 0,
    tf: 0,
    time: [],
    stateNames: [],
    algebraicNames: [],
    states: [],
    algebraics: []
  };
}

/**
 * Trajectory with `points` samples: time[i] = i, states row i = [2i, 1],
 * algebraics row i = [10i].
 */
export function trajectory(points: number, tf: number): TimeDomainState {
  const time = new Float64Array(points);
  const states: number[][] = [];
  const algebraics: number[][] = [];
  for (let i = 0; i < points; i++) {
    time[i] = i;
    states.push([2 * i, 1]);
    algebraics.push([10 * i]);
  }

  return {
    initialized: true,
    lastRunSucceeded: true,
    busted: false,
    execTime: 0.25,
    t0: 0,
    tf,
    time,
    stateNames: STATE_NAMES,
    algebraicNames: ALGEBRAIC_NAMES,
    states,
    algebraics
  };
}

export function convergedPowerFlow(): PowerFlowState {
  return {
    converged: true,
    iterations: 4,
    execTime: 0.125,
    buses: {
      idx: [1, 2, 3],
      name: ['Bus 1', 'Bus 2', 'Bus 3'],
      voltage: new Float64Array([1.03, 1.01, 0.98]),
      angle: [0, -0.5, -1]
    },
    injections: {
      PV: { idx: [2], p: [0.75], q: [0.25] },
      Slack: { idx: [1], p: [1.5], q: [0.5] },
      PQ: { idx: ['PQ_1'], p: [-0.5], q: [-0.25] }
    }
  };
}

export class FakeModel implements EngineModel {
  readonly calls: string[] = [];
  releaseCount = 0;
  powerFlowConverges = true;
  tdsPoints = 5;
  tdsExecTime: NumericScalar = 0.25;
  lastTimeDomainParams: TimeDomainParams | undefined;
  lastPowerFlowParams: PowerFlowParams | undefined;
  // While set, runPowerFlow waits on it.
  hold: Promise<void> | null = null;
  failNext: Error | null = null;
  failSummary: Error | null = null;

  private pf: PowerFlowState = {
    converged: false,
    iterations: 0,
    execTime: 0,
    buses: { idx: [], name: [], voltage: [], angle: [] },
    injections: {}
  };
  private td: TimeDomainState = emptyTimeDomainState();
  private eigen: EigenState | null = null;

  constructor(readonly casePath: string) {}

  async runPowerFlow(params: PowerFlowParams): Promise<boolean> {
    this.record('runPowerFlow');
    this.lastPowerFlowParams = params;
    if (this.hold) {
      await this.hold;
    }
    this.pf = this.powerFlowConverges
      ? convergedPowerFlow()
      : { ...this.pf, converged: false, iterations: 20 };
    return this.powerFlowConverges;
  }

  async runTimeDomain(params: TimeDomainParams): Promise<boolean> {
    this.record('runTimeDomain');
    this.lastTimeDomainParams = params;
    this.td = { ...trajectory(this.tdsPoints, params.tf), execTime: this.tdsExecTime };
    return true;
  }

  async runEigenvalue(): Promise<void> {
    this.record('runEigenvalue');
    this.eigen = {
      real: [-1, -0.5, 0],
      imag: [2, -2, 0],
      nPositive: 0,
      nZeros: 1,
      nNegative: 2,
      participationFactors: [[0.5, 0.5], [0.5, 0.5], [0, 1]],
      stateNames: STATE_NAMES,
      execTime: 0.5
    };
  }

  async summary(): Promise<ModelSummary> {
    this.record('summary');
    if (this.failSummary) {
      throw this.failSummary;
    }
    return {
      name: 'test-grid',
      casePath: this.casePath,
      isSetup: true,
      components: [
        { name: 'Bus', group: 'ACTopology', count: 3 },
        { name: 'PV', group: 'StaticGen', count: 1 },
        { name: 'Fault', group: 'TimedEvent', count: 0 }
      ],
      dae: { nStates: 2, nAlgebraic: 1, time: 0 },
      config: { freq: 60, mva: 100 }
    };
  }

  async powerFlowState(): Promise<PowerFlowState> {
    this.record('powerFlowState');
    return this.pf;
  }

  async timeDomainState(): Promise<TimeDomainState> {
    this.record('timeDomainState');
    return this.td;
  }

  async eigenState(): Promise<EigenState | null> {
    this.record('eigenState');
    return this.eigen;
  }

  async release(): Promise<void> {
    this.calls.push('release');
    this.releaseCount += 1;
  }

  private record(call: string): void {
    this.calls.push(call);
    const failure = this.failNext;
    if (failure) {
      this.failNext = null;
      throw failure;
    }
  }
}

export class FakeEngine implements SimulationEngine {
  readonly models: FakeModel[] = [];
  readonly loads: Array<{ path: string; options: LoadOptions }> = [];
  failLoad: Error | null = null;
  // Applied to each model before it is handed out.
  configure: (model: FakeModel) => void = () => {};

  async load(path: string, options: LoadOptions): Promise<EngineModel> {
    this.loads.push({ path, options });
    if (this.failLoad) {
      throw this.failLoad;
    }
    const model = new FakeModel(path);
    this.configure(model);
    this.models.push(model);
    return model;
  }
}
