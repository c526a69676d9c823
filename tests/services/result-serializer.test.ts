import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../src/errors/index.js';
import {
  serializeEigen,
  serializePowerFlow,
  serializeSystemInfo,
  serializeTimeDomain,
  serializeVariables
} from '../../src/services/result-serializer.js';
import {
  convergedPowerFlow,
  emptyTimeDomainState,
  FakeModel,
  trajectory
} from '../helpers/fake-engine.js';

describe('serializeSystemInfo', () => {
  it('lists only components that are present', async () => {
    const summary = await new FakeModel('cases/test.xlsx').summary();

    expect(serializeSystemInfo(summary)).toEqual({
      name: 'test-grid',
      case_path: 'cases/test.xlsx',
      is_setup: true,
      models: {
        Bus: { count: 3, group: 'ACTopology' },
        PV: { count: 1, group: 'StaticGen' }
      },
      dae_info: { n_states: 2, n_algebraic: 1, time: 0 },
      config: { freq: 60, mva: 100 }
    });
  });

  it('names untitled systems and nulls non-finite config', async () => {
    const summary = await new FakeModel('x.raw').summary();

    const payload = serializeSystemInfo({ ...summary, name: '', config: { freq: Number.NaN, mva: 100n } });

    expect(payload.name).toBe('Untitled');
    expect(payload.config).toEqual({ freq: null, mva: 100 });
  });
});

describe('serializePowerFlow', () => {
  it('reports a failed solution without arrays', () => {
    const state = { ...convergedPowerFlow(), converged: false, iterations: 20 };

    expect(serializePowerFlow(state)).toEqual({
      converged: false,
      iterations: 20,
      error: 'Power flow did not converge'
    });
  });

  it('includes buses and generators in Slack, PV, PQ order', () => {
    expect(serializePowerFlow(convergedPowerFlow())).toEqual({
      converged: true,
      iterations: 4,
      exec_time: 0.125,
      buses: {
        idx: [1, 2, 3],
        name: ['Bus 1', 'Bus 2', 'Bus 3'],
        voltage: [1.03, 1.01, 0.98],
        angle: [0, -0.5, -1]
      },
      generators: {
        idx: [1, 2, 'PQ_1'],
        p: [1.5, 0.75, -0.5],
        q: [0.5, 0.25, -0.25]
      }
    });
  });

  it('collects generators from very large cases', () => {
    const count = 300_000;
    const loadIds = Array.from({ length: count }, (_, i) => i + 10);
    const state = convergedPowerFlow();
    state.injections = {
      Slack: { idx: [1], p: [1.5], q: [0.5] },
      PQ: { idx: loadIds, p: new Float64Array(count).fill(-0.5), q: new Float64Array(count) }
    };

    const payload = serializePowerFlow(state);

    expect(payload.generators).toEqual({
      idx: [1, ...loadIds],
      p: [1.5, ...Array.from({ length: count }, () => -0.5)],
      q: [0.5, ...Array.from({ length: count }, () => 0)]
    });
  });

  it('omits generators when no generator components exist', () => {
    const payload = serializePowerFlow({ ...convergedPowerFlow(), injections: {} });

    expect(payload).not.toHaveProperty('generators');
  });
});

describe('serializeTimeDomain', () => {
  it('fails before the simulation is initialized', () => {
    const outcome = serializeTimeDomain(emptyTimeDomainState(), { maxPoints: 100 });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.code).toBe(ErrorCode.TDS_NOT_INITIALIZED);
    expect(outcome.error.message).toBe('Time-domain simulation not initialized');
  });

  it('returns every state variable by default', () => {
    const outcome = serializeTimeDomain(trajectory(3, 2), { maxPoints: 100 });

    expect(outcome).toEqual({
      ok: true,
      value: {
        initialized: true,
        converged: true,
        exec_time: 0.25,
        time: [0, 1, 2],
        n_points: 3,
        variables: {
          'delta GENROU 1': [0, 2, 4],
          'omega GENROU 1': [1, 1, 1]
        },
        downsampled: false
      }
    });
  });

  it('downsamples time and variables with one stride', () => {
    const outcome = serializeTimeDomain(trajectory(1000, 20), {
      variables: ['v Bus 1'],
      maxPoints: 100
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    const expectedTime = Array.from({ length: 100 }, (_, i) => i * 10);
    expect(outcome.value.time).toEqual(expectedTime);
    expect(outcome.value.variables).toEqual({ 'v Bus 1': expectedTime.map(t => t * 10) });
    expect(outcome.value.n_points).toBe(1000);
    expect(outcome.value.downsampled).toBe(true);
    expect(outcome.value.downsample_factor).toBe(10);
  });

  it('resolves requested names against states then algebraics', () => {
    const outcome = serializeTimeDomain(trajectory(2, 1), {
      variables: ['v Bus 1', 'missing', 'omega GENROU 1', 'v Bus 1'],
      maxPoints: 100
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.variables).toEqual({
      'v Bus 1': [0, 10],
      'omega GENROU 1': [1, 1]
    });
    expect(Object.keys(outcome.value.variables ?? {})).toEqual(['v Bus 1', 'omega GENROU 1']);
  });

  it('reports a busted run as not converged', () => {
    const outcome = serializeTimeDomain({ ...trajectory(2, 1), busted: true }, { maxPoints: 100 });

    expect(outcome.ok && outcome.value.converged).toBe(false);
  });
});

describe('serializeVariables', () => {
  it('lists state and algebraic names', () => {
    expect(serializeVariables(trajectory(2, 1))).toEqual({
      ok: true,
      value: {
        state_variables: ['delta GENROU 1', 'omega GENROU 1'],
        algebraic_variables: ['v Bus 1'],
        n_states: 2,
        n_algebraic: 1
      }
    });
  });

  it('fails before the simulation is initialized', () => {
    const outcome = serializeVariables(emptyTimeDomainState());

    expect(outcome.ok).toBe(false);
  });
});

describe('serializeEigen', () => {
  it('fails when no analysis has run', () => {
    const outcome = serializeEigen(null);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.code).toBe(ErrorCode.EIGEN_NOT_RUN);
  });

  it('includes eigenvalues, statistics and participation factors', async () => {
    const model = new FakeModel('case.xlsx');
    await model.runEigenvalue();

    expect(serializeEigen(await model.eigenState())).toEqual({
      ok: true,
      value: {
        n_eigenvalues: 3,
        eigenvalues: { real: [-1, -0.5, 0], imag: [2, -2, 0] },
        statistics: { n_positive: 0, n_zeros: 1, n_negative: 2 },
        participation_factors: [[0.5, 0.5], [0.5, 0.5], [0, 1]],
        state_names: ['delta GENROU 1', 'omega GENROU 1'],
        exec_time: 0.5
      }
    });
  });
});
