/**
 * Result Serializer
 * Builds tool payloads from engine state. Every array passes through the
 * numeric conversion helpers so payloads hold plain JSON values only.
 */

import { GENERATOR_MODELS } from '../constants.js';
import { Errors } from '../errors/index.js';
import type {
  EigenState,
  IndexValue,
  JsonValue,
  ModelSummary,
  Outcome,
  Payload,
  PowerFlowState,
  TimeDomainState
} from '../types.js';
import { fail, ok } from '../types.js';
import { applyStride, planDownsample } from '../utils/downsample.js';
import {
  columnOf,
  toIndexArray,
  toMatrix,
  toNumber,
  toNumberArray,
  type PortableNumber
} from '../utils/numeric.js';

// push(...items) overflows the call stack on very large cases.
function appendAll<T>(target: T[], items: readonly T[]): void {
  for (const item of items) target.push(item);
}

export function serializeSystemInfo(summary: ModelSummary): Payload {
  const models: Record<string, JsonValue> = {};
  for (const component of summary.components) {
    if (component.count > 0) {
      models[component.name] = { count: component.count, group: component.group };
    }
  }

  return {
    name: summary.name || 'Untitled',
    case_path: summary.casePath,
    is_setup: summary.isSetup,
    models,
    dae_info: {
      n_states: summary.dae.nStates,
      n_algebraic: summary.dae.nAlgebraic,
      time: toNumber(summary.dae.time) ?? 0
    },
    config: {
      freq: toNumber(summary.config.freq),
      mva: toNumber(summary.config.mva)
    }
  };
}

export function serializePowerFlow(state: PowerFlowState): Payload {
  if (!state.converged) {
    return {
      converged: false,
      iterations: state.iterations,
      error: 'Power flow did not converge'
    };
  }

  const payload: Payload = {
    converged: true,
    iterations: state.iterations,
    exec_time: toNumber(state.execTime),
    buses: {
      idx: toIndexArray(state.buses.idx),
      name: state.buses.name.map(String),
      voltage: toNumberArray(state.buses.voltage),
      angle: toNumberArray(state.buses.angle)
    }
  };

  const idx: IndexValue[] = [];
  const p: PortableNumber[] = [];
  const q: PortableNumber[] = [];
  for (const modelName of GENERATOR_MODELS) {
    const arrays = state.injections[modelName];
    if (!arrays || arrays.idx.length === 0) continue;
    appendAll(idx, toIndexArray(arrays.idx));
    appendAll(p, toNumberArray(arrays.p));
    appendAll(q, toNumberArray(arrays.q));
  }

  if (idx.length > 0) {
    payload.generators = { idx, p, q };
  }

  return payload;
}

/**
 * Names resolved against states first, then algebraic variables.
 * Unknown names are dropped; duplicates keep their first position.
 */
function selectSeries(
  state: TimeDomainState,
  variables: readonly string[] | undefined
): Array<{ name: string; series: PortableNumber[] }> {
  if (variables === undefined) {
    return state.stateNames.map((name, column) => ({ name, series: columnOf(state.states, column) }));
  }

  const selected: Array<{ name: string; series: PortableNumber[] }> = [];
  const seen = new Set<string>();
  for (const name of variables) {
    if (seen.has(name)) continue;

    const stateColumn = state.stateNames.indexOf(name);
    if (stateColumn >= 0) {
      selected.push({ name, series: columnOf(state.states, stateColumn) });
      seen.add(name);
      continue;
    }

    const algebraicColumn = state.algebraicNames.indexOf(name);
    if (algebraicColumn >= 0) {
      selected.push({ name, series: columnOf(state.algebraics, algebraicColumn) });
      seen.add(name);
    }
  }
  return selected;
}

export function serializeTimeDomain(
  state: TimeDomainState,
  options: { variables?: readonly string[]; maxPoints: number }
): Outcome<Payload> {
  if (!state.initialized) {
    return fail(Errors.tdsNotInitialized());
  }

  const time = toNumberArray(state.time);
  // One plan for every series keeps output rows index-aligned.
  const plan = planDownsample(time.length, options.maxPoints);

  const variables: Record<string, JsonValue> = {};
  for (const { name, series } of selectSeries(state, options.variables)) {
    variables[name] = applyStride(series, plan);
  }

  const payload: Payload = {
    initialized: true,
    converged: state.lastRunSucceeded && !state.busted,
    exec_time: toNumber(state.execTime),
    time: applyStride(time, plan),
    n_points: time.length,
    variables,
    downsampled: plan.downsampled
  };

  if (plan.downsampled) {
    payload.downsample_factor = plan.stride;
  }

  return ok(payload);
}

export function serializeVariables(state: TimeDomainState): Outcome<Payload> {
  if (!state.initialized) {
    return fail(Errors.tdsNotInitialized());
  }

  return ok({
    state_variables: [...state.stateNames],
    algebraic_variables: [...state.algebraicNames],
    n_states: state.stateNames.length,
    n_algebraic: state.algebraicNames.length
  });
}

export function serializeEigen(state: EigenState | null): Outcome<Payload> {
  if (state === null) {
    return fail(Errors.eigenNotRun());
  }

  const real = toNumberArray(state.real);
  const payload: Payload = {
    n_eigenvalues: real.length,
    eigenvalues: {
      real,
      imag: toNumberArray(state.imag)
    },
    statistics: {
      n_positive: state.nPositive,
      n_zeros: state.nZeros,
      n_negative: state.nNegative
    }
  };

  if (state.participationFactors !== null) {
    payload.participation_factors = toMatrix(state.participationFactors);
  }

  if (state.stateNames !== null && state.stateNames.length > 0) {
    payload.state_names = state.stateNames.map(String);
  }

  payload.exec_time = toNumber(state.execTime);
  return ok(payload);
}
