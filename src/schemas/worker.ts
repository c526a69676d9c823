/**
 * Zod schemas for the engine worker wire protocol.
 *
 * Requests are `{"id", "method", "params"}` lines; replies are
 * `{"id", "result"}` or `{"id", "error": {"message"}}` lines. Field names
 * on the wire are snake_case; replies are transformed into the engine
 * contract types. Non-finite floats travel as null.
 */

import { z } from 'zod';
import type {
  EigenState,
  ModelSummary,
  PowerFlowState,
  TimeDomainState
} from '../types.js';

const WireNumber = z.number().nullable().transform(value => value ?? Number.NaN);
const WireSeries = z.array(WireNumber);
const WireMatrix = z.array(WireSeries);
const WireIndex = z.array(z.union([z.number(), z.string()]));

export const ReplyEnvelopeSchema = z.object({
  id: z.number().int(),
  result: z.unknown().optional(),
  error: z.object({
    message: z.string(),
    type: z.string().optional()
  }).optional()
});

export type ReplyEnvelope = z.infer<typeof ReplyEnvelopeSchema>;

export const AckSchema = z.object({}).passthrough();

export const RunPowerFlowResultSchema = z.object({
  converged: z.boolean()
}).transform(reply => reply.converged);

export const RunTimeDomainResultSchema = z.object({
  success: z.boolean()
}).transform(reply => reply.success);

export const ModelSummarySchema = z.object({
  name: z.string(),
  case_path: z.string().nullable(),
  is_setup: z.boolean(),
  models: z.array(z.object({
    name: z.string(),
    group: z.string(),
    count: z.number().int().nonnegative()
  })),
  dae: z.object({
    n: z.number().int().nonnegative(),
    m: z.number().int().nonnegative(),
    t: WireNumber
  }),
  config: z.object({
    freq: WireNumber,
    mva: WireNumber
  })
}).transform((wire): ModelSummary => ({
  name: wire.name,
  casePath: wire.case_path,
  isSetup: wire.is_setup,
  components: wire.models,
  dae: { nStates: wire.dae.n, nAlgebraic: wire.dae.m, time: wire.dae.t },
  config: wire.config
}));

const ComponentArraysSchema = z.object({
  idx: WireIndex,
  p: WireSeries,
  q: WireSeries
});

export const PowerFlowStateSchema = z.object({
  converged: z.boolean(),
  iterations: z.number().int().nonnegative(),
  exec_time: WireNumber,
  buses: z.object({
    idx: WireIndex,
    name: z.array(z.string()),
    v: WireSeries,
    a: WireSeries
  }),
  injections: z.record(z.string(), ComponentArraysSchema)
}).transform((wire): PowerFlowState => ({
  converged: wire.converged,
  iterations: wire.iterations,
  execTime: wire.exec_time,
  buses: {
    idx: wire.buses.idx,
    name: wire.buses.name,
    voltage: wire.buses.v,
    angle: wire.buses.a
  },
  injections: wire.injections
}));

export const TimeDomainStateSchema = z.object({
  initialized: z.boolean(),
  last_run_succeeded: z.boolean(),
  busted: z.boolean(),
  exec_time: WireNumber,
  t0: z.number(),
  tf: z.number(),
  t: WireSeries,
  x_name: z.array(z.string()),
  y_name: z.array(z.string()),
  x: WireMatrix,
  y: WireMatrix
}).transform((wire): TimeDomainState => ({
  initialized: wire.initialized,
  lastRunSucceeded: wire.last_run_succeeded,
  busted: wire.busted,
  execTime: wire.exec_time,
  t0: wire.t0,
  tf: wire.tf,
  time: wire.t,
  stateNames: wire.x_name,
  algebraicNames: wire.y_name,
  states: wire.x,
  algebraics: wire.y
}));

export const EigenStateSchema = z.object({
  mu_real: WireSeries,
  mu_imag: WireSeries,
  n_positive: z.number().int().nonnegative(),
  n_zeros: z.number().int().nonnegative(),
  n_negative: z.number().int().nonnegative(),
  pfactors: WireMatrix.nullable(),
  x_name: z.array(z.string()).nullable(),
  exec_time: WireNumber
}).transform((wire): EigenState => ({
  real: wire.mu_real,
  imag: wire.mu_imag,
  nPositive: wire.n_positive,
  nZeros: wire.n_zeros,
  nNegative: wire.n_negative,
  participationFactors: wire.pfactors,
  stateNames: wire.x_name,
  execTime: wire.exec_time
})).nullable();
