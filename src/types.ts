/**
 * GridSim MCP Server Type Definitions
 *
 * The engine contract is the only way the server touches a simulation model.
 * Adapters implement every member; callers never check for optional members.
 */

import type { SimError } from './errors/index.js';

// ============================================
// Numeric containers
// ============================================

/**
 * Scalars an engine may hand back.
 */
export type NumericScalar = number | bigint | boolean;

/**
 * One-dimensional numeric containers: plain arrays and typed arrays.
 */
export type NumericArrayLike =
  | ArrayLike<number>
  | ArrayLike<bigint>
  | readonly NumericScalar[];

/**
 * Row-major matrix: one entry per row.
 */
export type NumericMatrix = ReadonlyArray<NumericArrayLike>;

/**
 * Component identifiers are integers or strings depending on the case file.
 */
export type IndexValue = number | string;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// ============================================
// Engine contract
// ============================================

export interface LoadOptions {
  setup: boolean;
  noOutput: boolean;
}

export interface PowerFlowParams {
  tol?: number;
  maxIter?: number;
  method?: string;
}

export interface TimeDomainParams {
  tf: number;
  tstep?: number;
  tol?: number;
  method?: string;
}

export interface ComponentCount {
  name: string;
  group: string;
  count: number;
}

export interface ModelSummary {
  name: string;
  casePath: string | null;
  isSetup: boolean;
  components: ComponentCount[];
  dae: {
    nStates: number;
    nAlgebraic: number;
    time: NumericScalar;
  };
  config: {
    freq: NumericScalar;
    mva: NumericScalar;
  };
}

export interface ComponentArrays {
  idx: readonly IndexValue[];
  p: NumericArrayLike;
  q: NumericArrayLike;
}

export interface PowerFlowState {
  converged: boolean;
  iterations: number;
  execTime: NumericScalar;
  buses: {
    idx: readonly IndexValue[];
    name: readonly string[];
    voltage: NumericArrayLike;
    angle: NumericArrayLike;
  };
  // Keyed by component type name; absent types have no entry.
  injections: Record<string, ComponentArrays>;
}

export interface TimeDomainState {
  initialized: boolean;
  // Outcome of the most recent run; false before any run.
  lastRunSucceeded: boolean;
  busted: boolean;
  execTime: NumericScalar;
  t0: number;
  tf: number;
  time: NumericArrayLike;
  stateNames: readonly string[];
  algebraicNames: readonly string[];
  // Rows are time points, columns follow stateNames / algebraicNames.
  states: NumericMatrix;
  algebraics: NumericMatrix;
}

export interface EigenState {
  real: NumericArrayLike;
  imag: NumericArrayLike;
  nPositive: number;
  nZeros: number;
  nNegative: number;
  participationFactors: NumericMatrix | null;
  stateNames: readonly string[] | null;
  execTime: NumericScalar;
}

export interface EngineModel {
  runPowerFlow(params: PowerFlowParams): Promise<boolean>;
  runTimeDomain(params: TimeDomainParams): Promise<boolean>;
  runEigenvalue(): Promise<void>;
  summary(): Promise<ModelSummary>;
  powerFlowState(): Promise<PowerFlowState>;
  timeDomainState(): Promise<TimeDomainState>;
  /**
   * Null until eigenvalues have been computed.
   */
  eigenState(): Promise<EigenState | null>;
  /**
   * Tear down engine-side resources. Safe to call more than once.
   */
  release(): Promise<void>;
}

export interface SimulationEngine {
  /**
   * Resolves with a ready model or rejects after releasing anything it built.
   */
  load(path: string, options: LoadOptions): Promise<EngineModel>;
}

// ============================================
// Outcomes
// ============================================

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: SimError };

export const ok = <T>(value: T): Outcome<T> => ({ ok: true, value });
export const fail = <T = never>(error: SimError): Outcome<T> => ({ ok: false, error });

/**
 * Tool payloads are JSON objects.
 */
export type Payload = Record<string, JsonValue>;

// ============================================
// Sessions
// ============================================

export interface SessionInfo {
  sessionId: string;
  sourcePath: string;
  createdAt: number;
  lastAccessedAt: number;
}
