/**
 * Zod schemas for the simulation tools
 */

import { z } from 'zod';

const SessionId = z.string()
  .min(1, 'Session ID is required')
  .describe('Session ID returned by load_case');

// ============================================
// Case & Session Tools
// ============================================

export const ListCasesInputSchema = z.object({}).strict();

export type ListCasesInput = z.infer<typeof ListCasesInputSchema>;

/**
 * Load a case file into a new session
 */
export const LoadCaseInputSchema = z.object({
  case_path: z.string()
    .min(1, 'Case path is required')
    .describe('Case file path, relative to the cases directory or absolute'),

  setup: z.boolean()
    .default(true)
    .describe('Set up the system after loading'),

  no_output: z.boolean()
    .default(true)
    .describe('Suppress engine output files')
}).strict();

export type LoadCaseInput = z.infer<typeof LoadCaseInputSchema>;

export const SessionInputSchema = z.object({
  session_id: SessionId
}).strict();

export type SessionInput = z.infer<typeof SessionInputSchema>;

export const ListSessionsInputSchema = z.object({}).strict();

export type ListSessionsInput = z.infer<typeof ListSessionsInputSchema>;

// ============================================
// Analysis Tools
// ============================================

/**
 * Run power flow
 */
export const RunPowerFlowInputSchema = z.object({
  session_id: SessionId,

  tol: z.number()
    .positive()
    .optional()
    .describe('Convergence tolerance'),

  max_iter: z.number()
    .int()
    .positive()
    .optional()
    .describe('Maximum Newton iterations'),

  method: z.string()
    .optional()
    .describe('Solver method, e.g. "NR"')
}).strict();

export type RunPowerFlowInput = z.infer<typeof RunPowerFlowInputSchema>;

/**
 * Run time-domain simulation
 */
export const RunTimeDomainInputSchema = z.object({
  session_id: SessionId,

  tf: z.number()
    .positive()
    .optional()
    .describe('Simulation end time in seconds (default: 20)'),

  tstep: z.number()
    .positive()
    .optional()
    .describe('Integration time step in seconds'),

  tol: z.number()
    .positive()
    .optional()
    .describe('Integration tolerance'),

  method: z.string()
    .optional()
    .describe('Integration method, e.g. "trapezoid"')
}).strict();

export type RunTimeDomainInput = z.infer<typeof RunTimeDomainInputSchema>;

// ============================================
// Result Tools
// ============================================

/**
 * Read time-domain results
 */
export const GetTdsResultsInputSchema = z.object({
  session_id: SessionId,

  variables: z.array(z.string().min(1))
    .optional()
    .describe('Variable names to return (default: all state variables)'),

  max_points: z.number()
    .int()
    .positive()
    .optional()
    .describe('Maximum points per series before downsampling (default: 10000)')
}).strict();

export type GetTdsResultsInput = z.infer<typeof GetTdsResultsInputSchema>;
