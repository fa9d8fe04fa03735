/**
 * Shared Types for SignalRank
 *
 * Core type definitions used across all packages.
 */

// ===========================================
// Outcomes
// ===========================================

/** Successful result of a core operation */
export interface Success<T> {
  success: true;
  data: T;
}

/** Typed failure of a core operation */
export interface Failure<E> {
  success: false;
  error: E;
}

/**
 * Result of a request-level operation. Per-request failures are values,
 * never exceptions thrown across the agent boundary.
 */
export type Outcome<T, E> = Success<T> | Failure<E>;

export function succeed<T>(data: T): Success<T> {
  return { success: true, data };
}

export function fail<E>(error: E): Failure<E> {
  return { success: false, error };
}

// ===========================================
// Analysis Types
// ===========================================

/**
 * How an analysis result was produced:
 * - model: the model backend answered (possibly blended with heuristics)
 * - heuristic: model not requested or not configured
 * - degraded: model requested but failed, heuristic used instead
 */
export type AnalysisMode = 'model' | 'heuristic' | 'degraded';

/** Score in [0,1] with the evidence that produced it */
export interface Analysis {
  score: number;
  evidence: string[];
}

/** Clamp a value to [0,1]; NaN becomes 0 */
export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
