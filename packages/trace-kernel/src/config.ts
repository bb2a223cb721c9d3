/**
 * March defaults. Callers override per call through MarchOptions.
 */

/** Clearance below which a march stops. */
export const DEFAULT_EPSILON = 0.01;

/**
 * Safety bound on steps. Large enough for spans of a few thousand
 * units grazing obstacles at the default epsilon.
 */
export const DEFAULT_MAX_STEPS = 512;

export interface MarchOptions {
  epsilon?: number;
  maxSteps?: number;
}

export interface ResolvedMarchOptions {
  epsilon: number;
  maxSteps: number;
}

export function resolveMarchOptions(options: MarchOptions = {}): ResolvedMarchOptions {
  const epsilon = options.epsilon ?? DEFAULT_EPSILON;
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isFinite(epsilon) || epsilon <= 0) {
    throw new Error(`epsilon must be a positive number, got ${epsilon}`);
  }
  if (!Number.isInteger(maxSteps) || maxSteps < 1) {
    throw new Error(`maxSteps must be a positive integer, got ${maxSteps}`);
  }
  return { epsilon, maxSteps };
}
