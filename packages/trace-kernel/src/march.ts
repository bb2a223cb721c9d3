/**
 * Marcher — 2D sphere tracing against a SceneField.
 *
 * Each step advances by the measured clearance, the largest step that
 * cannot cross a surface. Far from geometry the steps are long; near
 * it they shrink until clearance drops below epsilon.
 *
 *   point = origin, clearance = field(origin)
 *   while clearance >= epsilon and steps < maxSteps:
 *     emit (point, clearance)
 *     point += clearance * direction
 *     clearance = field(point)
 *
 * The sample whose clearance fell below epsilon is never emitted.
 */

import { type Vec2, add, scale, isUnit, isFiniteVec, fromAngle } from './vec2.js';
import type { SceneField } from './scene-field.js';
import { type MarchOptions, resolveMarchOptions } from './config.js';

// ─── Types ──────────────────────────────────────────────────────

export interface MarchSample {
  point: Vec2;
  /** Distance to the nearest obstacle when the sample was taken. */
  clearance: number;
}

/** Ordered samples, origin first. Empty when the origin is blocked. */
export type MarchResult = MarchSample[];

export type MarchStop = 'surface' | 'step-limit' | 'blocked';

export interface TraceResult {
  samples: MarchResult;
  stop: MarchStop;
  steps: number;
  /** Sum of sample clearances: how far the march got from the origin. */
  travelled: number;
  /** Where the march stopped (not itself a sample). */
  end: Vec2;
  endClearance: number;
}

// ─── Core loop ──────────────────────────────────────────────────

function run(
  origin: Vec2,
  direction: Vec2,
  field: SceneField,
  options: MarchOptions | undefined,
): TraceResult {
  if (!isFiniteVec(origin)) {
    throw new Error(`march: origin must be finite, got [${origin.join(', ')}]`);
  }
  if (!isUnit(direction)) {
    throw new Error(
      `march: direction must be a unit vector, got [${direction.join(', ')}]. Normalize it first.`
    );
  }
  const { epsilon, maxSteps } = resolveMarchOptions(options);

  const samples: MarchResult = [];
  let point: Vec2 = [origin[0], origin[1]];
  let clearance = field.nearestDistance(point);
  let travelled = 0;
  let stop: MarchStop = 'surface';

  while (clearance >= epsilon) {
    if (samples.length === maxSteps) {
      stop = 'step-limit';
      break;
    }
    samples.push({ point, clearance });
    travelled += clearance;
    point = add(point, scale(direction, clearance));
    clearance = field.nearestDistance(point);
  }

  if (samples.length === 0) stop = 'blocked';

  return {
    samples,
    stop,
    steps: samples.length,
    travelled,
    end: point,
    endClearance: clearance,
  };
}

// ─── Public entry points ────────────────────────────────────────

/**
 * Sphere-trace from origin along a unit direction.
 *
 * Throws on a non-unit direction or bad options. A blocked origin or a
 * degenerate viewport is not an error: the result is simply empty.
 * A result of exactly maxSteps samples means the safety bound cut it short.
 */
export function march(
  origin: Vec2,
  direction: Vec2,
  field: SceneField,
  options?: MarchOptions,
): MarchResult {
  return run(origin, direction, field, options).samples;
}

/** Same march, with stop reason and end point. */
export function trace(
  origin: Vec2,
  direction: Vec2,
  field: SceneField,
  options?: MarchOptions,
): TraceResult {
  return run(origin, direction, field, options);
}

/** March along a sweep angle (radians from +X toward +Y). */
export function marchAngle(
  origin: Vec2,
  angle: number,
  field: SceneField,
  options?: MarchOptions,
): MarchResult {
  if (!Number.isFinite(angle)) throw new Error(`marchAngle: angle must be finite, got ${angle}`);
  return march(origin, fromAngle(angle), field, options);
}
