/**
 * Bounding circles for arbitrary shapes, so they can join a scene
 * as circle obstacles.
 */

import { type Vec2, distance, isFiniteVec } from './vec2.js';
import type { Circle } from './sdf2d.js';

/**
 * Circle centered on the vertex average, reaching the farthest vertex.
 * Not the minimal enclosing circle, but it always encloses every vertex.
 */
export function boundingCircle(vertices: readonly Vec2[]): Circle {
  if (vertices.length === 0) {
    throw new Error('boundingCircle requires at least one vertex');
  }
  let sx = 0, sy = 0;
  for (const v of vertices) {
    if (!isFiniteVec(v)) {
      throw new Error(`boundingCircle: vertex must be finite, got [${v.join(', ')}]`);
    }
    sx += v[0];
    sy += v[1];
  }
  const center: Vec2 = [sx / vertices.length, sy / vertices.length];

  let radius = 0;
  for (const v of vertices) {
    radius = Math.max(radius, distance(center, v));
  }
  return { center, radius };
}

/** Circle through the four corners of an axis-aligned box. */
export function boundingCircleFromBox(min: Vec2, max: Vec2): Circle {
  if (min[0] > max[0] || min[1] > max[1]) {
    throw new Error(`boundingCircleFromBox: min [${min.join(', ')}] exceeds max [${max.join(', ')}]`);
  }
  const center: Vec2 = [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2];
  return { center, radius: distance(center, max) };
}
