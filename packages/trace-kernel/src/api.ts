/**
 * Fluent API — the construction surface for callers and the MCP tools.
 *
 *   const field = scene([circle(60, 50, 10)], viewport(0, 0, 100, 100));
 *   march([10, 50], [1, 0], field);
 */

import { SceneField } from './scene-field.js';
import type { Circle, ViewportBounds } from './sdf2d.js';

/** Circle obstacle at (cx, cy). */
export function circle(cx: number, cy: number, radius: number): Circle {
  return { center: [cx, cy], radius };
}

/** Viewport from its two corners. */
export function viewport(minX: number, minY: number, maxX: number, maxY: number): ViewportBounds {
  return { min: [minX, minY], max: [maxX, maxY] };
}

/** Viewport anchored at the origin, as a screen or canvas would be. */
export function viewportFromSize(width: number, height: number): ViewportBounds {
  return viewport(0, 0, width, height);
}

export function scene(circles: readonly Circle[], bounds: ViewportBounds): SceneField {
  return new SceneField(circles, bounds);
}
