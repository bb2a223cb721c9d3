/**
 * Performance gates — timed assertions that catch algorithmic regressions.
 *
 * The budget is far above expected time, so a failure means the per-step
 * cost changed order, not that the machine is slow.
 *
 * If a gate fails: profile the function, don't just bump the budget.
 */

import { describe, it, expect } from 'vitest';
import { circle, viewport, scene, fromAngle, trace } from '../src/index.js';
import type { Circle } from '../src/index.js';

/** Run fn, return [result, elapsed_ms]. */
function timed<T>(fn: () => T): [T, number] {
  const t0 = performance.now();
  const result = fn();
  return [result, performance.now() - t0];
}

/** Deterministic grid of obstacles, clear of the center. */
function gridScene(n: number) {
  const circles: Circle[] = [];
  const spacing = 1000 / (n + 1);
  for (let i = 1; i <= n; i++) {
    for (let j = 1; j <= n; j++) {
      const x = i * spacing;
      const y = j * spacing;
      if (Math.abs(x - 500) < 60 && Math.abs(y - 500) < 60) continue;
      circles.push(circle(x, y, spacing / 5));
    }
  }
  return scene(circles, viewport(0, 0, 1000, 1000));
}

describe('performance gates', () => {
  it('360 rays through an obstacle grid within 500ms', () => {
    const field = gridScene(8);
    const [steps, ms] = timed(() => {
      let total = 0;
      for (let deg = 0; deg < 360; deg++) {
        total += trace([500, 500], fromAngle((deg * Math.PI) / 180), field).steps;
      }
      return total;
    });
    expect(steps).toBeGreaterThan(360);
    expect(ms, `sweep took ${ms.toFixed(0)}ms`).toBeLessThan(500);
  });
});
