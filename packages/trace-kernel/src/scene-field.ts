/**
 * SceneField — the distance query a march runs against.
 *
 * A set of circle obstacles plus one viewport. Read-only after
 * construction: obstacle changes build a new field (withCircles).
 */

import type { Vec2 } from './vec2.js';
import { type Circle, type ViewportBounds, CircleObstacle, ViewportEdge } from './sdf2d.js';

/** Which primitive is closest. index = -1 means the viewport edge. */
export interface NearestObstacle {
  distance: number;
  index: number;
}

export interface SceneReadback {
  name: string;
  circleCount: number;
  viewport: ViewportBounds;
  size: Vec2;
  center: Vec2;
}

export class SceneField {
  private readonly obstacles: readonly CircleObstacle[];
  private readonly edge: ViewportEdge;

  constructor(circles: readonly Circle[], viewport: ViewportBounds) {
    this.edge = new ViewportEdge(viewport);
    this.obstacles = circles.map((c) => new CircleObstacle(c));
  }

  /** Copies; changing them does not move the field's obstacles. */
  get circles(): Circle[] {
    return this.obstacles.map((o) => o.toCircle());
  }

  get viewport(): ViewportBounds {
    return this.edge.bounds2d();
  }

  get name(): string {
    return `scene(${this.obstacles.length} circles, ${this.edge.name})`;
  }

  /** Minimum signed distance to any circle or to the viewport edge. */
  nearestDistance(p: Vec2): number {
    const [x, y] = p;
    let d = this.edge.evaluate(x, y);
    for (const o of this.obstacles) {
      d = Math.min(d, o.evaluate(x, y));
    }
    return d;
  }

  /** Like nearestDistance, but also reports which primitive won. */
  nearestObstacle(p: Vec2): NearestObstacle {
    const [x, y] = p;
    let best: NearestObstacle = { distance: this.edge.evaluate(x, y), index: -1 };
    this.obstacles.forEach((o, i) => {
      const dc = o.evaluate(x, y);
      if (dc < best.distance) best = { distance: dc, index: i };
    });
    return best;
  }

  /** Build a new field with a different obstacle set on the same viewport. */
  withCircles(circles: readonly Circle[]): SceneField {
    return new SceneField(circles, this.edge.bounds2d());
  }

  readback(): SceneReadback {
    const vp = this.edge.readback2d();
    return {
      name: this.name,
      circleCount: this.obstacles.length,
      viewport: vp.bounds,
      size: vp.size,
      center: vp.center,
    };
  }
}
