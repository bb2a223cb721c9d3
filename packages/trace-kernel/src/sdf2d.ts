/**
 * SDF2D — 2D signed distance fields for the tracing scene.
 *
 * Two primitives make up every scene:
 *   circle obstacles (solid inside) and the viewport edge
 *   (an inverted box: the inside is open, the edges are solid).
 *
 * SceneField takes the minimum over all of them.
 */

import { type Vec2, length, sub, min2, isFiniteVec } from './vec2.js';

// ─── Data ──────────────────────────────────────────────────────

export interface BoundingBox2D { min: Vec2; max: Vec2; }

export interface Circle {
  center: Vec2;
  radius: number;
}

/** Traversable rectangle. Its edges stop a ray from the inside. */
export type ViewportBounds = BoundingBox2D;

// ─── Distance functions ────────────────────────────────────────

/** Signed distance to the circle boundary. Negative inside. */
export function distanceToCircle(p: Vec2, c: Circle): number {
  return length(sub(c.center, p)) - c.radius;
}

/**
 * Distance to the nearest viewport edge. Positive strictly inside,
 * zero on an edge, negative outside.
 *
 * Not a true Euclidean rectangle distance outside the box: near the
 * corners it under-estimates (no diagonal term).
 */
export function distanceToViewportEdge(p: Vec2, v: ViewportBounds): number {
  const d = min2(sub(p, v.min), sub(v.max, p));
  return Math.min(d[0], d[1]);
}

// ─── Validation ────────────────────────────────────────────────

export function assertCircle(c: Circle): void {
  if (!isFiniteVec(c.center)) {
    throw new Error(`Circle center must be finite, got [${c.center.join(', ')}]`);
  }
  if (!Number.isFinite(c.radius) || c.radius < 0) {
    throw new Error(`Circle radius must be a non-negative number, got ${c.radius}`);
  }
}

export function assertViewport(v: ViewportBounds): void {
  if (!isFiniteVec(v.min) || !isFiniteVec(v.max)) {
    throw new Error('Viewport bounds must be finite');
  }
  if (v.min[0] > v.max[0] || v.min[1] > v.max[1]) {
    throw new Error(
      `Viewport is inverted: min [${v.min.join(', ')}] exceeds max [${v.max.join(', ')}]`
    );
  }
}

// ─── Base class ────────────────────────────────────────────────

export abstract class SDF2D {
  /** Evaluate signed distance at point (x, y). Negative = inside. */
  abstract evaluate(x: number, y: number): number;

  /** Human-readable name for readback. */
  abstract get name(): string;

  /** Axis-aligned bounding box of the 2D shape. */
  abstract bounds2d(): BoundingBox2D;

  /** Test if point is inside (or on boundary of) the solid region. */
  contains(x: number, y: number): boolean {
    return this.evaluate(x, y) <= 0;
  }

  /** Structured readback for tool callers. */
  readback2d(): { name: string; bounds: BoundingBox2D; size: Vec2; center: Vec2 } {
    const b = this.bounds2d();
    return {
      name: this.name,
      bounds: b,
      size: [b.max[0] - b.min[0], b.max[1] - b.min[1]],
      center: [(b.min[0] + b.max[0]) / 2, (b.min[1] + b.max[1]) / 2],
    };
  }
}

// ─── CircleObstacle — exact ────────────────────────────────────

export class CircleObstacle extends SDF2D {
  private readonly circle: Circle;

  constructor(circle: Circle) {
    super();
    assertCircle(circle);
    this.circle = { center: [circle.center[0], circle.center[1]], radius: circle.radius };
  }

  /** A copy of the wrapped circle. */
  toCircle(): Circle {
    const [cx, cy] = this.circle.center;
    return { center: [cx, cy], radius: this.circle.radius };
  }

  get name(): string {
    const [cx, cy] = this.circle.center;
    return `circle(${cx}, ${cy}, r=${this.circle.radius})`;
  }

  evaluate(x: number, y: number): number {
    return distanceToCircle([x, y], this.circle);
  }

  bounds2d(): BoundingBox2D {
    const [cx, cy] = this.circle.center;
    const r = this.circle.radius;
    return { min: [cx - r, cy - r], max: [cx + r, cy + r] };
  }
}

// ─── ViewportEdge — inverted box ───────────────────────────────

/**
 * The viewport as an obstacle. Solid region is everything outside
 * the rectangle, so `contains` is true on and beyond the edges.
 */
export class ViewportEdge extends SDF2D {
  private readonly bounds: ViewportBounds;

  constructor(bounds: ViewportBounds) {
    super();
    assertViewport(bounds);
    this.bounds = {
      min: [bounds.min[0], bounds.min[1]],
      max: [bounds.max[0], bounds.max[1]],
    };
  }

  get name(): string {
    const { min, max } = this.bounds;
    return `viewport([${min[0]}, ${min[1]}] → [${max[0]}, ${max[1]}])`;
  }

  evaluate(x: number, y: number): number {
    return distanceToViewportEdge([x, y], this.bounds);
  }

  bounds2d(): BoundingBox2D {
    const { min, max } = this.bounds;
    return { min: [min[0], min[1]], max: [max[0], max[1]] };
  }
}
