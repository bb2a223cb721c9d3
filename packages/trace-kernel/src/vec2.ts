/** Minimal 2D vectors — plain tuples for speed, helpers for clarity. */
export type Vec2 = [number, number];

export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function scale(a: Vec2, s: number): Vec2 {
  return [a[0] * s, a[1] * s];
}

export function length(a: Vec2): number {
  return Math.sqrt(a[0] * a[0] + a[1] * a[1]);
}

export function distance(a: Vec2, b: Vec2): number {
  return length(sub(b, a));
}

export function normalize(a: Vec2): Vec2 {
  const l = length(a);
  return l > 0 ? [a[0] / l, a[1] / l] : [0, 0];
}

export function min2(a: Vec2, b: Vec2): Vec2 {
  return [Math.min(a[0], b[0]), Math.min(a[1], b[1])];
}

/** Unit vector pointing along `radians`, measured from +X toward +Y. */
export function fromAngle(radians: number): Vec2 {
  return [Math.cos(radians), Math.sin(radians)];
}

export function isUnit(a: Vec2, tol = 1e-9): boolean {
  return Math.abs(length(a) - 1) <= tol;
}

export function isFiniteVec(a: Vec2): boolean {
  return Number.isFinite(a[0]) && Number.isFinite(a[1]);
}
