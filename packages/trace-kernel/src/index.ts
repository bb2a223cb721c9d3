// Public API
export { SceneField } from './scene-field.js';
export type { NearestObstacle, SceneReadback } from './scene-field.js';
export type { Vec2 } from './vec2.js';
export { vec2, fromAngle, normalize, length, distance } from './vec2.js';

// Primitives
export { SDF2D, CircleObstacle, ViewportEdge, distanceToCircle, distanceToViewportEdge } from './sdf2d.js';
export type { Circle, ViewportBounds, BoundingBox2D } from './sdf2d.js';

// Constructors
export { circle, viewport, viewportFromSize, scene } from './api.js';

// Marching
export { march, trace, marchAngle } from './march.js';
export type { MarchSample, MarchResult, MarchStop, TraceResult } from './march.js';

// Configuration
export { DEFAULT_EPSILON, DEFAULT_MAX_STEPS, resolveMarchOptions } from './config.js';
export type { MarchOptions, ResolvedMarchOptions } from './config.js';

// Scene helpers
export { boundingCircle, boundingCircleFromBox } from './bounding-circle.js';
