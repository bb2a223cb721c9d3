/**
 * MCP Tool Registrations — 12 tools wrapping the tracing kernel.
 *
 * Scene tools return { scene_id, readback }, trace tools return
 * { trace_id, scene_id, readback } so the caller always knows the
 * current state after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  scene, viewport, circle, boundingCircle,
  trace, fromAngle, normalize, length,
  DEFAULT_EPSILON, DEFAULT_MAX_STEPS,
  type Vec2,
} from '@sdf-trace/kernel';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as registry from './registry.js';

function json(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}

/** Exactly one of angle or direction; a direction is normalized here. */
function resolveDirection(
  angleDeg: number | undefined,
  dx: number | undefined,
  dy: number | undefined,
): Vec2 {
  const hasVector = dx !== undefined || dy !== undefined;
  if (angleDeg !== undefined && hasVector) {
    throw new Error('Give either angle_deg or direction_x/direction_y, not both.');
  }
  if (angleDeg !== undefined) {
    return fromAngle((angleDeg * Math.PI) / 180);
  }
  if (dx === undefined || dy === undefined) {
    throw new Error('A ray needs angle_deg, or both direction_x and direction_y.');
  }
  if (length([dx, dy]) === 0) {
    throw new Error('Direction must be non-zero.');
  }
  return normalize([dx, dy]);
}

export function registerTools(server: McpServer): void {

  // ─── Scenes (4) ─────────────────────────────────────────────

  server.tool(
    'create_scene',
    'Create an empty scene bounded by a viewport rectangle. Rays are stopped by the viewport edges from the inside.',
    {
      min_x: z.number().describe('Viewport left edge'),
      min_y: z.number().describe('Viewport bottom edge'),
      max_x: z.number().describe('Viewport right edge'),
      max_y: z.number().describe('Viewport top edge'),
      name: z.string().optional().describe('Optional name for the scene (letters, digits, hyphens, underscores only)'),
    },
    async ({ min_x, min_y, max_x, max_y, name }) => {
      const field = scene([], viewport(min_x, min_y, max_x, max_y));
      return json(registry.createScene(field, name));
    }
  );

  server.tool(
    'add_circle',
    'Add a circle obstacle to a scene. Existing traces of the scene are discarded.',
    {
      scene: z.string().describe('ID of the scene'),
      center_x: z.number().describe('Circle center X'),
      center_y: z.number().describe('Circle center Y'),
      radius: z.number().nonnegative().describe('Circle radius'),
    },
    async ({ scene: sceneId, center_x, center_y, radius }) => {
      const entry = registry.getScene(sceneId);
      const field = entry.field.withCircles([...entry.field.circles, circle(center_x, center_y, radius)]);
      return json(registry.replaceScene(entry.id, field));
    }
  );

  server.tool(
    'add_polygon_obstacle',
    'Add a polygon to a scene as its bounding circle (centered on the vertex average, reaching the farthest vertex).',
    {
      scene: z.string().describe('ID of the scene'),
      vertices: z.array(z.tuple([z.number(), z.number()])).min(1).describe('Polygon vertices as [x, y] pairs'),
    },
    async ({ scene: sceneId, vertices }) => {
      const entry = registry.getScene(sceneId);
      const bound = boundingCircle(vertices);
      const field = entry.field.withCircles([...entry.field.circles, bound]);
      return json({ ...registry.replaceScene(entry.id, field), added: bound });
    }
  );

  server.tool(
    'clear_obstacles',
    'Remove every obstacle from a scene, keeping its viewport.',
    {
      scene: z.string().describe('ID of the scene'),
    },
    async ({ scene: sceneId }) => {
      const entry = registry.getScene(sceneId);
      return json(registry.replaceScene(entry.id, entry.field.withCircles([])));
    }
  );

  // ─── Queries (1) ────────────────────────────────────────────

  server.tool(
    'query_distance',
    'Signed distance from a point to the nearest obstacle or viewport edge. Negative means inside an obstacle or outside the viewport.',
    {
      scene: z.string().describe('ID of the scene'),
      x: z.number().describe('Point X'),
      y: z.number().describe('Point Y'),
    },
    async ({ scene: sceneId, x, y }) => {
      const entry = registry.getScene(sceneId);
      const nearest = entry.field.nearestObstacle([x, y]);
      const result = {
        scene_id: entry.id,
        point: [x, y],
        distance: nearest.distance,
        nearest: nearest.index < 0 ? 'viewport' : `circle_${nearest.index}`,
        circle: nearest.index < 0 ? undefined : entry.field.circles[nearest.index],
      };
      return json(result);
    }
  );

  // ─── Marching (3) ───────────────────────────────────────────

  server.tool(
    'march_ray',
    'Sphere-trace a ray from an origin until it grazes an obstacle or the viewport edge. Give angle_deg, or a direction vector (normalized for you).',
    {
      scene: z.string().describe('ID of the scene'),
      origin_x: z.number().describe('Ray origin X'),
      origin_y: z.number().describe('Ray origin Y'),
      angle_deg: z.number().optional().describe('Sweep angle in degrees, from +X toward +Y'),
      direction_x: z.number().optional().describe('Direction X (use with direction_y instead of angle_deg)'),
      direction_y: z.number().optional().describe('Direction Y (use with direction_x instead of angle_deg)'),
      epsilon: z.number().positive().optional().describe(`Clearance that ends the march (default ${DEFAULT_EPSILON})`),
      max_steps: z.number().int().positive().optional().describe(`Safety bound on steps (default ${DEFAULT_MAX_STEPS})`),
      name: z.string().optional().describe('Optional name for the trace (letters, digits, hyphens, underscores only)'),
    },
    async ({ scene: sceneId, origin_x, origin_y, angle_deg, direction_x, direction_y, epsilon, max_steps, name }) => {
      const entry = registry.getScene(sceneId);
      const origin: Vec2 = [origin_x, origin_y];
      const direction = resolveDirection(angle_deg, direction_x, direction_y);
      const eps = epsilon ?? DEFAULT_EPSILON;
      const maxSteps = max_steps ?? DEFAULT_MAX_STEPS;
      const result = trace(origin, direction, entry.field, { epsilon: eps, maxSteps });
      return json(registry.createTrace({
        scene_id: entry.id,
        origin,
        direction,
        epsilon: eps,
        max_steps: maxSteps,
        result,
      }, name));
    }
  );

  server.tool(
    'get_trace',
    'Return every sample of a trace: points in march order with their clearance radii.',
    {
      trace: z.string().describe('ID of the trace'),
    },
    async ({ trace: traceId }) => {
      const entry = registry.getTrace(traceId);
      return json({
        trace_id: entry.id,
        scene_id: entry.scene_id,
        stop: entry.result.stop,
        samples: entry.result.samples,
        end: entry.result.end,
      });
    }
  );

  server.tool(
    'export_trace',
    'Write a trace and its scene as JSON to a file, for rendering elsewhere.',
    {
      trace: z.string().describe('ID of the trace to export'),
    },
    async ({ trace: traceId }) => {
      const entry = registry.getTrace(traceId);
      const field = registry.getScene(entry.scene_id).field;
      const doc = {
        scene: { viewport: field.viewport, circles: field.circles },
        origin: entry.origin,
        direction: entry.direction,
        epsilon: entry.epsilon,
        max_steps: entry.max_steps,
        ...entry.result,
      };
      const text = JSON.stringify(doc, null, 2);

      // Write to safe output directory
      const exportDir = path.join(process.env.TMPDIR ?? '/tmp', 'sdf-trace');
      fs.mkdirSync(exportDir, { recursive: true });
      const safeId = entry.id.replace(/[^a-zA-Z0-9_-]/g, '_');
      const filePath = path.join(exportDir, `${safeId}-${Date.now()}.json`);
      fs.writeFileSync(filePath, text);

      return json({
        trace_id: entry.id,
        type: 'trace_export',
        file_path: filePath,
        file_size_bytes: Buffer.byteLength(text),
        sample_count: entry.result.samples.length,
      });
    }
  );

  // ─── Session (4) ─────────────────────────────────────────────

  server.tool(
    'list_scenes',
    'List all scenes with their viewport and obstacle count.',
    {},
    async () => {
      const scenes = registry.listScenes();
      return json({ count: scenes.length, scenes });
    }
  );

  server.tool(
    'delete_scene',
    'Remove a scene and all of its traces.',
    {
      scene: z.string().describe('ID of scene to delete'),
    },
    async ({ scene: sceneId }) => {
      registry.removeScene(sceneId);
      return json({ deleted: sceneId, remaining: registry.listScenes().length });
    }
  );

  server.tool(
    'list_traces',
    'List all traces with their stop reason, step count and end point.',
    {},
    async () => {
      const traces = registry.listTraces();
      return json({ count: traces.length, traces });
    }
  );

  server.tool(
    'delete_trace',
    'Remove a trace.',
    {
      trace: z.string().describe('ID of trace to delete'),
    },
    async ({ trace: traceId }) => {
      registry.removeTrace(traceId);
      return json({ deleted: traceId, remaining: registry.listTraces().length });
    }
  );
}
