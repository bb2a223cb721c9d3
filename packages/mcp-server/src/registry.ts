/**
 * Scene Registry — in-memory named scene and trace store.
 *
 * Every mutating MCP tool stores its result here and returns
 * a structured readback so the caller always knows the current state.
 */

import type { SceneField, SceneReadback, TraceResult, Vec2, MarchStop } from '@sdf-trace/kernel';

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function assertName(kind: string, name: string | undefined): void {
  if (name !== undefined && !NAME_PATTERN.test(name)) {
    throw new Error(
      `Invalid ${kind} name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
}

// ─── Scene registry ─────────────────────────────────────────────

export interface SceneEntry {
  id: string;
  field: SceneField;
}

export interface SceneResult {
  scene_id: string;
  readback: SceneReadback;
}

let nextSceneId = 1;
const scenes = new Map<string, SceneEntry>();

/** Store a new scene and return its ID + readback. */
export function createScene(field: SceneField, name?: string): SceneResult {
  assertName('scene', name);
  let id = name ?? `scene_${nextSceneId++}`;
  while (!name && scenes.has(id)) {
    // Auto-generated collision with a user-chosen name — bump
    id = `scene_${nextSceneId++}`;
  }
  if (name && scenes.has(id)) {
    throw new Error(`Scene "${id}" already exists. Use a different name or delete the existing scene.`);
  }
  scenes.set(id, { id, field });
  return { scene_id: id, readback: field.readback() };
}

/** Retrieve a scene or throw a clear error. */
export function getScene(id: string): SceneEntry {
  const entry = scenes.get(id);
  if (!entry) {
    const available = [...scenes.keys()];
    throw new Error(
      `Scene "${id}" not found. Available scenes: [${available.join(', ')}]`
    );
  }
  return entry;
}

/**
 * Swap in a rebuilt field. Traces cast against the old field are
 * dropped, since they no longer describe this scene.
 */
export function replaceScene(id: string, field: SceneField): SceneResult {
  getScene(id);
  scenes.set(id, { id, field });
  dropTracesFor(id);
  return { scene_id: id, readback: field.readback() };
}

/** Remove a scene and every trace cast in it. */
export function removeScene(id: string): void {
  if (!scenes.has(id)) {
    throw new Error(`Scene "${id}" not found — cannot delete.`);
  }
  scenes.delete(id);
  dropTracesFor(id);
}

export function listScenes(): SceneResult[] {
  return [...scenes.values()].map((entry) => ({
    scene_id: entry.id,
    readback: entry.field.readback(),
  }));
}

// ─── Trace registry ─────────────────────────────────────────────

export interface TraceEntry {
  id: string;
  scene_id: string;
  origin: Vec2;
  direction: Vec2;
  epsilon: number;
  max_steps: number;
  result: TraceResult;
}

export interface TraceSummary {
  trace_id: string;
  scene_id: string;
  readback: {
    origin: Vec2;
    direction: Vec2;
    stop: MarchStop;
    steps: number;
    travelled: number;
    end: Vec2;
    end_clearance: number;
    epsilon: number;
    max_steps: number;
  };
}

let nextTraceId = 1;
const traces = new Map<string, TraceEntry>();

function round6(n: number): number {
  return Math.round(n * 1e6) / 1e6;
}

function summarize(entry: TraceEntry): TraceSummary {
  const r = entry.result;
  return {
    trace_id: entry.id,
    scene_id: entry.scene_id,
    readback: {
      origin: entry.origin,
      direction: [round6(entry.direction[0]), round6(entry.direction[1])],
      stop: r.stop,
      steps: r.steps,
      travelled: round6(r.travelled),
      end: [round6(r.end[0]), round6(r.end[1])],
      end_clearance: round6(r.endClearance),
      epsilon: entry.epsilon,
      max_steps: entry.max_steps,
    },
  };
}

export function createTrace(trace: Omit<TraceEntry, 'id'>, name?: string): TraceSummary {
  assertName('trace', name);
  getScene(trace.scene_id);
  let id = name ?? `trace_${nextTraceId++}`;
  while (!name && traces.has(id)) {
    id = `trace_${nextTraceId++}`;
  }
  if (name && traces.has(id)) {
    throw new Error(`Trace "${id}" already exists. Use a different name or delete the existing trace.`);
  }
  const entry: TraceEntry = { ...trace, id };
  traces.set(id, entry);
  return summarize(entry);
}

export function getTrace(id: string): TraceEntry {
  const entry = traces.get(id);
  if (!entry) {
    const available = [...traces.keys()];
    throw new Error(`Trace "${id}" not found. Available traces: [${available.join(', ')}]`);
  }
  return entry;
}

export function removeTrace(id: string): void {
  if (!traces.has(id)) {
    throw new Error(`Trace "${id}" not found — cannot delete.`);
  }
  traces.delete(id);
}

export function listTraces(): TraceSummary[] {
  return [...traces.values()].map(summarize);
}

function dropTracesFor(sceneId: string): void {
  for (const [id, entry] of traces) {
    if (entry.scene_id === sceneId) traces.delete(id);
  }
}

/** Clear all scenes and traces (for testing). */
export function clear(): void {
  scenes.clear();
  traces.clear();
  nextSceneId = 1;
  nextTraceId = 1;
}
