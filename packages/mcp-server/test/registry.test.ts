import { describe, it, expect, beforeEach } from 'vitest';
import { scene, viewport, circle, trace } from '@sdf-trace/kernel';
import * as registry from '../src/registry.js';

function emptyField() {
  return scene([], viewport(0, 0, 100, 100));
}

function storeTrace(sceneId: string, name?: string) {
  const field = registry.getScene(sceneId).field;
  const result = trace([50, 50], [1, 0], field, { epsilon: 0.01, maxSteps: 10 });
  return registry.createTrace({
    scene_id: sceneId,
    origin: [50, 50],
    direction: [1, 0],
    epsilon: 0.01,
    max_steps: 10,
    result,
  }, name);
}

beforeEach(() => {
  registry.clear();
});

describe('scene registry', () => {
  it('auto-assigns sequential ids', () => {
    expect(registry.createScene(emptyField()).scene_id).toBe('scene_1');
    expect(registry.createScene(emptyField()).scene_id).toBe('scene_2');
  });

  it('skips ids taken by a user name', () => {
    registry.createScene(emptyField(), 'scene_1');
    expect(registry.createScene(emptyField()).scene_id).toBe('scene_2');
  });

  it('rejects invalid names', () => {
    expect(() => registry.createScene(emptyField(), 'bad name')).toThrow(/Invalid scene name/);
  });

  it('rejects a duplicate name', () => {
    registry.createScene(emptyField(), 'lab');
    expect(() => registry.createScene(emptyField(), 'lab')).toThrow(/already exists/);
  });

  it('lists available scenes when one is missing', () => {
    registry.createScene(emptyField(), 'lab');
    expect(() => registry.getScene('nope')).toThrow('Scene "nope" not found. Available scenes: [lab]');
  });

  it('returns a readback', () => {
    const res = registry.createScene(emptyField(), 'lab');
    expect(res.readback.circleCount).toBe(0);
    expect(res.readback.size).toEqual([100, 100]);
  });

  it('replaceScene swaps the field', () => {
    registry.createScene(emptyField(), 'lab');
    const field = emptyField().withCircles([circle(50, 50, 5)]);
    expect(registry.replaceScene('lab', field).readback.circleCount).toBe(1);
    expect(registry.getScene('lab').field).toBe(field);
  });

  it('replaceScene throws for an unknown scene', () => {
    expect(() => registry.replaceScene('nope', emptyField())).toThrow(/not found/);
  });
});

describe('trace registry', () => {
  beforeEach(() => {
    registry.createScene(emptyField(), 'lab');
  });

  it('summarizes a trace', () => {
    const summary = storeTrace('lab');
    expect(summary).toEqual({
      trace_id: 'trace_1',
      scene_id: 'lab',
      readback: {
        origin: [50, 50],
        direction: [1, 0],
        stop: 'surface',
        steps: 1,
        travelled: 50,
        end: [100, 50],
        end_clearance: 0,
        epsilon: 0.01,
        max_steps: 10,
      },
    });
  });

  it('requires an existing scene', () => {
    const result = trace([50, 50], [1, 0], emptyField());
    expect(() => registry.createTrace({
      scene_id: 'ghost', origin: [50, 50], direction: [1, 0], epsilon: 0.01, max_steps: 10, result,
    })).toThrow(/Scene "ghost" not found/);
  });

  it('rejects a duplicate trace name', () => {
    storeTrace('lab', 'ray');
    expect(() => storeTrace('lab', 'ray')).toThrow('Trace "ray" already exists');
    expect(registry.listTraces().length).toBe(1);
  });

  it('get and remove', () => {
    storeTrace('lab', 'ray');
    expect(registry.getTrace('ray').result.steps).toBe(1);
    registry.removeTrace('ray');
    expect(() => registry.getTrace('ray')).toThrow(/Trace "ray" not found/);
    expect(() => registry.removeTrace('ray')).toThrow(/cannot delete/);
  });

  it('rebuilding a scene drops its traces', () => {
    storeTrace('lab');
    registry.createScene(emptyField(), 'other');
    storeTrace('other');
    registry.replaceScene('lab', emptyField());
    expect(registry.listTraces().map((t) => t.scene_id)).toEqual(['other']);
  });

  it('deleting a scene drops its traces', () => {
    storeTrace('lab');
    registry.removeScene('lab');
    expect(registry.listTraces()).toEqual([]);
    expect(registry.listScenes()).toEqual([]);
  });
});
