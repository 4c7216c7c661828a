import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createCircleControl, gradeStroke, perfectionVolume } from '../model/circleGrader';
import { createTimerScheduler } from '../model/scheduler';
import type { Vec2 } from '../model/types';

const ring = (count: number, radiusAt: (index: number) => number, origin: Vec2 = { x: 0, y: 0 }): Vec2[] =>
  Array.from({ length: count }, (_, index) => {
    const angle = (index * 2 * Math.PI) / count;
    const radius = radiusAt(index);
    return { x: origin.x + radius * Math.cos(angle), y: origin.y + radius * Math.sin(angle) };
  });

describe('gradeStroke', () => {
  it('does not grade strokes with too few points', () => {
    expect(gradeStroke(ring(9, () => 50))).toBeNull();
  });

  it('gives full volume to a true circle', () => {
    const grade = gradeStroke(ring(12, () => 50));

    expect(grade?.meanRadius).toBeCloseTo(50, 10);
    expect(grade?.perfection).toBeCloseTo(1, 10);
    expect(grade?.volume).toBe(100);
  });

  it('grades the spread of radii', () => {
    const grade = gradeStroke(ring(12, (index) => (index % 2 === 0 ? 40 : 60)));

    expect(grade?.centroid.x).toBeCloseTo(0, 10);
    expect(grade?.centroid.y).toBeCloseTo(0, 10);
    expect(grade?.stdDev).toBeCloseTo(10, 10);
    expect(grade?.perfection).toBeCloseTo(0.8, 10);
    expect(grade?.volume).toBe(70);
  });

  it('scores a stroke of one repeated point at zero', () => {
    const points = Array.from({ length: 10 }, () => ({ x: 5, y: 5 }));
    expect(gradeStroke(points)).toEqual({
      centroid: { x: 5, y: 5 },
      meanRadius: 0,
      stdDev: 0,
      perfection: 0,
      volume: 0
    });
  });

  it('clamps the perfection mapping', () => {
    expect(perfectionVolume(0.2)).toBe(0);
    expect(perfectionVolume(0.5)).toBe(25);
    expect(perfectionVolume(1.2)).toBe(100);
  });
});

describe('createCircleControl', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const draw = (points: Vec2[]) => {
    const control = createCircleControl({ scheduler: createTimerScheduler() });
    const listener = vi.fn();
    control.onVolume(listener);
    const [first, ...rest] = points;
    control.handlePointer({ kind: 'down', pos: first });
    for (const point of rest) {
      control.handlePointer({ kind: 'move', pos: point });
    }
    control.handlePointer({ kind: 'up', pos: points[points.length - 1] });
    return { control, listener };
  };

  it('emits the grade on release and clears the stroke a second later', () => {
    const { control, listener } = draw(ring(12, () => 50, { x: 200, y: 150 }));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(100);
    expect(control.getState().points).toHaveLength(12);

    vi.advanceTimersByTime(999);
    expect(control.getState().points).toHaveLength(12);

    vi.advanceTimersByTime(1);
    expect(control.getState().points).toEqual([]);
    expect(control.getState().result?.volume).toBe(100);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('drops a short stroke without a volume', () => {
    const { control, listener } = draw(ring(4, () => 50));

    expect(listener).not.toHaveBeenCalled();
    expect(control.getState()).toEqual({ points: [], drawing: false, result: null });
    expect(vi.getTimerCount()).toBe(0);
  });

  it('keeps a new stroke from being cleared by the previous timer', () => {
    const { control } = draw(ring(12, () => 50));
    vi.advanceTimersByTime(500);

    control.handlePointer({ kind: 'down', pos: { x: 1, y: 1 } });
    vi.advanceTimersByTime(1000);

    expect(control.getState().points).toEqual([{ x: 1, y: 1 }]);
    expect(control.getState().drawing).toBe(true);
  });
});
