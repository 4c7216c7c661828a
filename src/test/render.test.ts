import { describe, expect, it, vi } from 'vitest';

import { createBallState } from '../model/bounce';
import { renderBall, renderStroke, renderTilt } from '../model/render';
import { createTiltState } from '../model/tilt';

function context(): CanvasRenderingContext2D {
  const ctx = document.createElement('canvas').getContext('2d');
  if (!ctx) {
    throw new Error('2d context unavailable');
  }
  return ctx;
}

describe('render', () => {
  it('draws the bouncy ball at its position', () => {
    const ctx = context();
    const arc = vi.spyOn(ctx, 'arc');

    renderBall(ctx, 400, 300, { ...createBallState(), pos: { x: 120, y: 80 } });

    expect(arc).toHaveBeenCalledTimes(1);
    expect(arc).toHaveBeenCalledWith(120, 80, 15, 0, Math.PI * 2);
  });

  it('places the tilt ball along the bar', () => {
    const ctx = context();
    const arc = vi.spyOn(ctx, 'arc');

    renderTilt(ctx, 300, 300, { ...createTiltState(), ballPos: 0.5 });

    expect(arc).toHaveBeenCalledWith(210, 150, 15, 0, Math.PI * 2);
  });

  it('adds the dashed guide only for a graded stroke', () => {
    const ctx = context();
    const setLineDash = vi.spyOn(ctx, 'setLineDash');
    const points = [
      { x: 0, y: 0 },
      { x: 10, y: 0 }
    ];

    renderStroke(ctx, 100, 100, { points, drawing: true, result: null });
    expect(setLineDash).not.toHaveBeenCalled();

    renderStroke(ctx, 100, 100, {
      points,
      drawing: false,
      result: { centroid: { x: 5, y: 0 }, meanRadius: 5, stdDev: 0, perfection: 1, volume: 100 }
    });
    expect(setLineDash).toHaveBeenNthCalledWith(1, [6, 4]);
    expect(setLineDash).toHaveBeenNthCalledWith(2, []);
  });
});
