import { center } from './geometry';
import { DEFAULT_BOUNCE_OPTIONS } from './bounce';
import { DEFAULT_SLINGSHOT_OPTIONS } from './slingshot';
import type { BallState, SlingshotState, StrokeState, TiltState } from './types';

export const BACKGROUND_COLOR = '#ffffff';
export const TRACK_COLOR = '#BDBDBD';
export const BALL_COLOR = '#3498DB';
export const BAND_COLOR = '#5d4037';
export const STROKE_COLOR = '#000';
export const GUIDE_COLOR = 'rgba(52, 152, 219, 0.45)';

export const TRACK_WIDTH = 12;
export const TILT_BALL_RADIUS = 15;
const BAND_WIDTH = 4;
const STROKE_WIDTH = 3;

function clear(ctx: CanvasRenderingContext2D, width: number, height: number): void {
  ctx.clearRect(0, 0, width, height);
  ctx.fillStyle = BACKGROUND_COLOR;
  ctx.fillRect(0, 0, width, height);
}

function fillCircle(ctx: CanvasRenderingContext2D, x: number, y: number, radius: number, color: string): void {
  ctx.beginPath();
  ctx.arc(x, y, radius, 0, Math.PI * 2);
  ctx.fillStyle = color;
  ctx.fill();
}

export function renderTilt(ctx: CanvasRenderingContext2D, width: number, height: number, state: TiltState): void {
  clear(ctx, width, height);

  const mid = center({ width, height });
  const radius = Math.min(width, height) * 0.4;
  const cos = Math.cos(state.angle);
  const sin = Math.sin(state.angle);

  ctx.beginPath();
  ctx.moveTo(mid.x + radius * cos, mid.y + radius * sin);
  ctx.lineTo(mid.x - radius * cos, mid.y - radius * sin);
  ctx.strokeStyle = TRACK_COLOR;
  ctx.lineWidth = TRACK_WIDTH;
  ctx.lineCap = 'round';
  ctx.stroke();

  fillCircle(
    ctx,
    mid.x + radius * cos * state.ballPos,
    mid.y + radius * sin * state.ballPos,
    TILT_BALL_RADIUS,
    BALL_COLOR
  );
}

export function renderSlingshot(
  ctx: CanvasRenderingContext2D,
  width: number,
  height: number,
  state: SlingshotState
): void {
  clear(ctx, width, height);

  if (state.phase === 'dragging' && state.dragPoint) {
    ctx.beginPath();
    ctx.moveTo(state.anchor.x, state.anchor.y);
    ctx.lineTo(state.dragPoint.x, state.dragPoint.y);
    ctx.strokeStyle = BAND_COLOR;
    ctx.lineWidth = BAND_WIDTH;
    ctx.stroke();
  }

  fillCircle(ctx, state.anchor.x, state.anchor.y, 4, BAND_COLOR);
  fillCircle(ctx, state.projectile.x, state.projectile.y, DEFAULT_SLINGSHOT_OPTIONS.projectileRadius, BALL_COLOR);
}

export function renderStroke(
  ctx: CanvasRenderingContext2D,
  width: number,
  height: number,
  state: StrokeState
): void {
  clear(ctx, width, height);

  if (state.points.length >= 2) {
    ctx.beginPath();
    ctx.moveTo(state.points[0].x, state.points[0].y);
    for (let i = 1; i < state.points.length; i += 1) {
      ctx.lineTo(state.points[i].x, state.points[i].y);
    }
    ctx.strokeStyle = STROKE_COLOR;
    ctx.lineWidth = STROKE_WIDTH;
    ctx.lineCap = 'round';
    ctx.lineJoin = 'round';
    ctx.stroke();
  }

  if (state.result && state.points.length > 0 && state.result.meanRadius > 0) {
    ctx.beginPath();
    ctx.arc(state.result.centroid.x, state.result.centroid.y, state.result.meanRadius, 0, Math.PI * 2);
    ctx.setLineDash([6, 4]);
    ctx.strokeStyle = GUIDE_COLOR;
    ctx.lineWidth = 2;
    ctx.stroke();
    ctx.setLineDash([]);
  }
}

export function renderBall(
  ctx: CanvasRenderingContext2D,
  width: number,
  height: number,
  state: BallState
): void {
  clear(ctx, width, height);
  fillCircle(ctx, state.pos.x, state.pos.y, DEFAULT_BOUNCE_OPTIONS.ballRadius, BALL_COLOR);
}
