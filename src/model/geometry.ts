import type { Size, Vec2 } from './types';

export const NEAR_FLOOR_PX = 1;

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

export function subtract(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, factor: number): Vec2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}

/** Shortest signed difference between two angles, in [-π, π]. */
export function wrapAngle(delta: number): number {
  let wrapped = delta;
  if (wrapped > Math.PI) {
    wrapped -= 2 * Math.PI;
  }
  if (wrapped < -Math.PI) {
    wrapped += 2 * Math.PI;
  }
  return wrapped;
}

export function centroid(points: Vec2[]): Vec2 {
  if (points.length === 0) {
    return { x: 0, y: 0 };
  }

  let sumX = 0;
  let sumY = 0;
  for (const point of points) {
    sumX += point.x;
    sumY += point.y;
  }
  return {
    x: sumX / points.length,
    y: sumY / points.length
  };
}

export function center(size: Size): Vec2 {
  return {
    x: size.width / 2,
    y: size.height / 2
  };
}

/** Clamps a point into a box inset by `radius` on each side. */
export function clampToBounds(point: Vec2, bounds: Size, radius: number): Vec2 {
  const maxX = Math.max(radius, bounds.width - radius);
  const maxY = Math.max(radius, bounds.height - radius);
  return {
    x: clamp(point.x, radius, maxX),
    y: clamp(point.y, radius, maxY)
  };
}

export function floorY(bounds: Size, radius: number): number {
  return Math.max(radius, bounds.height - radius);
}

export function isNearFloor(point: Vec2, bounds: Size, radius: number): boolean {
  return point.y >= floorY(bounds, radius) - NEAR_FLOOR_PX;
}
