import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  colorDistance,
  colorVolume,
  createColorControl,
  driftTarget,
  resetChallenge,
  setChannel,
  toHex
} from '../model/colorMatch';
import { createTimerScheduler } from '../model/scheduler';
import type { ColorState } from '../model/types';

const gray = (value: number) => ({ r: value, g: value, b: value });

describe('color matching model', () => {
  it('scores identical colors at full volume and opposite corners at zero', () => {
    expect(colorVolume(gray(80), gray(80))).toBe(100);
    expect(colorVolume(gray(0), gray(255))).toBe(0);
  });

  it('truncates the similarity score', () => {
    const target = gray(100);
    const current = { r: 100, g: 100, b: 0 };
    expect(colorDistance(target, current)).toBe(100);
    expect(colorVolume(target, current)).toBe(77);
  });

  it('drifts each target channel by at most two and stays in range', () => {
    const state: ColorState = { target: { r: 0, g: 100, b: 255 }, current: gray(128) };

    expect(driftTarget(state, () => 0).target).toEqual({ r: 0, g: 98, b: 253 });
    expect(driftTarget(state, () => 0.999).target).toEqual({ r: 2, g: 102, b: 255 });
    expect(driftTarget(state, () => 0).current).toEqual(gray(128));
  });

  it('clamps and rounds slider values', () => {
    const state: ColorState = { target: gray(50), current: gray(128) };

    expect(setChannel(state, 'r', 300).current.r).toBe(255);
    expect(setChannel(state, 'g', -5).current.g).toBe(0);
    expect(setChannel(state, 'b', 12.6).current).toEqual({ r: 128, g: 128, b: 13 });
  });

  it('resets targets into the middle band and sliders to mid-gray', () => {
    const state: ColorState = { target: gray(0), current: gray(0) };

    expect(resetChallenge(state, () => 0)).toEqual({ target: gray(50), current: gray(128) });
    expect(resetChallenge(state, () => 0.999999).target).toEqual(gray(200));
  });

  it('formats swatch colors as hex', () => {
    expect(toHex({ r: 255, g: 0, b: 16 })).toBe('#ff0010');
  });
});

describe('createColorControl', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('emits a volume for the fresh challenge and after every slider change', () => {
    const control = createColorControl({ scheduler: createTimerScheduler(), rng: () => 0 });
    expect(control.getVolume()).toBe(69);

    expect(control.setChannel('r', 50)).toEqual({ ok: true });
    expect(control.getVolume()).toBe(75);

    control.dispose();
  });

  it('refuses a non-finite slider value', () => {
    const control = createColorControl({ scheduler: createTimerScheduler(), rng: () => 0 });
    const result = control.setChannel('g', Number.NaN);

    expect(result.ok).toBe(false);
    expect(control.getState().current.g).toBe(128);
    control.dispose();
  });

  it('emits exactly once per reset', () => {
    const control = createColorControl({ scheduler: createTimerScheduler(), rng: () => 0 });
    const listener = vi.fn();
    control.onVolume(listener);

    control.resetChallenge();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(69);
    control.dispose();
  });

  it('drifts the target on every tick', () => {
    const control = createColorControl({ scheduler: createTimerScheduler(), rng: () => 0 });
    control.setChannel('r', 50);

    vi.advanceTimersByTime(150);

    expect(control.getState().target).toEqual(gray(48));
    expect(control.getVolume()).toBe(74);

    control.dispose();
    expect(vi.getTimerCount()).toBe(0);
  });
});
