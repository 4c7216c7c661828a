import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createIsotopeControl, createIsotopeState, setIsotopeValue, stepIsotope } from '../model/isotope';
import { createTimerScheduler } from '../model/scheduler';

describe('isotope decay', () => {
  it('reports the volume only when the displayed value drops', () => {
    const first = stepIsotope(createIsotopeState());
    expect(first.state).toEqual({ trueValue: 99.75, displayed: 99 });
    expect(first.volume).toBe(99);

    const second = stepIsotope(first.state);
    expect(second.state.trueValue).toBe(99.5);
    expect(second.volume).toBeNull();
  });

  it('decays to zero and stays there', () => {
    let state = createIsotopeState(50);
    for (let tick = 0; tick < 200; tick += 1) {
      state = stepIsotope(state).state;
    }
    expect(state).toEqual({ trueValue: 0, displayed: 0 });

    const after = stepIsotope(state);
    expect(after.state.trueValue).toBe(0);
    expect(after.volume).toBeNull();
  });

  it('rounds and clamps a value picked by the user', () => {
    expect(setIsotopeValue(42.4)).toEqual({ state: { trueValue: 42, displayed: 42 }, volume: 42 });
    expect(setIsotopeValue(150).volume).toBe(100);
    expect(setIsotopeValue(-3).volume).toBe(0);
  });
});

describe('createIsotopeControl', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('loses one volume step every four ticks', () => {
    const control = createIsotopeControl({ scheduler: createTimerScheduler() });
    const listener = vi.fn();
    control.onVolume(listener);
    expect(control.getVolume()).toBe(100);

    vi.advanceTimersByTime(1000);

    expect(listener.mock.calls).toEqual([[99], [98], [97], [96], [95]]);
    expect(control.getState().trueValue).toBe(95);
    control.dispose();
  });

  it('resumes decaying from a value the user sets', () => {
    const control = createIsotopeControl({ scheduler: createTimerScheduler() });
    const listener = vi.fn();
    control.onVolume(listener);

    expect(control.setValue(60)).toEqual({ ok: true });
    vi.advanceTimersByTime(50);

    expect(listener.mock.calls).toEqual([[60], [59]]);
    expect(control.setValue(Number.POSITIVE_INFINITY).ok).toBe(false);

    control.dispose();
    expect(vi.getTimerCount()).toBe(0);
  });
});
