import { describe, expect, it, vi } from 'vitest';

import type { LabelGeometry } from '../model/types';
import {
  createVisibilityTracker,
  evaluateVisibility,
  isCenterVisible,
  isFullyOutside
} from '../model/visibility';
import type { TrackedLabel } from '../model/visibility';

const viewport = { scrollOffset: 100, viewportHeight: 200 };

describe('evaluateVisibility', () => {
  it('counts a center exactly on the bottom edge as visible', () => {
    const geometry = { top: 280, height: 40 };
    expect(isCenterVisible(viewport, geometry)).toBe(true);
    expect(evaluateVisibility(viewport, geometry, false)).toBe('reveal');
    expect(evaluateVisibility(viewport, geometry, true)).toBeNull();
  });

  it('keeps a label in view while it straddles the bottom edge', () => {
    const geometry = { top: 290, height: 40 };
    expect(isCenterVisible(viewport, geometry)).toBe(false);
    expect(isFullyOutside(viewport, geometry)).toBe(false);
    expect(evaluateVisibility(viewport, geometry, true)).toBeNull();
  });

  it('rescrambles only once the top passes the bottom edge', () => {
    const geometry = { top: 301, height: 40 };
    expect(evaluateVisibility(viewport, geometry, true)).toBe('rescramble');
    expect(evaluateVisibility(viewport, geometry, false)).toBeNull();
  });

  it('applies the same rule above the viewport', () => {
    expect(evaluateVisibility(viewport, { top: 60, height: 60 }, true)).toBeNull();
    expect(evaluateVisibility(viewport, { top: 40, height: 40 }, true)).toBe('rescramble');
  });
});

function fakeLabel(initial: LabelGeometry | null): TrackedLabel & { geometry: LabelGeometry | null } {
  let inView = false;
  const label = {
    geometry: initial,
    getGeometry: (): LabelGeometry | null => label.geometry,
    isInView: () => inView,
    setInView: vi.fn((next: boolean) => {
      inView = next;
    }),
    startDecryption: vi.fn(),
    resetScramble: vi.fn()
  };
  return label;
}

describe('createVisibilityTracker', () => {
  it('reveals on entry once and rescrambles after leaving fully', () => {
    const tracker = createVisibilityTracker();
    const label = fakeLabel({ top: 150, height: 40 });
    tracker.track(label);

    tracker.update(viewport);
    tracker.update(viewport);
    expect(label.startDecryption).toHaveBeenCalledTimes(1);
    expect(label.isInView()).toBe(true);

    tracker.update({ scrollOffset: 180, viewportHeight: 200 });
    expect(label.resetScramble).not.toHaveBeenCalled();

    tracker.update({ scrollOffset: 200, viewportHeight: 200 });
    expect(label.resetScramble).toHaveBeenCalledTimes(1);
    expect(label.isInView()).toBe(false);
  });

  it('skips labels without layout and stops tracking on request', () => {
    const tracker = createVisibilityTracker();
    const unlaid = fakeLabel(null);
    const laid = fakeLabel({ top: 120, height: 20 });
    tracker.track(unlaid);
    const untrack = tracker.track(laid);

    untrack();
    tracker.update(viewport);

    expect(unlaid.startDecryption).not.toHaveBeenCalled();
    expect(laid.startDecryption).not.toHaveBeenCalled();
  });
});
