import { clamp } from './geometry';
import { createTimerScheduler } from './scheduler';
import { MAX_VOLUME, MIN_VOLUME, createChangeNotifier, createVolumeChannel } from './volume';
import type { IsotopeOptions, IsotopeState, Result, TickScheduler, Transition, VolumeSource } from './types';

export const DEFAULT_ISOTOPE_OPTIONS: IsotopeOptions = {
  tickMs: 50,
  decayPerTick: 0.25,
  initialValue: 100
};

export function createIsotopeState(value: number = DEFAULT_ISOTOPE_OPTIONS.initialValue): IsotopeState {
  const trueValue = clamp(value, MIN_VOLUME, MAX_VOLUME);
  return { trueValue, displayed: Math.floor(trueValue) };
}

/** Linear decay; the volume is reported only when the floored value moves. */
export function stepIsotope(
  state: IsotopeState,
  options: IsotopeOptions = DEFAULT_ISOTOPE_OPTIONS
): Transition<IsotopeState> {
  const trueValue = Math.max(0, state.trueValue - options.decayPerTick);
  const displayed = Math.floor(trueValue);
  if (displayed === state.displayed) {
    return { state: { trueValue, displayed }, volume: null };
  }
  return { state: { trueValue, displayed }, volume: displayed };
}

export function setIsotopeValue(value: number): Transition<IsotopeState> {
  const next = clamp(Math.round(value), MIN_VOLUME, MAX_VOLUME);
  return { state: { trueValue: next, displayed: next }, volume: next };
}

export type IsotopeControlOptions = {
  options?: Partial<IsotopeOptions>;
  scheduler?: TickScheduler;
};

export interface IsotopeControl extends VolumeSource<IsotopeState> {
  setValue(value: number): Result;
}

export function createIsotopeControl({
  options: overrides,
  scheduler = createTimerScheduler()
}: IsotopeControlOptions = {}): IsotopeControl {
  const options: IsotopeOptions = { ...DEFAULT_ISOTOPE_OPTIONS, ...overrides };
  const changes = createChangeNotifier();
  let state = createIsotopeState(options.initialValue);
  const volume = createVolumeChannel(state.displayed);

  const apply = (next: Transition<IsotopeState>): void => {
    const changed = next.state.trueValue !== state.trueValue;
    state = next.state;
    if (next.volume !== null) {
      volume.emit(next.volume);
    }
    if (changed || next.volume !== null) {
      changes.notify();
    }
  };

  const stopDecay = scheduler.every(options.tickMs, () => {
    apply(stepIsotope(state, options));
  });

  return {
    getState: () => state,
    getVolume: volume.getLatest,
    subscribe: changes.subscribe,
    onVolume: volume.onVolume,
    setValue(value: number): Result {
      if (!Number.isFinite(value)) {
        return { ok: false, reason: 'Isotope value must be a finite number.' };
      }
      apply(setIsotopeValue(value));
      return { ok: true };
    },
    dispose(): void {
      stopDecay();
    }
  };
}
