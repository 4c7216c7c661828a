import { clamp } from './geometry';
import { defaultRng, randomInt } from './random';
import { createTimerScheduler } from './scheduler';
import { clampVolume, createChangeNotifier, createVolumeChannel } from './volume';
import type {
  ColorChannel,
  ColorOptions,
  ColorState,
  Result,
  Rgb,
  Rng,
  TickScheduler,
  VolumeSource
} from './types';

export const COLOR_CHANNELS: readonly ColorChannel[] = ['r', 'g', 'b'];
export const CHANNEL_MAX = 255;
export const MAX_COLOR_DISTANCE = Math.sqrt(CHANNEL_MAX * CHANNEL_MAX * 3);

export const DEFAULT_COLOR_OPTIONS: ColorOptions = {
  tickMs: 150,
  driftStep: 2,
  resetMin: 50,
  resetMax: 200,
  resetChannelValue: 128
};

export function colorDistance(a: Rgb, b: Rgb): number {
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return Math.sqrt(dr * dr + dg * dg + db * db);
}

export function colorVolume(target: Rgb, current: Rgb): number {
  const similarity = 1 - colorDistance(target, current) / MAX_COLOR_DISTANCE;
  return clampVolume(Math.floor(100 * similarity));
}

export function clampChannel(value: number): number {
  return clamp(Math.round(value), 0, CHANNEL_MAX);
}

export function toHex(color: Rgb): string {
  return `#${COLOR_CHANNELS.map((channel) => clampChannel(color[channel]).toString(16).padStart(2, '0')).join('')}`;
}

export function driftTarget(
  state: ColorState,
  rng: Rng,
  options: ColorOptions = DEFAULT_COLOR_OPTIONS
): ColorState {
  const step = (value: number): number =>
    clampChannel(value + randomInt(rng, -options.driftStep, options.driftStep));
  return {
    ...state,
    target: {
      r: step(state.target.r),
      g: step(state.target.g),
      b: step(state.target.b)
    }
  };
}

export function setChannel(state: ColorState, channel: ColorChannel, value: number): ColorState {
  return {
    ...state,
    current: { ...state.current, [channel]: clampChannel(value) }
  };
}

export function resetChallenge(
  state: ColorState,
  rng: Rng,
  options: ColorOptions = DEFAULT_COLOR_OPTIONS
): ColorState {
  const draw = (): number => randomInt(rng, options.resetMin, options.resetMax);
  const mid = clampChannel(options.resetChannelValue);
  return {
    ...state,
    target: { r: draw(), g: draw(), b: draw() },
    current: { r: mid, g: mid, b: mid }
  };
}

export type ColorControlOptions = {
  options?: Partial<ColorOptions>;
  scheduler?: TickScheduler;
  rng?: Rng;
};

export interface ColorControl extends VolumeSource<ColorState> {
  setChannel(channel: ColorChannel, value: number): Result;
  resetChallenge(): void;
}

export function createColorControl({
  options: overrides,
  scheduler = createTimerScheduler(),
  rng = defaultRng
}: ColorControlOptions = {}): ColorControl {
  const options: ColorOptions = { ...DEFAULT_COLOR_OPTIONS, ...overrides };
  const changes = createChangeNotifier();
  const volume = createVolumeChannel();
  let state = resetChallenge(
    { target: { r: 0, g: 0, b: 0 }, current: { r: 0, g: 0, b: 0 } },
    rng,
    options
  );
  volume.emit(colorVolume(state.target, state.current));

  const publish = (next: ColorState): void => {
    state = next;
    volume.emit(colorVolume(state.target, state.current));
    changes.notify();
  };

  const stopDrift = scheduler.every(options.tickMs, () => {
    publish(driftTarget(state, rng, options));
  });

  return {
    getState: () => state,
    getVolume: volume.getLatest,
    subscribe: changes.subscribe,
    onVolume: volume.onVolume,
    setChannel(channel: ColorChannel, value: number): Result {
      if (!Number.isFinite(value)) {
        return { ok: false, reason: `Channel ${channel} needs a finite value.` };
      }
      publish(setChannel(state, channel, value));
      return { ok: true };
    },
    resetChallenge(): void {
      publish(resetChallenge(state, rng, options));
    },
    dispose(): void {
      stopDrift();
    }
  };
}
