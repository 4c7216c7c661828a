import { centroid, clamp, distance } from './geometry';
import { createTimerScheduler, createTimerSlot } from './scheduler';
import { MAX_VOLUME, MIN_VOLUME, createChangeNotifier, createVolumeChannel } from './volume';
import type {
  CircleGrade,
  CircleOptions,
  PointerControl,
  PointerInput,
  Result,
  StrokeState,
  TickScheduler,
  Transition,
  Vec2
} from './types';

export const DEFAULT_CIRCLE_OPTIONS: CircleOptions = {
  minPoints: 10,
  clearDelayMs: 1000
};

const PERFECTION_GAIN = 150;
const PERFECTION_OFFSET = -50;

export function createStrokeState(): StrokeState {
  return { points: [], drawing: false, result: null };
}

export function perfectionVolume(perfection: number): number {
  return clamp(Math.round(perfection * PERFECTION_GAIN + PERFECTION_OFFSET), MIN_VOLUME, MAX_VOLUME);
}

/**
 * Grades how round a stroke is from the spread of its points' distances to
 * their centroid. Returns null for strokes too short to judge.
 */
export function gradeStroke(
  points: Vec2[],
  minPoints: number = DEFAULT_CIRCLE_OPTIONS.minPoints
): CircleGrade | null {
  if (points.length < minPoints) {
    return null;
  }

  const mid = centroid(points);
  const radii = points.map((point) => distance(point, mid));
  const meanRadius = radii.reduce((sum, r) => sum + r, 0) / radii.length;
  if (meanRadius === 0) {
    return { centroid: mid, meanRadius: 0, stdDev: 0, perfection: 0, volume: 0 };
  }

  const variance = radii.reduce((sum, r) => sum + (r - meanRadius) * (r - meanRadius), 0) / radii.length;
  const stdDev = Math.sqrt(variance);
  const perfection = 1 - stdDev / meanRadius;
  return {
    centroid: mid,
    meanRadius,
    stdDev,
    perfection,
    volume: perfectionVolume(perfection)
  };
}

export function applyStrokePointer(
  state: StrokeState,
  input: PointerInput,
  options: CircleOptions = DEFAULT_CIRCLE_OPTIONS
): Transition<StrokeState> {
  switch (input.kind) {
    case 'down':
      return { state: { points: [{ ...input.pos }], drawing: true, result: null }, volume: null };
    case 'move':
      if (!state.drawing) {
        return { state, volume: null };
      }
      return { state: { ...state, points: [...state.points, { ...input.pos }] }, volume: null };
    case 'up': {
      if (!state.drawing) {
        return { state, volume: null };
      }
      const grade = gradeStroke(state.points, options.minPoints);
      if (!grade) {
        return { state: createStrokeState(), volume: null };
      }
      return { state: { ...state, drawing: false, result: grade }, volume: grade.volume };
    }
  }
}

export type CircleControlOptions = {
  options?: Partial<CircleOptions>;
  scheduler?: TickScheduler;
};

export type CircleControl = PointerControl<StrokeState>;

export function createCircleControl({
  options: overrides,
  scheduler = createTimerScheduler()
}: CircleControlOptions = {}): CircleControl {
  const options: CircleOptions = { ...DEFAULT_CIRCLE_OPTIONS, ...overrides };
  const changes = createChangeNotifier();
  const volume = createVolumeChannel();
  const pendingClear = createTimerSlot();
  let state = createStrokeState();

  const clearStroke = (): void => {
    pendingClear.stop();
    state = { ...state, points: [] };
    changes.notify();
  };

  return {
    getState: () => state,
    getVolume: volume.getLatest,
    subscribe: changes.subscribe,
    onVolume: volume.onVolume,
    handlePointer(input: PointerInput): Result {
      if (input.kind === 'down') {
        pendingClear.stop();
      }

      const next = applyStrokePointer(state, input, options);
      if (next.state === state) {
        return { ok: false, reason: 'No stroke in progress.' };
      }

      state = next.state;
      if (next.volume !== null) {
        volume.emit(next.volume);
        pendingClear.start(() => scheduler.after(options.clearDelayMs, clearStroke));
      }
      changes.notify();
      return { ok: true };
    },
    dispose(): void {
      pendingClear.stop();
    }
  };
}
