import { center, clampToBounds, isNearFloor, length, scale, subtract } from './geometry';
import { createTimerScheduler, createTimerSlot } from './scheduler';
import { MAX_VOLUME, createChangeNotifier, createVolumeChannel } from './volume';
import type {
  BallState,
  BoundedControl,
  BounceOptions,
  PointerInput,
  Result,
  Size,
  TickScheduler,
  Transition,
  Vec2
} from './types';

export const DEFAULT_BOUNCE_OPTIONS: BounceOptions = {
  tickMs: 16,
  historySize: 5,
  flingScale: 0.2,
  gravity: 0.5,
  restitution: -0.8,
  bounceThreshold: 1.5,
  restSpeed: 0.1,
  ballRadius: 15
};

export const DEFAULT_BOUNCE_SIZE: Size = { width: 400, height: 300 };

export function createBallState(bounds: Size = DEFAULT_BOUNCE_SIZE): BallState {
  return {
    pos: center(bounds),
    vel: { x: 0, y: 0 },
    bounceCount: 0,
    phase: 'idle',
    history: [],
    bounds
  };
}

export function bounceVolume(bounceCount: number): number {
  return Math.min(MAX_VOLUME, bounceCount);
}

export function flingVelocity(history: Vec2[], flingScale: number): Vec2 {
  if (history.length < 2) {
    return { x: 0, y: 0 };
  }
  return scale(subtract(history[history.length - 1], history[0]), flingScale);
}

export function applyBallPointer(
  state: BallState,
  input: PointerInput,
  options: BounceOptions = DEFAULT_BOUNCE_OPTIONS
): Transition<BallState> {
  const pos = clampToBounds(input.pos, state.bounds, options.ballRadius);

  switch (input.kind) {
    case 'down':
      return {
        state: { ...state, pos, vel: { x: 0, y: 0 }, bounceCount: 0, phase: 'held', history: [pos] },
        volume: 0
      };
    case 'move':
      if (state.phase !== 'held') {
        return { state, volume: null };
      }
      return {
        state: { ...state, pos, history: [...state.history, pos].slice(-options.historySize) },
        volume: null
      };
    case 'up':
      if (state.phase !== 'held') {
        return { state, volume: null };
      }
      return {
        state: {
          ...state,
          phase: 'flying',
          vel: flingVelocity(state.history, options.flingScale),
          history: []
        },
        volume: null
      };
  }
}

export function stepBounce(
  state: BallState,
  options: BounceOptions = DEFAULT_BOUNCE_OPTIONS
): Transition<BallState> {
  if (state.phase !== 'flying') {
    return { state, volume: null };
  }

  const vel = { x: state.vel.x, y: state.vel.y + options.gravity };
  const moved = { x: state.pos.x + vel.x, y: state.pos.y + vel.y };
  const pos = clampToBounds(moved, state.bounds, options.ballRadius);
  let bounceCount = state.bounceCount;

  if (pos.x !== moved.x) {
    if (Math.abs(vel.x) > options.bounceThreshold) {
      bounceCount += 1;
    }
    vel.x *= options.restitution;
  }
  if (pos.y !== moved.y) {
    if (Math.abs(vel.y) > options.bounceThreshold) {
      bounceCount += 1;
    }
    vel.y *= options.restitution;
    // A floor rebound no stronger than one tick of gravity is contact, not a bounce.
    if (moved.y > pos.y && Math.abs(vel.y) <= options.gravity) {
      vel.y = 0;
    }
  }

  const resting = length(vel) < options.restSpeed && isNearFloor(pos, state.bounds, options.ballRadius);
  const next: BallState = {
    ...state,
    pos,
    vel: resting ? { x: 0, y: 0 } : vel,
    bounceCount,
    phase: resting ? 'idle' : 'flying'
  };

  return {
    state: next,
    volume: bounceCount !== state.bounceCount ? bounceVolume(bounceCount) : null
  };
}

export type BounceControlOptions = {
  options?: Partial<BounceOptions>;
  scheduler?: TickScheduler;
  size?: Size;
};

export type BounceControl = BoundedControl<BallState>;

export function createBounceControl({
  options: overrides,
  scheduler = createTimerScheduler(),
  size = DEFAULT_BOUNCE_SIZE
}: BounceControlOptions = {}): BounceControl {
  const options: BounceOptions = { ...DEFAULT_BOUNCE_OPTIONS, ...overrides };
  const changes = createChangeNotifier();
  const volume = createVolumeChannel();
  const animation = createTimerSlot();
  let state = createBallState(size);

  const apply = (next: Transition<BallState>): void => {
    state = next.state;
    if (next.volume !== null) {
      volume.emit(next.volume);
    }
    changes.notify();
  };

  const onTick = (): void => {
    const next = stepBounce(state, options);
    if (next.state.phase !== 'flying') {
      animation.stop();
    }
    apply(next);
  };

  return {
    getState: () => state,
    getVolume: volume.getLatest,
    subscribe: changes.subscribe,
    onVolume: volume.onVolume,
    handlePointer(input: PointerInput): Result {
      if (input.kind === 'down') {
        animation.stop();
      }

      const next = applyBallPointer(state, input, options);
      if (next.state === state) {
        return { ok: false, reason: 'The ball is not being held.' };
      }

      if (next.state.phase === 'flying') {
        animation.start(() => scheduler.every(options.tickMs, onTick));
      }
      apply(next);
      return { ok: true };
    },
    setBounds(bounds: Size): void {
      state = { ...state, bounds, pos: clampToBounds(state.pos, bounds, options.ballRadius) };
      changes.notify();
    },
    dispose(): void {
      animation.stop();
    }
  };
}
