import { clampToBounds, isNearFloor, length, scale, subtract } from './geometry';
import { createTimerScheduler, createTimerSlot } from './scheduler';
import { clampVolume, createChangeNotifier, createVolumeChannel } from './volume';
import type {
  BoundedControl,
  PointerInput,
  Result,
  Size,
  SlingshotOptions,
  SlingshotState,
  TickScheduler,
  Transition,
  Vec2
} from './types';

export const DEFAULT_SLINGSHOT_OPTIONS: SlingshotOptions = {
  tickMs: 16,
  maxPull: 200,
  launchStrength: 0.15,
  gravity: 0.1,
  wallBounce: -0.85,
  restSpeed: 0.5,
  projectileRadius: 10
};

export const DEFAULT_SLINGSHOT_SIZE: Size = { width: 400, height: 300 };

export function anchorFor(bounds: Size): Vec2 {
  return { x: bounds.width / 2, y: bounds.height * 0.75 };
}

export function createSlingshotState(bounds: Size = DEFAULT_SLINGSHOT_SIZE): SlingshotState {
  const anchor = anchorFor(bounds);
  return {
    anchor,
    dragPoint: null,
    projectile: { ...anchor },
    velocity: { x: 0, y: 0 },
    phase: 'idle',
    bounds
  };
}

export function slingshotVolume(
  pullLength: number,
  maxPull: number = DEFAULT_SLINGSHOT_OPTIONS.maxPull
): number {
  return clampVolume(Math.round((100 * pullLength) / maxPull));
}

export function applySlingshotPointer(
  state: SlingshotState,
  input: PointerInput,
  options: SlingshotOptions = DEFAULT_SLINGSHOT_OPTIONS
): Transition<SlingshotState> {
  switch (input.kind) {
    case 'down':
      return {
        state: {
          ...state,
          phase: 'dragging',
          dragPoint: { ...input.pos },
          projectile: { ...input.pos },
          velocity: { x: 0, y: 0 }
        },
        volume: null
      };
    case 'move':
      if (state.phase !== 'dragging') {
        return { state, volume: null };
      }
      return {
        state: { ...state, dragPoint: { ...input.pos }, projectile: { ...input.pos } },
        volume: null
      };
    case 'up': {
      if (state.phase !== 'dragging') {
        return { state, volume: null };
      }

      const release = state.dragPoint ?? input.pos;
      const pullback = subtract(state.anchor, release);
      const pullLength = length(pullback);
      const volume = slingshotVolume(pullLength, options.maxPull);
      if (pullLength === 0) {
        return {
          state: {
            ...state,
            phase: 'idle',
            dragPoint: null,
            projectile: { ...state.anchor },
            velocity: { x: 0, y: 0 }
          },
          volume
        };
      }

      return {
        state: {
          ...state,
          phase: 'firing',
          dragPoint: null,
          projectile: clampToBounds(release, state.bounds, options.projectileRadius),
          velocity: scale(pullback, options.launchStrength)
        },
        volume
      };
    }
  }
}

export function stepSlingshot(
  state: SlingshotState,
  options: SlingshotOptions = DEFAULT_SLINGSHOT_OPTIONS
): SlingshotState {
  if (state.phase !== 'firing') {
    return state;
  }

  const velocity = { x: state.velocity.x, y: state.velocity.y + options.gravity };
  const moved = { x: state.projectile.x + velocity.x, y: state.projectile.y + velocity.y };
  const projectile = clampToBounds(moved, state.bounds, options.projectileRadius);

  if (projectile.x !== moved.x) {
    velocity.x *= options.wallBounce;
  }
  if (projectile.y !== moved.y) {
    velocity.y *= options.wallBounce;
  }

  if (length(velocity) < options.restSpeed && isNearFloor(projectile, state.bounds, options.projectileRadius)) {
    return { ...state, projectile, velocity: { x: 0, y: 0 }, phase: 'idle' };
  }

  return { ...state, projectile, velocity };
}

export function resizeSlingshot(
  state: SlingshotState,
  bounds: Size,
  options: SlingshotOptions = DEFAULT_SLINGSHOT_OPTIONS
): SlingshotState {
  const anchor = anchorFor(bounds);
  const projectile =
    state.phase === 'idle' && state.projectile.x === state.anchor.x && state.projectile.y === state.anchor.y
      ? { ...anchor }
      : clampToBounds(state.projectile, bounds, options.projectileRadius);
  return { ...state, bounds, anchor, projectile };
}

export type SlingshotControlOptions = {
  options?: Partial<SlingshotOptions>;
  scheduler?: TickScheduler;
  size?: Size;
};

export type SlingshotControl = BoundedControl<SlingshotState>;

export function createSlingshotControl({
  options: overrides,
  scheduler = createTimerScheduler(),
  size = DEFAULT_SLINGSHOT_SIZE
}: SlingshotControlOptions = {}): SlingshotControl {
  const options: SlingshotOptions = { ...DEFAULT_SLINGSHOT_OPTIONS, ...overrides };
  const changes = createChangeNotifier();
  const volume = createVolumeChannel();
  const flight = createTimerSlot();
  let state = createSlingshotState(size);

  const onTick = (): void => {
    state = stepSlingshot(state, options);
    if (state.phase !== 'firing') {
      flight.stop();
    }
    changes.notify();
  };

  return {
    getState: () => state,
    getVolume: volume.getLatest,
    subscribe: changes.subscribe,
    onVolume: volume.onVolume,
    handlePointer(input: PointerInput): Result {
      if (input.kind === 'down') {
        flight.stop();
      }

      const next = applySlingshotPointer(state, input, options);
      if (next.state === state) {
        return { ok: false, reason: 'No slingshot drag in progress.' };
      }

      state = next.state;
      if (state.phase === 'firing') {
        flight.start(() => scheduler.every(options.tickMs, onTick));
      }
      if (next.volume !== null) {
        volume.emit(next.volume);
      }
      changes.notify();
      return { ok: true };
    },
    setBounds(bounds: Size): void {
      state = resizeSlingshot(state, bounds, options);
      changes.notify();
    },
    dispose(): void {
      flight.stop();
    }
  };
}
