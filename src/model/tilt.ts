import { center, clamp, wrapAngle } from './geometry';
import { createTimerScheduler } from './scheduler';
import { clampVolume, createChangeNotifier, createVolumeChannel } from './volume';
import type {
  BoundedControl,
  PointerInput,
  Result,
  Size,
  TickScheduler,
  TiltOptions,
  TiltState,
  Transition,
  Vec2
} from './types';

export const DEFAULT_TILT_OPTIONS: TiltOptions = {
  tickMs: 16,
  smoothing: 0.1,
  gravity: 0.007,
  friction: 0.985,
  bounceLoss: -0.4,
  initialVolume: 50
};

export const DEFAULT_TILT_SIZE: Size = { width: 300, height: 300 };

export function createTiltState(): TiltState {
  return {
    angle: 0,
    targetAngle: 0,
    ballPos: 0,
    ballVelocity: 0,
    dragging: false
  };
}

export function tiltVolume(ballPos: number): number {
  return clampVolume(Math.round(50 * (1 - ballPos)));
}

export function targetAngleFromPointer(pivot: Vec2, pointer: Vec2): number | null {
  const dx = pointer.x - pivot.x;
  const dy = pointer.y - pivot.y;
  if (Math.abs(dx) + Math.abs(dy) === 0) {
    return null;
  }
  return Math.atan2(dy, dx);
}

export function stepTilt(
  state: TiltState,
  options: TiltOptions = DEFAULT_TILT_OPTIONS
): Transition<TiltState> {
  const angle = state.angle + wrapAngle(state.targetAngle - state.angle) * options.smoothing;

  let velocity = state.ballVelocity + options.gravity * Math.sin(angle);
  velocity *= options.friction;
  let ballPos = state.ballPos + velocity;

  if (ballPos > 1) {
    ballPos = 1;
    velocity *= options.bounceLoss;
  } else if (ballPos < -1) {
    ballPos = -1;
    velocity *= options.bounceLoss;
  }

  // NaN input would otherwise escape the clamp above.
  ballPos = clamp(Number.isFinite(ballPos) ? ballPos : 0, -1, 1);

  return {
    state: { ...state, angle: wrapAngle(angle), ballPos, ballVelocity: velocity },
    volume: tiltVolume(ballPos)
  };
}

export function applyTiltPointer(state: TiltState, input: PointerInput, pivot: Vec2): TiltState {
  if (input.kind === 'up') {
    return state.dragging ? { ...state, dragging: false } : state;
  }
  if (input.kind === 'move' && !state.dragging) {
    return state;
  }

  const targetAngle = targetAngleFromPointer(pivot, input.pos);
  return {
    ...state,
    dragging: true,
    targetAngle: targetAngle ?? state.targetAngle
  };
}

export type TiltControlOptions = {
  options?: Partial<TiltOptions>;
  scheduler?: TickScheduler;
  size?: Size;
};

export type TiltControl = BoundedControl<TiltState>;

export function createTiltControl({
  options: overrides,
  scheduler = createTimerScheduler(),
  size = DEFAULT_TILT_SIZE
}: TiltControlOptions = {}): TiltControl {
  const options: TiltOptions = { ...DEFAULT_TILT_OPTIONS, ...overrides };
  const changes = createChangeNotifier();
  const volume = createVolumeChannel(options.initialVolume);
  let state = createTiltState();
  let bounds = size;

  const stopTicking = scheduler.every(options.tickMs, () => {
    const next = stepTilt(state, options);
    state = next.state;
    if (next.volume !== null) {
      volume.emit(next.volume);
    }
    changes.notify();
  });

  return {
    getState: () => state,
    getVolume: volume.getLatest,
    subscribe: changes.subscribe,
    onVolume: volume.onVolume,
    handlePointer(input: PointerInput): Result {
      const next = applyTiltPointer(state, input, center(bounds));
      if (next === state) {
        return { ok: false, reason: 'Pointer is not dragging the bar.' };
      }
      state = next;
      changes.notify();
      return { ok: true };
    },
    setBounds(next: Size): void {
      bounds = next;
    },
    dispose(): void {
      stopTicking();
    }
  };
}
