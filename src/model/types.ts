export type ControlId = 'gravity' | 'color' | 'slingshot' | 'isotope' | 'circle' | 'bounce' | 'memory';

export type Vec2 = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type Rng = () => number;

export type Cancel = () => void;

export interface TickScheduler {
  every(intervalMs: number, callback: () => void): Cancel;
  after(delayMs: number, callback: () => void): Cancel;
}

export type PointerKind = 'down' | 'move' | 'up';

export type PointerInput = {
  kind: PointerKind;
  pos: Vec2;
};

export type Result = {
  ok: boolean;
  reason?: string;
};

export type VolumeListener = (volume: number) => void;

export interface VolumeSource<S> {
  getState(): S;
  getVolume(): number | null;
  subscribe(listener: () => void): () => void;
  onVolume(listener: VolumeListener): () => void;
  dispose(): void;
}

export interface PointerControl<S> extends VolumeSource<S> {
  handlePointer(input: PointerInput): Result;
}

export interface BoundedControl<S> extends PointerControl<S> {
  setBounds(size: Size): void;
}

export type ScrambleState = {
  originalText: string;
  charset: string;
  revealedCount: number;
  animating: boolean;
  inView: boolean;
  text: string;
};

export type Viewport = {
  scrollOffset: number;
  viewportHeight: number;
};

export type LabelGeometry = {
  top: number;
  height: number;
};

export type VisibilityAction = 'reveal' | 'rescramble';

export type TiltState = {
  angle: number;
  targetAngle: number;
  ballPos: number;
  ballVelocity: number;
  dragging: boolean;
};

export type TiltOptions = {
  tickMs: number;
  smoothing: number;
  gravity: number;
  friction: number;
  bounceLoss: number;
  initialVolume: number;
};

export type ColorChannel = 'r' | 'g' | 'b';

export type Rgb = Record<ColorChannel, number>;

export type ColorState = {
  target: Rgb;
  current: Rgb;
};

export type ColorOptions = {
  tickMs: number;
  driftStep: number;
  resetMin: number;
  resetMax: number;
  resetChannelValue: number;
};

export type SlingshotPhase = 'idle' | 'dragging' | 'firing';

export type SlingshotState = {
  anchor: Vec2;
  dragPoint: Vec2 | null;
  projectile: Vec2;
  velocity: Vec2;
  phase: SlingshotPhase;
  bounds: Size;
};

export type SlingshotOptions = {
  tickMs: number;
  maxPull: number;
  launchStrength: number;
  gravity: number;
  wallBounce: number;
  restSpeed: number;
  projectileRadius: number;
};

export type IsotopeState = {
  trueValue: number;
  displayed: number;
};

export type IsotopeOptions = {
  tickMs: number;
  decayPerTick: number;
  initialValue: number;
};

export type CircleGrade = {
  centroid: Vec2;
  meanRadius: number;
  stdDev: number;
  perfection: number;
  volume: number;
};

export type StrokeState = {
  points: Vec2[];
  drawing: boolean;
  result: CircleGrade | null;
};

export type CircleOptions = {
  minPoints: number;
  clearDelayMs: number;
};

export type BallPhase = 'idle' | 'held' | 'flying';

export type BallState = {
  pos: Vec2;
  vel: Vec2;
  bounceCount: number;
  phase: BallPhase;
  history: Vec2[];
  bounds: Size;
};

export type BounceOptions = {
  tickMs: number;
  historySize: number;
  flingScale: number;
  gravity: number;
  restitution: number;
  bounceThreshold: number;
  restSpeed: number;
  ballRadius: number;
};

export type MemoryCard = {
  symbol: string;
  faceUp: boolean;
  matched: boolean;
};

export type MemoryBoard = {
  cards: MemoryCard[];
  firstSelected: number | null;
  secondSelected: number | null;
  matchedPairs: number;
};

export type MemoryOptions = {
  mismatchDelayMs: number;
};

export type Transition<S> = {
  state: S;
  volume: number | null;
};
