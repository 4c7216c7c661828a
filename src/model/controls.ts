import { createBounceControl } from './bounce';
import type { BounceControl } from './bounce';
import { createCircleControl } from './circleGrader';
import type { CircleControl } from './circleGrader';
import { createColorControl } from './colorMatch';
import type { ColorControl } from './colorMatch';
import { createIsotopeControl } from './isotope';
import type { IsotopeControl } from './isotope';
import { createMemoryControl } from './memory';
import type { MemoryControl } from './memory';
import { defaultRng } from './random';
import { createTimerScheduler } from './scheduler';
import { createSlingshotControl } from './slingshot';
import type { SlingshotControl } from './slingshot';
import { createTiltControl } from './tilt';
import type { TiltControl } from './tilt';
import type { Rng, TickScheduler } from './types';

export type ControlSet = {
  gravity: TiltControl;
  color: ColorControl;
  slingshot: SlingshotControl;
  isotope: IsotopeControl;
  circle: CircleControl;
  bounce: BounceControl;
  memory: MemoryControl;
};

export type ControlSetDeps = {
  scheduler?: TickScheduler;
  rng?: Rng;
};

/** One long-lived instance per widget type; they persist across navigation. */
export function createControlSet({
  scheduler = createTimerScheduler(),
  rng = defaultRng
}: ControlSetDeps = {}): ControlSet {
  return {
    gravity: createTiltControl({ scheduler }),
    color: createColorControl({ scheduler, rng }),
    slingshot: createSlingshotControl({ scheduler }),
    isotope: createIsotopeControl({ scheduler }),
    circle: createCircleControl({ scheduler }),
    bounce: createBounceControl({ scheduler }),
    memory: createMemoryControl({ scheduler, rng })
  };
}

export function disposeControlSet(controls: ControlSet): void {
  for (const control of Object.values(controls)) {
    control.dispose();
  }
}
