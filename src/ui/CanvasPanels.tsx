import { useCallback } from 'react';

import { ControlCanvas } from '../canvas/ControlCanvas';
import type { BounceControl } from '../model/bounce';
import type { CircleControl } from '../model/circleGrader';
import { renderBall, renderSlingshot, renderStroke, renderTilt } from '../model/render';
import type { SlingshotControl } from '../model/slingshot';
import type { TiltControl } from '../model/tilt';
import type { BoundedControl, Size } from '../model/types';
import { useStoreVersion } from './hooks';

function useBoundsSync<S>(control: BoundedControl<S>): (size: Size) => void {
  return useCallback(
    (size: Size) => {
      control.setBounds(size);
    },
    [control]
  );
}

export function GravityPanel({ control }: { control: TiltControl }): JSX.Element {
  useStoreVersion(control);
  const onResize = useBoundsSync(control);
  return (
    <ControlCanvas
      control={control}
      state={control.getState()}
      draw={renderTilt}
      testId="gravity-canvas"
      onResize={onResize}
    />
  );
}

export function SlingshotPanel({ control }: { control: SlingshotControl }): JSX.Element {
  useStoreVersion(control);
  const onResize = useBoundsSync(control);
  return (
    <ControlCanvas
      control={control}
      state={control.getState()}
      draw={renderSlingshot}
      testId="slingshot-canvas"
      onResize={onResize}
    />
  );
}

export function CirclePanel({ control }: { control: CircleControl }): JSX.Element {
  useStoreVersion(control);
  const state = control.getState();
  return (
    <div className="circle-panel">
      <ControlCanvas control={control} state={state} draw={renderStroke} testId="circle-canvas" />
      <p data-testid="circle-perfection">
        {state.result ? `Perfection: ${Math.round(state.result.perfection * 100)}%` : 'Draw a circle'}
      </p>
    </div>
  );
}

export function BouncePanel({ control }: { control: BounceControl }): JSX.Element {
  useStoreVersion(control);
  const onResize = useBoundsSync(control);
  const state = control.getState();
  return (
    <div className="bounce-panel">
      <ControlCanvas control={control} state={state} draw={renderBall} testId="bounce-canvas" onResize={onResize} />
      <p data-testid="bounce-count">Bounces: {state.bounceCount}</p>
    </div>
  );
}
