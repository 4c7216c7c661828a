import { useEffect, useRef, useState } from 'react';

import { createScrambleLabel } from '../model/scramble';
import type { ScrambleLabel } from '../model/scramble';
import type { Rng, TickScheduler } from '../model/types';
import type { VisibilityTracker } from '../model/visibility';
import { useStoreVersion } from './hooks';

type ScrambleTextProps = {
  text: string;
  speedMs: number;
  tracker: VisibilityTracker;
  scheduler?: TickScheduler;
  rng?: Rng;
  className?: string;
  testId?: string;
  disabled?: boolean;
  onClick?: () => void;
};

export function ScrambleText({
  text,
  speedMs,
  tracker,
  scheduler,
  rng,
  className,
  testId,
  disabled = false,
  onClick
}: ScrambleTextProps): JSX.Element {
  const elementRef = useRef<HTMLDivElement | null>(null);
  const [label] = useState<ScrambleLabel>(() => createScrambleLabel({ text, speedMs, scheduler, rng }));
  useStoreVersion(label);

  useEffect(() => {
    if (label.getState().originalText !== text) {
      label.setOriginalText(text);
    }
  }, [label, text]);

  useEffect(() => {
    const untrack = tracker.track({
      getGeometry: () => {
        const element = elementRef.current;
        if (!element) {
          return null;
        }
        return { top: element.offsetTop, height: element.offsetHeight };
      },
      isInView: () => label.getState().inView,
      setInView: (inView) => label.setInView(inView),
      startDecryption: () => label.startDecryption(),
      resetScramble: () => label.resetScramble()
    });
    return () => {
      untrack();
      label.dispose();
    };
  }, [label, tracker]);

  const interactive = Boolean(onClick) && !disabled;

  return (
    <div
      ref={elementRef}
      className={className}
      data-testid={testId}
      role={interactive ? 'button' : undefined}
      tabIndex={interactive ? 0 : undefined}
      aria-disabled={disabled || undefined}
      aria-label={text}
      onClick={() => {
        if (interactive) {
          onClick?.();
        }
      }}
      onKeyDown={(event) => {
        if (interactive && (event.key === 'Enter' || event.key === ' ')) {
          event.preventDefault();
          onClick?.();
        }
      }}
    >
      {label.getState().text}
    </div>
  );
}
