import { useCallback, useEffect, useRef, useState } from 'react';

import {
  APP_TITLE,
  CONTROL_CATALOG,
  MENU_PLACEHOLDERS,
  PLACEHOLDER_REVEAL_SPEED_MS,
  TITLE_REVEAL_SPEED_MS
} from '../model/catalog';
import type { ControlId, Rng, TickScheduler } from '../model/types';
import { INITIAL_VISIBILITY_CHECK_MS, createVisibilityTracker } from '../model/visibility';
import { ScrambleText } from './ScrambleText';

type MenuPageProps = {
  hidden: boolean;
  onSelect: (id: ControlId) => void;
  scheduler?: TickScheduler;
  rng?: Rng;
};

export function MenuPage({ hidden, onSelect, scheduler, rng }: MenuPageProps): JSX.Element {
  const scrollRef = useRef<HTMLDivElement | null>(null);
  const [tracker] = useState(createVisibilityTracker);

  const checkVisibility = useCallback(() => {
    const scrollArea = scrollRef.current;
    if (!scrollArea) {
      return;
    }
    tracker.update({
      scrollOffset: scrollArea.scrollTop,
      viewportHeight: scrollArea.clientHeight
    });
  }, [tracker]);

  useEffect(() => {
    const timer = window.setTimeout(checkVisibility, INITIAL_VISIBILITY_CHECK_MS);
    return () => {
      window.clearTimeout(timer);
    };
  }, [checkVisibility]);

  return (
    <div className="menu-page" data-testid="menu-page" hidden={hidden}>
      <div ref={scrollRef} className="menu-scroll" data-testid="menu-scroll" onScroll={checkVisibility}>
        <ScrambleText
          text={APP_TITLE}
          speedMs={TITLE_REVEAL_SPEED_MS}
          tracker={tracker}
          scheduler={scheduler}
          rng={rng}
          className="menu-title"
          testId="menu-title"
        />
        <div className="menu-grid">
          {CONTROL_CATALOG.map((entry) => (
            <ScrambleText
              key={entry.id}
              text={entry.title}
              speedMs={entry.revealSpeedMs}
              tracker={tracker}
              scheduler={scheduler}
              rng={rng}
              className="menu-button"
              testId={`menu-${entry.id}`}
              onClick={() => onSelect(entry.id)}
            />
          ))}
          {MENU_PLACEHOLDERS.map((title, index) => (
            <ScrambleText
              key={title}
              text={title}
              speedMs={PLACEHOLDER_REVEAL_SPEED_MS}
              tracker={tracker}
              scheduler={scheduler}
              rng={rng}
              className="menu-button"
              testId={`menu-placeholder-${index + 1}`}
              disabled
            />
          ))}
        </div>
      </div>
    </div>
  );
}
