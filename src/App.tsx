import { useEffect, useState } from 'react';

import { findCatalogEntry } from './model/catalog';
import type { CatalogEntry } from './model/catalog';
import { createControlSet, disposeControlSet } from './model/controls';
import type { ControlSet } from './model/controls';
import type { ControlId, Rng, TickScheduler } from './model/types';
import { BouncePanel, CirclePanel, GravityPanel, SlingshotPanel } from './ui/CanvasPanels';
import { ColorPanel, IsotopePanel, MemoryPanel } from './ui/InputPanels';
import { MenuPage } from './ui/MenuPage';
import { VolumePage } from './ui/VolumePage';

type AppProps = {
  controls?: ControlSet;
  scheduler?: TickScheduler;
  rng?: Rng;
};

type ActivePage = 'menu' | ControlId;

function renderControlPage(
  entry: CatalogEntry,
  controls: ControlSet,
  onBack: () => void
): JSX.Element {
  switch (entry.id) {
    case 'gravity':
      return (
        <VolumePage entry={entry} control={controls.gravity} onBack={onBack}>
          <GravityPanel control={controls.gravity} />
        </VolumePage>
      );
    case 'color':
      return (
        <VolumePage entry={entry} control={controls.color} onBack={onBack}>
          <ColorPanel control={controls.color} />
        </VolumePage>
      );
    case 'slingshot':
      return (
        <VolumePage entry={entry} control={controls.slingshot} onBack={onBack}>
          <SlingshotPanel control={controls.slingshot} />
        </VolumePage>
      );
    case 'isotope':
      return (
        <VolumePage entry={entry} control={controls.isotope} onBack={onBack}>
          <IsotopePanel control={controls.isotope} />
        </VolumePage>
      );
    case 'circle':
      return (
        <VolumePage entry={entry} control={controls.circle} onBack={onBack}>
          <CirclePanel control={controls.circle} />
        </VolumePage>
      );
    case 'bounce':
      return (
        <VolumePage entry={entry} control={controls.bounce} onBack={onBack}>
          <BouncePanel control={controls.bounce} />
        </VolumePage>
      );
    case 'memory':
      return (
        <VolumePage entry={entry} control={controls.memory} onBack={onBack}>
          <MemoryPanel control={controls.memory} />
        </VolumePage>
      );
  }
}

export default function App({ controls, scheduler, rng }: AppProps): JSX.Element {
  const [ownsControls] = useState(() => controls === undefined);
  const [activeControls] = useState<ControlSet>(() => controls ?? createControlSet({ scheduler, rng }));
  const [page, setPage] = useState<ActivePage>('menu');

  useEffect(() => {
    return () => {
      if (ownsControls) {
        disposeControlSet(activeControls);
      }
    };
  }, [activeControls, ownsControls]);

  const activeEntry = page === 'menu' ? null : findCatalogEntry(page);

  return (
    <div className="app-shell">
      <MenuPage
        hidden={page !== 'menu'}
        scheduler={scheduler}
        rng={rng}
        onSelect={(id) => {
          if (id === 'color') {
            activeControls.color.resetChallenge();
          }
          setPage(id);
        }}
      />
      {activeEntry ? renderControlPage(activeEntry, activeControls, () => setPage('menu')) : null}
    </div>
  );
}
