import type { ReactNode } from 'react';

import { formatVolume } from '../model/catalog';
import type { CatalogEntry } from '../model/catalog';
import type { VolumeSource } from '../model/types';
import { useStoreVersion, useVolume } from './hooks';

type VolumePageProps<S> = {
  entry: CatalogEntry;
  control: VolumeSource<S>;
  onBack: () => void;
  children: ReactNode;
};

export function VolumePage<S>({ entry, control, onBack, children }: VolumePageProps<S>): JSX.Element {
  const volume = useVolume(control);
  useStoreVersion(control);

  return (
    <div className="volume-page" data-testid={`page-${entry.id}`}>
      <h1 className="page-title">{entry.title}</h1>
      <p className="instructions">{entry.instructions}</p>
      <div className="control-host">{children}</div>
      <p className="volume-label" data-testid="volume-label">
        {formatVolume(volume)}
      </p>
      <button type="button" data-testid="back-button" onClick={onBack}>
        ← Back to Menu
      </button>
      <pre data-testid="control-debug" className="control-debug">
        {JSON.stringify(control.getState())}
      </pre>
    </div>
  );
}
