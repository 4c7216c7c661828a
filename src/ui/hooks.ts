import { useEffect, useState } from 'react';

import type { VolumeSource } from '../model/types';

type Subscribable = {
  subscribe(listener: () => void): () => void;
};

export function useStoreVersion(source: Subscribable): number {
  const [version, setVersion] = useState(0);

  useEffect(() => {
    return source.subscribe(() => {
      setVersion((previous) => previous + 1);
    });
  }, [source]);

  return version;
}

export function useVolume<S>(control: VolumeSource<S>): number | null {
  const [volume, setVolume] = useState<number | null>(() => control.getVolume());

  useEffect(() => {
    setVolume(control.getVolume());
    return control.onVolume((next) => {
      setVolume(next);
    });
  }, [control]);

  return volume;
}
