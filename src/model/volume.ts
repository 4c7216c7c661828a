import { clamp } from './geometry';
import type { VolumeListener } from './types';

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 100;

export function clampVolume(value: number): number {
  return clamp(value, MIN_VOLUME, MAX_VOLUME);
}

export type VolumeChannel = {
  emit(volume: number): void;
  getLatest(): number | null;
  onVolume(listener: VolumeListener): () => void;
};

export function createVolumeChannel(initial: number | null = null): VolumeChannel {
  const listeners = new Set<VolumeListener>();
  let latest = initial === null ? null : clampVolume(Math.round(initial));

  return {
    emit(volume: number): void {
      latest = clampVolume(Math.round(volume));
      for (const listener of listeners) {
        listener(latest);
      }
    },
    getLatest(): number | null {
      return latest;
    },
    onVolume(listener: VolumeListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }
  };
}

/** Change notification for repaint; carries no payload. */
export type ChangeNotifier = {
  notify(): void;
  subscribe(listener: () => void): () => void;
};

export function createChangeNotifier(): ChangeNotifier {
  const listeners = new Set<() => void>();

  return {
    notify(): void {
      for (const listener of listeners) {
        listener();
      }
    },
    subscribe(listener: () => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }
  };
}
