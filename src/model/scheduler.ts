import type { Cancel, TickScheduler } from './types';

export function createTimerScheduler(): TickScheduler {
  return {
    every(intervalMs: number, callback: () => void): Cancel {
      const handle = setInterval(callback, intervalMs);
      return () => {
        clearInterval(handle);
      };
    },
    after(delayMs: number, callback: () => void): Cancel {
      const handle = setTimeout(callback, delayMs);
      return () => {
        clearTimeout(handle);
      };
    }
  };
}

/**
 * Holds at most one running timer. Starting again replaces the previous one.
 */
export type TimerSlot = {
  start(start: () => Cancel): void;
  stop(): void;
  isRunning(): boolean;
};

export function createTimerSlot(): TimerSlot {
  let cancel: Cancel | null = null;

  return {
    start(start: () => Cancel): void {
      if (cancel) {
        cancel();
      }
      cancel = start();
    },
    stop(): void {
      if (cancel) {
        cancel();
        cancel = null;
      }
    },
    isRunning(): boolean {
      return cancel !== null;
    }
  };
}
