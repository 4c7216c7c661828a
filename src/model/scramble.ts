import { defaultRng, pick } from './random';
import { createTimerScheduler, createTimerSlot } from './scheduler';
import { createChangeNotifier } from './volume';
import type { Rng, ScrambleState, TickScheduler } from './types';

export const DEFAULT_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*()';
export const DEFAULT_REVEAL_SPEED_MS = 50;

export function scrambleText(text: string, charset: string, rng: Rng): string {
  let result = '';
  for (let i = 0; i < text.length; i += 1) {
    result += pick(rng, charset);
  }
  return result;
}

export function createScrambleState(text: string, charset: string, rng: Rng): ScrambleState {
  return {
    originalText: text,
    charset,
    revealedCount: 0,
    animating: false,
    inView: false,
    text: scrambleText(text, charset, rng)
  };
}

export function startReveal(state: ScrambleState): ScrambleState {
  if (state.animating || state.originalText.length === 0) {
    return state;
  }
  return { ...state, animating: true, revealedCount: 0 };
}

export function revealTick(state: ScrambleState, rng: Rng): ScrambleState {
  if (!state.animating) {
    return state;
  }

  const total = state.originalText.length;
  const revealedCount = Math.min(total, state.revealedCount + 1);
  if (revealedCount >= total) {
    return { ...state, revealedCount: total, animating: false, text: state.originalText };
  }

  const revealed = state.originalText.slice(0, revealedCount);
  const tail = scrambleText(state.originalText.slice(revealedCount), state.charset, rng);
  return { ...state, revealedCount, text: revealed + tail };
}

export function resetScramble(state: ScrambleState, rng: Rng): ScrambleState {
  return {
    ...state,
    animating: false,
    revealedCount: 0,
    text: scrambleText(state.originalText, state.charset, rng)
  };
}

export function setOriginalText(state: ScrambleState, text: string, rng: Rng): ScrambleState {
  return resetScramble({ ...state, originalText: text }, rng);
}

export type ScrambleLabelOptions = {
  text: string;
  speedMs?: number;
  charset?: string;
  rng?: Rng;
  scheduler?: TickScheduler;
};

export interface ScrambleLabel {
  getState(): ScrambleState;
  subscribe(listener: () => void): () => void;
  startDecryption(): void;
  resetScramble(): void;
  setOriginalText(text: string): void;
  setInView(inView: boolean): void;
  dispose(): void;
}

export function createScrambleLabel({
  text,
  speedMs = DEFAULT_REVEAL_SPEED_MS,
  charset = DEFAULT_CHARSET,
  rng = defaultRng,
  scheduler = createTimerScheduler()
}: ScrambleLabelOptions): ScrambleLabel {
  const changes = createChangeNotifier();
  const revealTimer = createTimerSlot();
  let state = createScrambleState(text, charset, rng);

  const commit = (next: ScrambleState): void => {
    if (next === state) {
      return;
    }
    state = next;
    changes.notify();
  };

  const onTick = (): void => {
    const next = revealTick(state, rng);
    if (!next.animating) {
      revealTimer.stop();
    }
    commit(next);
  };

  return {
    getState(): ScrambleState {
      return state;
    },
    subscribe: changes.subscribe,
    startDecryption(): void {
      const next = startReveal(state);
      if (next === state) {
        return;
      }
      revealTimer.start(() => scheduler.every(speedMs, onTick));
      commit(next);
    },
    resetScramble(): void {
      revealTimer.stop();
      commit(resetScramble(state, rng));
    },
    setOriginalText(nextText: string): void {
      revealTimer.stop();
      commit(setOriginalText(state, nextText, rng));
    },
    setInView(inView: boolean): void {
      if (state.inView === inView) {
        return;
      }
      commit({ ...state, inView });
    },
    dispose(): void {
      revealTimer.stop();
    }
  };
}
