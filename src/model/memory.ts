import { defaultRng, shuffle } from './random';
import { createTimerScheduler, createTimerSlot } from './scheduler';
import { createChangeNotifier, createVolumeChannel } from './volume';
import type { MemoryBoard, MemoryOptions, Result, Rng, TickScheduler, VolumeSource } from './types';

export const MEMORY_SYMBOLS: readonly string[] = ['♠', '♥', '♦', '♣', '★', '☀', '☂', '♪'];
export const PAIR_COUNT = MEMORY_SYMBOLS.length;

export const DEFAULT_MEMORY_OPTIONS: MemoryOptions = {
  mismatchDelayMs: 1000
};

export type SelectOutcome = {
  board: MemoryBoard;
  result: Result;
  volume: number | null;
  pendingHide: boolean;
};

export function createMemoryBoard(rng: Rng, symbols: readonly string[] = MEMORY_SYMBOLS): MemoryBoard {
  const deck = shuffle(rng, [...symbols, ...symbols]);
  return {
    cards: deck.map((symbol) => ({ symbol, faceUp: false, matched: false })),
    firstSelected: null,
    secondSelected: null,
    matchedPairs: 0
  };
}

export function memoryVolume(matchedPairs: number, pairCount: number = PAIR_COUNT): number {
  return Math.round((100 * matchedPairs) / pairCount);
}

function refuse(board: MemoryBoard, reason: string): SelectOutcome {
  return { board, result: { ok: false, reason }, volume: null, pendingHide: false };
}

export function selectCard(board: MemoryBoard, index: number): SelectOutcome {
  const card = board.cards[index];
  if (!Number.isInteger(index) || !card) {
    return refuse(board, `No card at index ${index}.`);
  }
  if (card.matched) {
    return refuse(board, 'Card is already matched.');
  }
  if (board.secondSelected !== null) {
    return refuse(board, 'Waiting for the previous pair to turn back.');
  }
  if (card.faceUp) {
    return refuse(board, 'Card is already face up.');
  }

  const cards = board.cards.map((entry, i) => (i === index ? { ...entry, faceUp: true } : entry));

  if (board.firstSelected === null) {
    return {
      board: { ...board, cards, firstSelected: index },
      result: { ok: true },
      volume: null,
      pendingHide: false
    };
  }

  const first = board.firstSelected;
  if (cards[first].symbol === cards[index].symbol) {
    const matchedCards = cards.map((entry, i) =>
      i === first || i === index ? { ...entry, matched: true } : entry
    );
    const matchedPairs = board.matchedPairs + 1;
    return {
      board: { cards: matchedCards, firstSelected: null, secondSelected: null, matchedPairs },
      result: { ok: true },
      volume: memoryVolume(matchedPairs, cards.length / 2),
      pendingHide: false
    };
  }

  return {
    board: { ...board, cards, secondSelected: index },
    result: { ok: true },
    volume: null,
    pendingHide: true
  };
}

export function hideMismatch(board: MemoryBoard): MemoryBoard {
  const { firstSelected, secondSelected } = board;
  if (firstSelected === null || secondSelected === null) {
    return board;
  }
  return {
    ...board,
    cards: board.cards.map((card, i) =>
      (i === firstSelected || i === secondSelected) && !card.matched ? { ...card, faceUp: false } : card
    ),
    firstSelected: null,
    secondSelected: null
  };
}

export function isComplete(board: MemoryBoard): boolean {
  return board.cards.every((card) => card.matched);
}

export type MemoryControlOptions = {
  options?: Partial<MemoryOptions>;
  scheduler?: TickScheduler;
  rng?: Rng;
};

export interface MemoryControl extends VolumeSource<MemoryBoard> {
  select(index: number): Result;
  newGame(): void;
}

export function createMemoryControl({
  options: overrides,
  scheduler = createTimerScheduler(),
  rng = defaultRng
}: MemoryControlOptions = {}): MemoryControl {
  const options: MemoryOptions = { ...DEFAULT_MEMORY_OPTIONS, ...overrides };
  const changes = createChangeNotifier();
  const volume = createVolumeChannel();
  const pendingHide = createTimerSlot();
  let board = createMemoryBoard(rng);

  const hide = (): void => {
    pendingHide.stop();
    board = hideMismatch(board);
    changes.notify();
  };

  return {
    getState: () => board,
    getVolume: volume.getLatest,
    subscribe: changes.subscribe,
    onVolume: volume.onVolume,
    select(index: number): Result {
      const outcome = selectCard(board, index);
      if (!outcome.result.ok) {
        return outcome.result;
      }

      board = outcome.board;
      if (outcome.pendingHide) {
        pendingHide.start(() => scheduler.after(options.mismatchDelayMs, hide));
      }
      if (outcome.volume !== null) {
        volume.emit(outcome.volume);
      }
      changes.notify();
      return outcome.result;
    },
    newGame(): void {
      pendingHide.stop();
      board = createMemoryBoard(rng);
      volume.emit(0);
      changes.notify();
    },
    dispose(): void {
      pendingHide.stop();
    }
  };
}
