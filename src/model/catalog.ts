import type { ControlId } from './types';

export const APP_TITLE = 'Unintuitive Volume Controls';
export const TITLE_REVEAL_SPEED_MS = 30;
export const ENTRY_REVEAL_SPEED_MS = 40;
export const PLACEHOLDER_REVEAL_SPEED_MS = 60;
export const PLACEHOLDER_COUNT = 24;

export type CatalogEntry = {
  id: ControlId;
  title: string;
  instructions: string;
  revealSpeedMs: number;
};

export const CONTROL_CATALOG: readonly CatalogEntry[] = [
  {
    id: 'gravity',
    title: 'Gravity Slider',
    instructions: 'Drag to tilt the bar. The volume is set by the resting position of the ball.',
    revealSpeedMs: ENTRY_REVEAL_SPEED_MS
  },
  {
    id: 'color',
    title: 'Color Matcher',
    instructions: 'Recreate the target color using the RGB sliders. It will not hold still.',
    revealSpeedMs: ENTRY_REVEAL_SPEED_MS
  },
  {
    id: 'slingshot',
    title: 'Slingshot',
    instructions: 'Pull back and let go. The harder you pull, the louder it gets.',
    revealSpeedMs: ENTRY_REVEAL_SPEED_MS
  },
  {
    id: 'isotope',
    title: 'Unstable Isotope',
    instructions: 'Set the volume with the slider. It decays on its own, five points a second.',
    revealSpeedMs: ENTRY_REVEAL_SPEED_MS
  },
  {
    id: 'circle',
    title: 'Perfect Circle',
    instructions: 'Draw a circle. Rounder circles are louder.',
    revealSpeedMs: ENTRY_REVEAL_SPEED_MS
  },
  {
    id: 'bounce',
    title: 'Bouncy Ball',
    instructions: 'Grab the ball and fling it. Each solid bounce adds one.',
    revealSpeedMs: ENTRY_REVEAL_SPEED_MS
  },
  {
    id: 'memory',
    title: 'Memory Match',
    instructions: 'Find the pairs. Every match is worth an eighth of full volume.',
    revealSpeedMs: ENTRY_REVEAL_SPEED_MS
  }
];

/** Disabled filler labels that pad the menu out past one screen. */
export const MENU_PLACEHOLDERS: readonly string[] = Array.from(
  { length: PLACEHOLDER_COUNT },
  (_, index) => `Placeholder ${index + 1}`
);

export function findCatalogEntry(id: ControlId): CatalogEntry | null {
  return CONTROL_CATALOG.find((entry) => entry.id === id) ?? null;
}

export function formatVolume(volume: number | null): string {
  return volume === null ? 'Volume: --' : `Volume: ${volume}`;
}
