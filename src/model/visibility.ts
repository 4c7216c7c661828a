import type { LabelGeometry, Viewport, VisibilityAction } from './types';

export const INITIAL_VISIBILITY_CHECK_MS = 100;

export function isCenterVisible(viewport: Viewport, geometry: LabelGeometry): boolean {
  const visibleBottom = viewport.scrollOffset + viewport.viewportHeight;
  const centerY = geometry.top + geometry.height / 2;
  return centerY >= viewport.scrollOffset && centerY <= visibleBottom;
}

export function isFullyOutside(viewport: Viewport, geometry: LabelGeometry): boolean {
  const visibleBottom = viewport.scrollOffset + viewport.viewportHeight;
  const bottom = geometry.top + geometry.height;
  return bottom < viewport.scrollOffset || geometry.top > visibleBottom;
}

/**
 * Entry uses the label's center; exit waits until the whole label has left,
 * so a label straddling the edge keeps its revealed text.
 */
export function evaluateVisibility(
  viewport: Viewport,
  geometry: LabelGeometry,
  inView: boolean
): VisibilityAction | null {
  if (isCenterVisible(viewport, geometry)) {
    return inView ? null : 'reveal';
  }
  if (inView && isFullyOutside(viewport, geometry)) {
    return 'rescramble';
  }
  return null;
}

export interface TrackedLabel {
  getGeometry(): LabelGeometry | null;
  isInView(): boolean;
  setInView(inView: boolean): void;
  startDecryption(): void;
  resetScramble(): void;
}

export interface VisibilityTracker {
  track(label: TrackedLabel): () => void;
  update(viewport: Viewport): void;
}

export function createVisibilityTracker(): VisibilityTracker {
  const labels = new Set<TrackedLabel>();

  return {
    track(label: TrackedLabel): () => void {
      labels.add(label);
      return () => {
        labels.delete(label);
      };
    },
    update(viewport: Viewport): void {
      for (const label of labels) {
        const geometry = label.getGeometry();
        if (!geometry) {
          continue;
        }

        const action = evaluateVisibility(viewport, geometry, label.isInView());
        if (action === 'reveal') {
          label.setInView(true);
          label.startDecryption();
        } else if (action === 'rescramble') {
          label.setInView(false);
          label.resetScramble();
        }
      }
    }
  };
}
