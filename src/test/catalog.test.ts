import { describe, expect, it } from 'vitest';

import { CONTROL_CATALOG, MENU_PLACEHOLDERS, findCatalogEntry, formatVolume } from '../model/catalog';

describe('catalog', () => {
  it('looks up menu entries by control id', () => {
    expect(findCatalogEntry('isotope')?.title).toBe('Unstable Isotope');
    expect(CONTROL_CATALOG.map((entry) => entry.id)).toEqual([
      'gravity',
      'color',
      'slingshot',
      'isotope',
      'circle',
      'bounce',
      'memory'
    ]);
  });

  it('numbers the placeholder labels from one', () => {
    expect(MENU_PLACEHOLDERS).toHaveLength(24);
    expect(MENU_PLACEHOLDERS[0]).toBe('Placeholder 1');
    expect(MENU_PLACEHOLDERS[23]).toBe('Placeholder 24');
  });

  it('formats a missing volume with dashes', () => {
    expect(formatVolume(null)).toBe('Volume: --');
    expect(formatVolume(0)).toBe('Volume: 0');
  });
});
