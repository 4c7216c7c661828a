import '@testing-library/jest-dom/vitest';

import { vi } from 'vitest';

// jsdom builds without PointerEvent dispatch plain Events, which drop clientX/clientY.
if (typeof window.PointerEvent === 'undefined') {
  class PointerEventStub extends MouseEvent {
    readonly pointerId: number;

    readonly pointerType: string;

    constructor(type: string, init: PointerEventInit = {}) {
      super(type, init);
      this.pointerId = init.pointerId ?? 1;
      this.pointerType = init.pointerType ?? 'mouse';
    }
  }

  Object.defineProperty(window, 'PointerEvent', {
    configurable: true,
    writable: true,
    value: PointerEventStub
  });
}

/** Spyable 2d context carrying only the calls the renderers make. */
function createContextStub() {
  return {
    fillStyle: '#000',
    strokeStyle: '#000',
    lineWidth: 1,
    lineCap: 'butt',
    lineJoin: 'miter',
    clearRect: vi.fn(),
    fillRect: vi.fn(),
    beginPath: vi.fn(),
    fill: vi.fn(),
    stroke: vi.fn(),
    arc: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    setLineDash: vi.fn(),
    setTransform: vi.fn()
  };
}

const contexts = new WeakMap<HTMLCanvasElement, ReturnType<typeof createContextStub>>();

Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', {
  configurable: true,
  writable: true,
  value(this: HTMLCanvasElement, kind: string) {
    if (kind !== '2d') {
      return null;
    }
    const existing = contexts.get(this);
    if (existing) {
      return existing;
    }
    const created = createContextStub();
    contexts.set(this, created);
    return created;
  }
});

HTMLCanvasElement.prototype.setPointerCapture = vi.fn();
HTMLCanvasElement.prototype.releasePointerCapture = vi.fn();

// Canvases lay out at 400x300 so pointer coordinates map one to one.
HTMLCanvasElement.prototype.getBoundingClientRect = function getBoundingClientRect() {
  return {
    x: 0,
    y: 0,
    left: 0,
    top: 0,
    right: 400,
    bottom: 300,
    width: 400,
    height: 300,
    toJSON: () => ({})
  };
};
