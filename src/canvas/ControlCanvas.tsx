import { useCallback, useEffect, useRef, useState } from 'react';
import type { PointerEvent as ReactPointerEvent } from 'react';

import type { PointerControl, PointerKind, Size, Vec2 } from '../model/types';

export type DrawFn<S> = (ctx: CanvasRenderingContext2D, width: number, height: number, state: S) => void;

type ControlCanvasProps<S> = {
  control: PointerControl<S>;
  state: S;
  draw: DrawFn<S>;
  testId: string;
  onResize?: (size: Size) => void;
};

const DEFAULT_VIEWPORT: Size = { width: 400, height: 300 };

function getCanvasPoint(event: ReactPointerEvent<HTMLCanvasElement>, canvas: HTMLCanvasElement): Vec2 {
  const rect = canvas.getBoundingClientRect();
  return {
    x: event.clientX - rect.left,
    y: event.clientY - rect.top
  };
}

export function ControlCanvas<S>({ control, state, draw, testId, onResize }: ControlCanvasProps<S>): JSX.Element {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const activePointerIdRef = useRef<number | null>(null);
  const [viewport, setViewport] = useState<Size>(DEFAULT_VIEWPORT);

  const resizeCanvas = useCallback(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const rect = canvas.getBoundingClientRect();
    const cssWidth = Math.max(1, Math.round(rect.width || DEFAULT_VIEWPORT.width));
    const cssHeight = Math.max(1, Math.round(rect.height || DEFAULT_VIEWPORT.height));
    const dpr = window.devicePixelRatio || 1;

    canvas.width = Math.round(cssWidth * dpr);
    canvas.height = Math.round(cssHeight * dpr);

    const ctx = canvas.getContext('2d');
    if (ctx) {
      ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
    }

    setViewport((prev) => {
      if (prev.width === cssWidth && prev.height === cssHeight) {
        return prev;
      }
      return { width: cssWidth, height: cssHeight };
    });
  }, []);

  useEffect(() => {
    resizeCanvas();
    window.addEventListener('resize', resizeCanvas);
    return () => {
      window.removeEventListener('resize', resizeCanvas);
    };
  }, [resizeCanvas]);

  useEffect(() => {
    onResize?.(viewport);
  }, [onResize, viewport]);

  useEffect(() => {
    const ctx = canvasRef.current?.getContext('2d');
    if (!ctx) {
      return;
    }
    draw(ctx, viewport.width, viewport.height, state);
  }, [draw, state, viewport.height, viewport.width]);

  const forward = useCallback(
    (kind: PointerKind, event: ReactPointerEvent<HTMLCanvasElement>): void => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      control.handlePointer({ kind, pos: getCanvasPoint(event, canvas) });
    },
    [control]
  );

  const handlePointerDown = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      if (event.button !== 0) {
        return;
      }
      activePointerIdRef.current = event.pointerId;
      canvasRef.current?.setPointerCapture(event.pointerId);
      forward('down', event);
    },
    [forward]
  );

  const handlePointerMove = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      if (activePointerIdRef.current !== event.pointerId) {
        return;
      }
      forward('move', event);
    },
    [forward]
  );

  const handlePointerUp = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      if (activePointerIdRef.current !== event.pointerId) {
        return;
      }
      activePointerIdRef.current = null;
      canvasRef.current?.releasePointerCapture(event.pointerId);
      forward('up', event);
    },
    [forward]
  );

  return (
    <canvas
      ref={canvasRef}
      data-testid={testId}
      className="control-canvas"
      onPointerDown={handlePointerDown}
      onPointerMove={handlePointerMove}
      onPointerUp={handlePointerUp}
      onPointerCancel={handlePointerUp}
    />
  );
}
