import React, { act } from 'react';
import { createRoot } from 'react-dom/client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createFloorPlanSession } from '@/services/floorPlanSession';

import FloorPlanCanvas from '../FloorPlanCanvas';

(globalThis as { IS_REACT_ACT_ENVIRONMENT?: boolean }).IS_REACT_ACT_ENVIRONMENT = true;

const createMockContext = () => ({
    clearRect: vi.fn(),
    fillRect: vi.fn(),
    save: vi.fn(),
    restore: vi.fn(),
    beginPath: vi.fn(),
    closePath: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    stroke: vi.fn(),
    fill: vi.fn(),
    arc: vi.fn(),
    rect: vi.fn(),
    translate: vi.fn(),
    rotate: vi.fn(),
    setLineDash: vi.fn(),
    fillText: vi.fn(),
    strokeStyle: '',
    fillStyle: '',
    lineWidth: 1,
    lineCap: 'butt',
    font: '',
    textAlign: 'start',
});

const pointerCapture = {
    setPointerCapture: vi.fn(),
    hasPointerCapture: vi.fn(() => true),
    releasePointerCapture: vi.fn(),
};

const installPointerCapture = () => {
    for (const [name, fn] of Object.entries(pointerCapture)) {
        fn.mockClear();
        Object.defineProperty(HTMLCanvasElement.prototype, name, {
            value: fn,
            configurable: true,
            writable: true,
        });
    }
};

const removePointerCapture = () => {
    for (const name of Object.keys(pointerCapture)) {
        Reflect.deleteProperty(HTMLCanvasElement.prototype, name);
    }
};

const pointer = (type: string, clientX: number, clientY: number) =>
    new PointerEvent(type, { bubbles: true, pointerId: 7, clientX, clientY });

const createContainer = () => {
    const container = document.createElement('div');
    document.body.appendChild(container);
    const root = createRoot(container);
    return { container, root };
};

const destroyContainer = ({ container, root }: ReturnType<typeof createContainer>) => {
    act(() => {
        root.unmount();
    });
    document.body.removeChild(container);
};

describe('FloorPlanCanvas', () => {
    let frames: FrameRequestCallback[] = [];
    const cancelFrame = vi.fn();

    const flushFrame = () => {
        const pending = frames;
        frames = [];
        act(() => {
            pending.forEach((callback) => callback(0));
        });
    };

    beforeEach(() => {
        frames = [];
        cancelFrame.mockClear();
        vi.stubGlobal('requestAnimationFrame', (callback: FrameRequestCallback) => {
            frames.push(callback);
            return frames.length;
        });
        vi.stubGlobal('cancelAnimationFrame', cancelFrame);
        installPointerCapture();
    });

    afterEach(() => {
        removePointerCapture();
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('paints the session each animation frame', () => {
        const ctx = createMockContext();
        vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(
            ctx as unknown as CanvasRenderingContext2D,
        );
        const handle = createContainer();

        act(() => {
            handle.root.render(
                <FloorPlanCanvas session={createFloorPlanSession()} width={320} height={240} />,
            );
        });
        flushFrame();

        expect(ctx.clearRect).toHaveBeenCalledWith(0, 0, 320, 240);
        expect(ctx.fillRect).toHaveBeenCalledWith(0, 0, 320, 240);
        expect(frames).toHaveLength(1);

        destroyContainer(handle);
        expect(cancelFrame).toHaveBeenCalledTimes(1);
    });

    it('reports the drag translation and the end of a pan', () => {
        vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(null);
        const onPanDrag = vi.fn();
        const onPanEnd = vi.fn();
        const handle = createContainer();

        act(() => {
            handle.root.render(
                <FloorPlanCanvas
                    session={createFloorPlanSession()}
                    width={200}
                    height={100}
                    onPanDrag={onPanDrag}
                    onPanEnd={onPanEnd}
                />,
            );
        });

        const canvas = handle.container.querySelector('canvas');
        expect(canvas).not.toBeNull();

        act(() => {
            canvas?.dispatchEvent(pointer('pointerdown', 10, 20));
            canvas?.dispatchEvent(pointer('pointermove', 25, 14));
            canvas?.dispatchEvent(pointer('pointerup', 25, 14));
        });

        expect(onPanDrag).toHaveBeenCalledWith({ x: 15, y: -6 });
        expect(onPanEnd).toHaveBeenCalledTimes(1);
        expect(pointerCapture.setPointerCapture).toHaveBeenCalledWith(7);
        expect(pointerCapture.releasePointerCapture).toHaveBeenCalledWith(7);

        destroyContainer(handle);
    });

    it('keeps panning after the pointer leaves the canvas', () => {
        vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(null);
        const onPanDrag = vi.fn();
        const onPanEnd = vi.fn();
        const handle = createContainer();

        act(() => {
            handle.root.render(
                <FloorPlanCanvas
                    session={createFloorPlanSession()}
                    width={200}
                    height={100}
                    onPanDrag={onPanDrag}
                    onPanEnd={onPanEnd}
                />,
            );
        });
        const canvas = handle.container.querySelector('canvas');

        act(() => {
            canvas?.dispatchEvent(pointer('pointerdown', 100, 50));
            canvas?.dispatchEvent(pointer('pointerout', 210, 50));
            canvas?.dispatchEvent(pointer('pointerleave', 210, 50));
            canvas?.dispatchEvent(pointer('pointermove', 260, 40));
        });

        expect(onPanEnd).not.toHaveBeenCalled();
        expect(onPanDrag).toHaveBeenLastCalledWith({ x: 160, y: -10 });

        destroyContainer(handle);
    });

    it('ignores pointer moves without a drag in progress', () => {
        vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(null);
        const onPanDrag = vi.fn();
        const handle = createContainer();

        act(() => {
            handle.root.render(
                <FloorPlanCanvas
                    session={createFloorPlanSession()}
                    width={200}
                    height={100}
                    onPanDrag={onPanDrag}
                />,
            );
        });

        act(() => {
            handle.container
                .querySelector('canvas')
                ?.dispatchEvent(pointer('pointermove', 5, 5));
        });
        expect(onPanDrag).not.toHaveBeenCalled();

        destroyContainer(handle);
    });

    it('renders the legend unless hidden', () => {
        vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(null);
        const handle = createContainer();
        const session = createFloorPlanSession();

        act(() => {
            handle.root.render(<FloorPlanCanvas session={session} width={200} height={100} />);
        });
        const items = handle.container.querySelectorAll('[data-testid="floor-plan-legend"] li');
        expect(Array.from(items, (item) => item.textContent)).toEqual([
            'Walls',
            'Doors',
            'Windows',
            'Objects',
            'You',
        ]);

        act(() => {
            handle.root.render(
                <FloorPlanCanvas session={session} width={200} height={100} showLegend={false} />,
            );
        });
        expect(handle.container.querySelector('[data-testid="floor-plan-legend"]')).toBeNull();

        destroyContainer(handle);
    });
});
