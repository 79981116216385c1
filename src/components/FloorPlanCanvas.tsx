import React, { useCallback, useEffect, useRef } from 'react';

import { FLOOR_PLAN_PALETTE, LEGEND_ITEMS } from '@/constants/floorPlan';
import { renderDrawables } from '@/overlays/renderer';
import { computeFrame, type FloorPlanSessionState } from '@/services/floorPlanSession';
import type { CanvasPoint } from '@/types';
import type { FitPresetName } from '@/utils/viewportFit';

interface FloorPlanCanvasProps {
    session: FloorPlanSessionState;
    width: number;
    height: number;
    /** Total translation since the drag began, in canvas pixels. */
    onPanDrag?: (translation: CanvasPoint) => void;
    onPanEnd?: () => void;
    showLegend?: boolean;
    /** 'preview' draws a compact, elements-only plan. */
    preset?: FitPresetName;
}

interface DragState {
    pointerId: number;
    origin: CanvasPoint;
}

const FloorPlanCanvas: React.FC<FloorPlanCanvasProps> = ({
    session,
    width,
    height,
    onPanDrag,
    onPanEnd,
    showLegend = true,
    preset = 'mapping',
}) => {
    const canvasRef = useRef<HTMLCanvasElement>(null);
    const sessionRef = useRef(session);
    const dragRef = useRef<DragState | null>(null);

    sessionRef.current = session;

    useEffect(() => {
        let frameId = 0;
        const draw = () => {
            const canvas = canvasRef.current;
            const ctx = canvas?.getContext('2d');
            if (ctx) {
                const size = { width, height };
                const { drawables } = computeFrame(sessionRef.current, size, preset);
                renderDrawables(ctx, drawables, size, {
                    background: FLOOR_PLAN_PALETTE.background,
                });
            }
            frameId = requestAnimationFrame(draw);
        };
        frameId = requestAnimationFrame(draw);
        return () => cancelAnimationFrame(frameId);
    }, [width, height, preset]);

    const handlePointerDown = useCallback((event: React.PointerEvent<HTMLCanvasElement>) => {
        dragRef.current = {
            pointerId: event.pointerId,
            origin: { x: event.clientX, y: event.clientY },
        };
        // Keep receiving moves once the pointer leaves the canvas.
        event.currentTarget.setPointerCapture(event.pointerId);
    }, []);

    const handlePointerMove = useCallback(
        (event: React.PointerEvent<HTMLCanvasElement>) => {
            const drag = dragRef.current;
            if (!drag || drag.pointerId !== event.pointerId) {
                return;
            }
            onPanDrag?.({
                x: event.clientX - drag.origin.x,
                y: event.clientY - drag.origin.y,
            });
        },
        [onPanDrag],
    );

    const handlePointerUp = useCallback(
        (event: React.PointerEvent<HTMLCanvasElement>) => {
            const drag = dragRef.current;
            if (!drag || drag.pointerId !== event.pointerId) {
                return;
            }
            dragRef.current = null;
            if (event.currentTarget.hasPointerCapture(event.pointerId)) {
                event.currentTarget.releasePointerCapture(event.pointerId);
            }
            onPanEnd?.();
        },
        [onPanEnd],
    );

    return (
        <div className="relative" style={{ width, height }}>
            <canvas
                ref={canvasRef}
                width={width}
                height={height}
                className="block touch-none rounded-md"
                onPointerDown={handlePointerDown}
                onPointerMove={handlePointerMove}
                onPointerUp={handlePointerUp}
                onPointerCancel={handlePointerUp}
            />
            {showLegend && (
                <ul
                    className="absolute bottom-2 left-2 flex flex-col gap-1 rounded bg-black/70 px-2 py-1 text-xs text-white"
                    data-testid="floor-plan-legend"
                >
                    {LEGEND_ITEMS.map((item) => (
                        <li key={item.label} className="flex items-center gap-2">
                            <span
                                className={item.icon === 'location' ? 'h-2 w-2 rounded-full' : 'h-1 w-3'}
                                style={{ backgroundColor: item.color }}
                            />
                            {item.label}
                        </li>
                    ))}
                </ul>
            )}
        </div>
    );
};

export default FloorPlanCanvas;
