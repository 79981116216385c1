/**
 * Fits the horizontal scene extents into a fixed-size canvas.
 *
 * The fit is recomputed from scratch on every frame. The user pan delta is tracked
 * separately and only ever added on top of the fitted offset.
 */
import {
    DEFAULT_FIT_PADDING_M,
    DEFAULT_MARGIN_FACTOR,
    DEFAULT_SCALE_PX_PER_M,
    EXTENT_EPSILON,
    PREVIEW_MARGIN_FACTOR,
} from '@/constants/floorPlan';
import type {
    CanvasPoint,
    CanvasSize,
    PanState,
    PlanBounds,
    PlanPoint,
    ViewportState,
    WallElement,
} from '@/types';

import { transformPosition } from './rigidTransform';
import { wallEndpoints, wallHalfExtents } from './transformDecomposer';

// =============================================================================
// BOUNDS
// =============================================================================

const emptyAccumulator = (): PlanBounds => ({
    minX: Infinity,
    maxX: -Infinity,
    minZ: Infinity,
    maxZ: -Infinity,
});

const includePoint = (bounds: PlanBounds, x: number, z: number): void => {
    if (!Number.isFinite(x) || !Number.isFinite(z)) {
        return;
    }
    bounds.minX = Math.min(bounds.minX, x);
    bounds.maxX = Math.max(bounds.maxX, x);
    bounds.minZ = Math.min(bounds.minZ, z);
    bounds.maxZ = Math.max(bounds.maxZ, z);
};

/**
 * Axis-aligned plan bounds of every wall half-extent and trail position, expanded by
 * `padding`. Returns null when nothing contributes.
 */
export const computePlanBounds = (
    walls: readonly WallElement[],
    trail: readonly PlanPoint[],
    padding: number = DEFAULT_FIT_PADDING_M,
): PlanBounds | null => {
    const acc = emptyAccumulator();

    for (const wall of walls) {
        const center = transformPosition(wall.transform);
        const half = wallHalfExtents(wall);
        includePoint(acc, center.x - half.x, center.z - half.z);
        includePoint(acc, center.x + half.x, center.z + half.z);
        // Tilted right vectors normalize to a longer plan direction than the box covers.
        const { start, end } = wallEndpoints(wall);
        includePoint(acc, start.x, start.z);
        includePoint(acc, end.x, end.z);
    }

    for (const point of trail) {
        includePoint(acc, point.x, point.z);
    }

    if (acc.minX > acc.maxX || acc.minZ > acc.maxZ) {
        return null;
    }

    return {
        minX: acc.minX - padding,
        maxX: acc.maxX + padding,
        minZ: acc.minZ - padding,
        maxZ: acc.maxZ + padding,
    };
};

// =============================================================================
// FIT
// =============================================================================

export interface FitSettings {
    padding: number;
    marginFactor: number;
    defaultScale: number;
    /**
     * Whether the live overlays take part: trail positions in the bounds, and the
     * grid, compass, trail and device layers in the drawables.
     */
    includeTrail: boolean;
}

export type FitPresetName = 'mapping' | 'preview';

const FIT_PRESETS: Record<FitPresetName, FitSettings> = {
    mapping: {
        padding: DEFAULT_FIT_PADDING_M,
        marginFactor: DEFAULT_MARGIN_FACTOR,
        defaultScale: DEFAULT_SCALE_PX_PER_M,
        includeTrail: true,
    },
    // Compact live preview: scan elements only, fitted to the walls with a 0.9 margin.
    preview: {
        padding: DEFAULT_FIT_PADDING_M,
        marginFactor: PREVIEW_MARGIN_FACTOR,
        defaultScale: DEFAULT_SCALE_PX_PER_M,
        includeTrail: false,
    },
};

export const fitPreset = (name: FitPresetName): FitSettings => ({ ...FIT_PRESETS[name] });

export interface FitViewportParams {
    bounds: PlanBounds | null;
    canvasSize: CanvasSize;
    pan?: CanvasPoint;
    marginFactor?: number;
    defaultScale?: number;
}

const hasArea = (size: CanvasSize): boolean =>
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width > 0 &&
    size.height > 0;

export const computeFitScale = (
    bounds: PlanBounds | null,
    canvasSize: CanvasSize,
    marginFactor: number = DEFAULT_MARGIN_FACTOR,
    defaultScale: number = DEFAULT_SCALE_PX_PER_M,
): number => {
    if (!bounds || !hasArea(canvasSize)) {
        return defaultScale;
    }
    const extentWidth = bounds.maxX - bounds.minX;
    const extentDepth = bounds.maxZ - bounds.minZ;
    if (!(extentWidth >= EXTENT_EPSILON) || !(extentDepth >= EXTENT_EPSILON)) {
        return defaultScale;
    }
    const scale =
        Math.min(canvasSize.width / extentWidth, canvasSize.height / extentDepth) * marginFactor;
    return Number.isFinite(scale) && scale > 0 ? scale : defaultScale;
};

export const fitViewport = (params: FitViewportParams): ViewportState => {
    const { bounds, canvasSize } = params;
    const scale = computeFitScale(
        bounds,
        canvasSize,
        params.marginFactor ?? DEFAULT_MARGIN_FACTOR,
        params.defaultScale ?? DEFAULT_SCALE_PX_PER_M,
    );

    // Center the bounding box; an empty scene puts the world origin at the center.
    const centerX = bounds ? (bounds.minX + bounds.maxX) / 2 : 0;
    const centerZ = bounds ? (bounds.minZ + bounds.maxZ) / 2 : 0;
    const width = Number.isFinite(canvasSize.width) ? canvasSize.width : 0;
    const height = Number.isFinite(canvasSize.height) ? canvasSize.height : 0;

    return {
        canvasSize: { width, height },
        scale,
        offset: {
            x: width / 2 - centerX * scale,
            y: height / 2 - centerZ * scale,
        },
        pan: { ...(params.pan ?? { x: 0, y: 0 }) },
    };
};

// =============================================================================
// PROJECTION
// =============================================================================

/** World plan point → canvas pixels (+z points down the canvas). */
export const planToCanvas = (point: PlanPoint, viewport: ViewportState): CanvasPoint => ({
    x: viewport.offset.x + viewport.pan.x + point.x * viewport.scale,
    y: viewport.offset.y + viewport.pan.y + point.z * viewport.scale,
});

export const planLengthToCanvas = (meters: number, viewport: ViewportState): number =>
    meters * viewport.scale;

// =============================================================================
// PAN
// =============================================================================

export const createPanState = (): PanState => ({ committed: { x: 0, y: 0 }, drag: null });

/** Pan visible right now: committed delta plus the drag in progress. */
export const currentPan = (state: PanState): CanvasPoint => ({
    x: state.committed.x + (state.drag?.x ?? 0),
    y: state.committed.y + (state.drag?.y ?? 0),
});

/** `translation` is the total drag translation since the gesture began. */
export const dragPan = (state: PanState, translation: CanvasPoint): PanState => ({
    committed: state.committed,
    drag: { x: translation.x, y: translation.y },
});

export const commitPan = (state: PanState): PanState => ({
    committed: currentPan(state),
    drag: null,
});

export const resetPan = (): PanState => createPanState();
