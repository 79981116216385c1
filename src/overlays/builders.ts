/**
 * Scene projection: snapshot + trail + viewport → ordered drawables.
 *
 * Every builder places its primitive through `decomposeTransform` for orientation and
 * the viewport for position. The whole list is rebuilt every frame with no
 * incremental patching. Sized for tens of primitives, not large scenes.
 */
import {
    COMPASS_ARROW_LENGTH_PX,
    COMPASS_CENTER_TOP_PX,
    CORNER_MARKER_RADIUS_PX,
    DEFAULT_FOV_HALF_ANGLE_DEG,
    DEVICE_GLYPH_SIZE_PX,
    FLOOR_PLAN_PALETTE,
    FOV_LENGTH_PX,
    GRID_SPACING_M,
    OBJECT_FRONT_TICK_RATIO,
    OPENING_THICKNESS_PX,
    TRAIL_DASH_PATTERN,
    WALL_LINE_WIDTH_PX,
} from '@/constants/floorPlan';
import { estimateDevicePose } from '@/services/devicePoseEstimator';
import type {
    CanvasPoint,
    DoorElement,
    ObjectElement,
    PlanPoint,
    RigidTransform,
    Snapshot,
    TrailHistory,
    ViewportState,
    WallElement,
    WindowElement,
} from '@/types';
import { compassDirection, normalizeHeading, northArrowTip } from '@/utils/compass';
import { degToRad } from '@/utils/rigidTransform';
import { trailPlanPoints } from '@/utils/trailHistory';
import { decomposeTransform, wallEndpoints } from '@/utils/transformDecomposer';
import { planLengthToCanvas, planToCanvas } from '@/utils/viewportFit';

import type {
    CircleDrawable,
    CompassDrawable,
    Drawable,
    GridDrawable,
    PolygonDrawable,
    PolylineDrawable,
    RectDrawable,
    SegmentDrawable,
} from './types';

// =============================================================================
// CANVAS VECTOR HELPERS
// =============================================================================

const offsetPoint = (origin: CanvasPoint, dx: number, dy: number): CanvasPoint => ({
    x: origin.x + dx,
    y: origin.y + dy,
});

/** Rotate a local (x, y) offset by `angle` and add it to `origin`. */
const rotateLocal = (origin: CanvasPoint, lx: number, ly: number, angle: number): CanvasPoint => {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return offsetPoint(origin, lx * cos - ly * sin, lx * sin + ly * cos);
};

// =============================================================================
// BACKGROUND
// =============================================================================

export const buildGridDrawable = (viewport: ViewportState): GridDrawable => ({
    type: 'grid',
    layer: 'grid',
    size: { ...viewport.canvasSize },
    origin: planToCanvas({ x: 0, z: 0 }, viewport),
    spacing: planLengthToCanvas(GRID_SPACING_M, viewport),
    style: { strokeColor: FLOOR_PLAN_PALETTE.grid, lineWidth: 0.5 },
});

/** North indicator near the top center; null without a heading. */
export const buildCompassDrawable = (
    viewport: ViewportState,
    heading: number | null | undefined,
): CompassDrawable | null => {
    const normalized = normalizeHeading(heading);
    if (normalized === null) {
        return null;
    }
    const center = { x: viewport.canvasSize.width / 2, y: COMPASS_CENTER_TOP_PX };
    return {
        type: 'compass',
        layer: 'compass',
        center,
        tip: northArrowTip(center, normalized, COMPASS_ARROW_LENGTH_PX),
        heading: normalized,
        label: compassDirection(normalized),
        style: {
            strokeColor: FLOOR_PLAN_PALETTE.compass,
            labelColor: FLOOR_PLAN_PALETTE.compassLabel,
            lineWidth: 3,
            lineCap: 'round',
        },
    };
};

export const buildTrailDrawable = (
    points: readonly PlanPoint[],
    viewport: ViewportState,
): PolylineDrawable | null => {
    if (points.length < 2) {
        return null;
    }
    return {
        type: 'polyline',
        layer: 'trail',
        points: points.map((point) => planToCanvas(point, viewport)),
        style: {
            strokeColor: FLOOR_PLAN_PALETTE.trail,
            lineWidth: 2,
            dash: TRAIL_DASH_PATTERN,
            lineCap: 'round',
        },
    };
};

// =============================================================================
// SURFACES
// =============================================================================

const cornerMarker = (center: CanvasPoint, elementId: string): CircleDrawable => ({
    type: 'circle',
    layer: 'wall',
    elementId,
    center,
    radius: CORNER_MARKER_RADIUS_PX,
    style: { fillColor: FLOOR_PLAN_PALETTE.corner },
});

/** Thick segment per wall followed by a filled marker at each endpoint. */
export const buildWallDrawables = (
    walls: readonly WallElement[],
    viewport: ViewportState,
): Drawable[] =>
    walls.flatMap((wall): Drawable[] => {
        const { start, end } = wallEndpoints(wall);
        const startPx = planToCanvas(start, viewport);
        const endPx = planToCanvas(end, viewport);
        const segment: SegmentDrawable = {
            type: 'segment',
            layer: 'wall',
            elementId: wall.id,
            start: startPx,
            end: endPx,
            style: { strokeColor: FLOOR_PLAN_PALETTE.wall, lineWidth: WALL_LINE_WIDTH_PX },
        };
        return [segment, cornerMarker(startPx, wall.id), cornerMarker(endPx, wall.id)];
    });

const openingRect = (
    opening: DoorElement | WindowElement,
    viewport: ViewportState,
    fillColor: string,
): RectDrawable => {
    const { position, angle } = decomposeTransform(opening.transform, 'right');
    return {
        type: 'rect',
        layer: opening.kind,
        elementId: opening.id,
        center: planToCanvas(position, viewport),
        width: planLengthToCanvas(opening.dimensions.width, viewport),
        height: OPENING_THICKNESS_PX,
        rotation: angle,
        style: { fillColor },
    };
};

export const buildDoorDrawables = (
    doors: readonly DoorElement[],
    viewport: ViewportState,
): RectDrawable[] => doors.map((door) => openingRect(door, viewport, FLOOR_PLAN_PALETTE.door));

/** Windows add a crossbar along their long axis to tell them apart from doors. */
export const buildWindowDrawables = (
    windows: readonly WindowElement[],
    viewport: ViewportState,
): Drawable[] =>
    windows.flatMap((opening): Drawable[] => {
        const rect = openingRect(opening, viewport, FLOOR_PLAN_PALETTE.window);
        const half = rect.width / 2;
        const crossbar: SegmentDrawable = {
            type: 'segment',
            layer: 'window',
            elementId: opening.id,
            start: rotateLocal(rect.center, -half, 0, rect.rotation),
            end: rotateLocal(rect.center, half, 0, rect.rotation),
            style: { strokeColor: FLOOR_PLAN_PALETTE.windowCrossbar, lineWidth: 1 },
        };
        return [rect, crossbar];
    });

// =============================================================================
// OBJECTS
// =============================================================================

export const buildObjectDrawables = (
    objects: readonly ObjectElement[],
    viewport: ViewportState,
): Drawable[] =>
    objects.flatMap((object): Drawable[] => {
        const { position, angle } = decomposeTransform(object.transform, 'right');
        const center = planToCanvas(position, viewport);
        const width = planLengthToCanvas(object.dimensions.width, viewport);
        const depth = planLengthToCanvas(object.dimensions.depth, viewport);
        const body: RectDrawable = {
            type: 'rect',
            layer: 'object',
            elementId: object.id,
            center,
            width,
            height: depth,
            rotation: angle,
            style: {
                fillColor: FLOOR_PLAN_PALETTE.objectFill,
                strokeColor: FLOOR_PLAN_PALETTE.objectStroke,
                lineWidth: 1.5,
            },
        };
        const frontTick: SegmentDrawable = {
            type: 'segment',
            layer: 'object',
            elementId: object.id,
            start: center,
            end: rotateLocal(center, 0, -(depth / 2) * OBJECT_FRONT_TICK_RATIO, angle),
            style: { strokeColor: FLOOR_PLAN_PALETTE.objectStroke, lineWidth: 2, lineCap: 'round' },
        };
        return [body, frontTick];
    });

// =============================================================================
// DEVICE
// =============================================================================

/**
 * Oriented triangle plus field-of-view wedge. Both point along the transform's
 * forward vector, which maps to (sin yaw, cos yaw) on the canvas.
 */
export const buildDeviceDrawables = (
    transform: RigidTransform,
    viewport: ViewportState,
    fovHalfAngleDeg: number = DEFAULT_FOV_HALF_ANGLE_DEG,
): PolygonDrawable[] => {
    const { position, angle: yaw } = decomposeTransform(transform, 'forward');
    const center = planToCanvas(position, viewport);
    const size = DEVICE_GLYPH_SIZE_PX;
    const forward = { x: Math.sin(yaw), y: Math.cos(yaw) };
    const side = { x: forward.y, y: -forward.x };

    const glyph: PolygonDrawable = {
        type: 'polygon',
        layer: 'device',
        points: [
            offsetPoint(center, forward.x * size, forward.y * size),
            offsetPoint(
                center,
                -forward.x * size * 0.5 - side.x * size * 0.7,
                -forward.y * size * 0.5 - side.y * size * 0.7,
            ),
            offsetPoint(
                center,
                -forward.x * size * 0.5 + side.x * size * 0.7,
                -forward.y * size * 0.5 + side.y * size * 0.7,
            ),
        ],
        style: {
            fillColor: FLOOR_PLAN_PALETTE.device,
            strokeColor: FLOOR_PLAN_PALETTE.deviceOutline,
            lineWidth: 2,
        },
    };

    const half = degToRad(fovHalfAngleDeg);
    const wedge: PolygonDrawable = {
        type: 'polygon',
        layer: 'device',
        points: [
            center,
            offsetPoint(
                center,
                FOV_LENGTH_PX * Math.sin(yaw - half),
                FOV_LENGTH_PX * Math.cos(yaw - half),
            ),
            offsetPoint(
                center,
                FOV_LENGTH_PX * Math.sin(yaw + half),
                FOV_LENGTH_PX * Math.cos(yaw + half),
            ),
        ],
        style: {
            fillColor: FLOOR_PLAN_PALETTE.fovFill,
            strokeColor: FLOOR_PLAN_PALETTE.fovStroke,
            lineWidth: 1,
        },
    };

    return [glyph, wedge];
};

// =============================================================================
// COMBINED PROJECTION
// =============================================================================

export interface ProjectSceneOptions {
    /** Compass heading in degrees; the north indicator is omitted without one. */
    heading?: number | null;
    /**
     * Device pose to draw. Defaults to the wall-centroid estimate; pass null to hide
     * the device glyph.
     */
    devicePose?: RigidTransform | null;
    fovHalfAngleDeg?: number;
    /** Compact preview: scan elements only, without grid, compass, trail or device. */
    elementsOnly?: boolean;
}

/**
 * Project the current scene into drawables, back to front:
 * grid, compass, trail, walls, doors, windows, objects, device.
 * Without a snapshot there is nothing to draw.
 */
export const projectScene = (
    snapshot: Snapshot | null,
    trail: TrailHistory,
    viewport: ViewportState,
    options: ProjectSceneOptions = {},
): Drawable[] => {
    if (!snapshot) {
        return [];
    }

    if (options.elementsOnly) {
        return [
            ...buildWallDrawables(snapshot.walls, viewport),
            ...buildDoorDrawables(snapshot.doors, viewport),
            ...buildWindowDrawables(snapshot.windows, viewport),
            ...buildObjectDrawables(snapshot.objects, viewport),
        ];
    }

    const drawables: Drawable[] = [buildGridDrawable(viewport)];

    const compass = buildCompassDrawable(viewport, options.heading);
    if (compass) {
        drawables.push(compass);
    }

    const trailDrawable = buildTrailDrawable(trailPlanPoints(trail), viewport);
    if (trailDrawable) {
        drawables.push(trailDrawable);
    }

    drawables.push(...buildWallDrawables(snapshot.walls, viewport));
    drawables.push(...buildDoorDrawables(snapshot.doors, viewport));
    drawables.push(...buildWindowDrawables(snapshot.windows, viewport));
    drawables.push(...buildObjectDrawables(snapshot.objects, viewport));

    const devicePose =
        options.devicePose === undefined
            ? (estimateDevicePose(snapshot)?.transform ?? null)
            : options.devicePose;
    if (devicePose) {
        drawables.push(...buildDeviceDrawables(devicePose, viewport, options.fovHalfAngleDeg));
    }

    return drawables;
};
