/**
 * Declarative drawables for the floor plan canvas.
 *
 * All positions are already projected to canvas pixels through the current
 * ViewportState. Lists are ordered back to front; the renderer draws them in order.
 */
import type { CanvasPoint, CanvasSize } from '@/types';
import type { CompassPoint } from '@/utils/compass';

// =============================================================================
// STYLE TYPES
// =============================================================================

export interface StrokeStyle {
    strokeColor: string;
    lineWidth: number;
    dash?: readonly number[];
    lineCap?: CanvasLineCap;
}

export interface ShapeStyle {
    fillColor?: string;
    strokeColor?: string;
    lineWidth?: number;
}

/** Scene layer a drawable belongs to, in z-order. */
export type DrawLayer =
    | 'grid'
    | 'compass'
    | 'trail'
    | 'wall'
    | 'door'
    | 'window'
    | 'object'
    | 'device';

export const DRAW_LAYER_ORDER: readonly DrawLayer[] = [
    'grid',
    'compass',
    'trail',
    'wall',
    'door',
    'window',
    'object',
    'device',
];

interface DrawableBase {
    layer: DrawLayer;
    /** Id of the scan element this drawable was built from. */
    elementId?: string;
}

// =============================================================================
// DRAWABLE TYPES (Discriminated Union)
// =============================================================================

/** 1 m grid spanning the whole canvas; `origin` is any grid intersection. */
export interface GridDrawable extends DrawableBase {
    type: 'grid';
    size: CanvasSize;
    origin: CanvasPoint;
    spacing: number;
    style: StrokeStyle;
}

export interface CompassDrawable extends DrawableBase {
    type: 'compass';
    center: CanvasPoint;
    tip: CanvasPoint;
    /** Degrees in [0, 360). */
    heading: number;
    label: CompassPoint;
    style: StrokeStyle & { labelColor: string };
}

export interface PolylineDrawable extends DrawableBase {
    type: 'polyline';
    points: CanvasPoint[];
    style: StrokeStyle;
}

export interface SegmentDrawable extends DrawableBase {
    type: 'segment';
    start: CanvasPoint;
    end: CanvasPoint;
    style: StrokeStyle;
}

export interface CircleDrawable extends DrawableBase {
    type: 'circle';
    center: CanvasPoint;
    radius: number;
    style: ShapeStyle;
}

/** Rectangle centered on `center`, rotated by `rotation` radians (canvas y down). */
export interface RectDrawable extends DrawableBase {
    type: 'rect';
    center: CanvasPoint;
    width: number;
    height: number;
    rotation: number;
    style: ShapeStyle;
}

export interface PolygonDrawable extends DrawableBase {
    type: 'polygon';
    points: CanvasPoint[];
    style: ShapeStyle;
}

export type Drawable =
    | GridDrawable
    | CompassDrawable
    | PolylineDrawable
    | SegmentDrawable
    | CircleDrawable
    | RectDrawable
    | PolygonDrawable;
