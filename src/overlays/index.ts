/**
 * Declarative floor plan drawables.
 *
 * This module provides:
 * - Drawable descriptors in canvas pixel space
 * - Builders projecting a scan snapshot, trail and viewport to drawables
 * - A pure Canvas 2D renderer
 */

// Types
export type {
    CircleDrawable,
    CompassDrawable,
    Drawable,
    DrawLayer,
    GridDrawable,
    PolygonDrawable,
    PolylineDrawable,
    RectDrawable,
    SegmentDrawable,
    ShapeStyle,
    StrokeStyle,
} from './types';

export { DRAW_LAYER_ORDER } from './types';

// Builders
export {
    buildCompassDrawable,
    buildDeviceDrawables,
    buildDoorDrawables,
    buildGridDrawable,
    buildObjectDrawables,
    buildTrailDrawable,
    buildWallDrawables,
    buildWindowDrawables,
    projectScene,
} from './builders';

export type { ProjectSceneOptions } from './builders';

// Renderer
export { renderDrawables } from './renderer';

export type { RenderOptions } from './renderer';
