// =============================================================================
// VECTORS & TRANSFORMS
// =============================================================================

/** World-space vector in meters. `y` is the vertical axis. */
export interface Vec3 {
    x: number;
    y: number;
    z: number;
}

/** Point on the horizontal scan plane (world x/z, meters). */
export interface PlanPoint {
    x: number;
    z: number;
}

/** Point in canvas pixels. */
export interface CanvasPoint {
    x: number;
    y: number;
}

export interface CanvasSize {
    width: number;
    height: number;
}

export type Vec4Tuple = [number, number, number, number];

/**
 * 4×4 homogeneous matrix stored as columns:
 * `[right, up, forward, translation]`, each `[x, y, z, w]`.
 */
export type Matrix4 = [Vec4Tuple, Vec4Tuple, Vec4Tuple, Vec4Tuple];

export interface RigidTransform {
    readonly columns: Matrix4;
}

// =============================================================================
// SCAN ELEMENTS
// =============================================================================

export interface SurfaceDimensions {
    width: number;
    height: number;
    thickness: number;
}

export interface ObjectDimensions {
    width: number;
    height: number;
    depth: number;
}

export type SurfaceKind = 'wall' | 'door' | 'window';

interface SurfaceBase<K extends SurfaceKind> {
    kind: K;
    id: string;
    transform: RigidTransform;
    dimensions: SurfaceDimensions;
}

export type WallElement = SurfaceBase<'wall'>;
export type DoorElement = SurfaceBase<'door'>;
export type WindowElement = SurfaceBase<'window'>;

export type SurfaceElement = WallElement | DoorElement | WindowElement;

export const OBJECT_CATEGORIES = [
    'storage',
    'refrigerator',
    'stove',
    'bed',
    'sink',
    'washerDryer',
    'toilet',
    'bathtub',
    'oven',
    'dishwasher',
    'table',
    'sofa',
    'chair',
    'fireplace',
    'television',
    'stairs',
] as const;

export type ObjectCategory = (typeof OBJECT_CATEGORIES)[number];

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export interface ObjectElement {
    id: string;
    transform: RigidTransform;
    dimensions: ObjectDimensions;
    category: ObjectCategory;
    confidence: ConfidenceLevel;
}

/** Complete geometry of one capture update. Replaced wholesale on every update. */
export interface Snapshot {
    readonly walls: readonly WallElement[];
    readonly doors: readonly DoorElement[];
    readonly windows: readonly WindowElement[];
    readonly objects: readonly ObjectElement[];
}

/**
 * Approximate device pose: the centroid of the current wall positions with identity
 * orientation. The capture API does not expose the tracked camera pose.
 */
export interface DevicePoseEstimate {
    position: Vec3;
    transform: RigidTransform;
}

// =============================================================================
// TRAIL & VIEWPORT
// =============================================================================

export interface TrailSample {
    position: Vec3;
    timestampMs: number;
}

export interface TrailHistory {
    samples: TrailSample[];
    capacity: number;
    minIntervalMs: number;
    /** Timestamp of the last accepted sample; survives eviction. */
    lastAcceptedAtMs: number | null;
}

export interface PlanBounds {
    minX: number;
    maxX: number;
    minZ: number;
    maxZ: number;
}

export interface ViewportState {
    canvasSize: CanvasSize;
    /** Canvas pixels per meter. */
    scale: number;
    /** Fitted offset in pixels. */
    offset: CanvasPoint;
    /** User pan delta in pixels, added on top of `offset`. */
    pan: CanvasPoint;
}

export interface PanState {
    committed: CanvasPoint;
    /** Translation of the drag in progress, if any. */
    drag: CanvasPoint | null;
}

// =============================================================================
// EXPORT DOCUMENT
// =============================================================================

export interface RoomDimensions {
    width: number;
    height: number;
    length: number;
}

export interface ExportPositionTransform {
    position: Vec3;
}

export interface ExportWallRecord {
    id: string;
    dimensions: SurfaceDimensions;
    transform: ExportPositionTransform & { matrix: Matrix4 };
}

export interface ExportOpeningRecord {
    id: string;
    dimensions: ObjectDimensions;
    transform: ExportPositionTransform;
}

export interface ExportObjectRecord {
    id: string;
    category: ObjectCategory;
    confidence: ConfidenceLevel;
    dimensions: ObjectDimensions;
    transform: ExportPositionTransform;
}

export interface ScanExportDocument {
    dimensions: RoomDimensions;
    walls: ExportWallRecord[];
    doors: ExportOpeningRecord[];
    windows: ExportOpeningRecord[];
    objects: ExportObjectRecord[];
}

// =============================================================================
// SCAN LIBRARY
// =============================================================================

export interface ScanRecord {
    id: string;
    name: string;
    /** ISO-8601 timestamp */
    savedAt: string;
    fileName: string;
}
