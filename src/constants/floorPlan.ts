export const DIRECTION_EPSILON = 1e-3;
export const EXTENT_EPSILON = 1e-3;

export const DEFAULT_TRAIL_CAPACITY = 200;
export const DEFAULT_TRAIL_INTERVAL_MS = 200;

export const DEFAULT_FIT_PADDING_M = 0.5;
export const DEFAULT_MARGIN_FACTOR = 0.85;
export const PREVIEW_MARGIN_FACTOR = 0.9;
/** Pixels per meter when the scene has no usable extent. */
export const DEFAULT_SCALE_PX_PER_M = 20;

export const MIN_TRAIL_CAPACITY = 2;
export const MAX_TRAIL_CAPACITY = 5_000;
export const MIN_TRAIL_INTERVAL_MS = 0;
export const MAX_TRAIL_INTERVAL_MS = 10_000;
export const MIN_FIT_PADDING_M = 0;
export const MAX_FIT_PADDING_M = 5;
export const MIN_MARGIN_FACTOR = 0.1;
export const MAX_MARGIN_FACTOR = 1;
export const MIN_DEFAULT_SCALE = 1;
export const MAX_DEFAULT_SCALE = 500;
export const MIN_FOV_HALF_ANGLE_DEG = 5;
export const MAX_FOV_HALF_ANGLE_DEG = 85;

export const GRID_SPACING_M = 1;
export const WALL_LINE_WIDTH_PX = 6;
export const CORNER_MARKER_RADIUS_PX = 5;
export const OPENING_THICKNESS_PX = 6;
export const OBJECT_FRONT_TICK_RATIO = 1.3;
export const DEVICE_GLYPH_SIZE_PX = 12;
export const DEFAULT_FOV_HALF_ANGLE_DEG = 30;
export const FOV_LENGTH_PX = 40;
export const COMPASS_ARROW_LENGTH_PX = 30;
export const COMPASS_CENTER_TOP_PX = 50;
export const TRAIL_DASH_PATTERN: readonly number[] = [5, 3];

export interface FloorPlanSettings {
    trailCapacity: number;
    trailIntervalMs: number;
    fitPadding: number;
    marginFactor: number;
    defaultScale: number;
    fovHalfAngleDeg: number;
}

export const DEFAULT_FLOOR_PLAN_SETTINGS: FloorPlanSettings = {
    trailCapacity: DEFAULT_TRAIL_CAPACITY,
    trailIntervalMs: DEFAULT_TRAIL_INTERVAL_MS,
    fitPadding: DEFAULT_FIT_PADDING_M,
    marginFactor: DEFAULT_MARGIN_FACTOR,
    defaultScale: DEFAULT_SCALE_PX_PER_M,
    fovHalfAngleDeg: DEFAULT_FOV_HALF_ANGLE_DEG,
};

export const FLOOR_PLAN_PALETTE = {
    background: 'rgba(0, 0, 0, 0.9)',
    grid: 'rgba(255, 255, 255, 0.1)',
    compass: 'rgba(239, 68, 68, 0.6)',
    compassLabel: '#ffffff',
    trail: 'rgba(59, 130, 246, 0.5)',
    wall: '#22c55e',
    corner: '#facc15',
    door: 'rgba(161, 98, 7, 0.8)',
    window: 'rgba(6, 182, 212, 0.6)',
    windowCrossbar: '#06b6d4',
    objectFill: 'rgba(249, 115, 22, 0.4)',
    objectStroke: '#f97316',
    device: '#ef4444',
    deviceOutline: '#ffffff',
    fovFill: 'rgba(239, 68, 68, 0.2)',
    fovStroke: 'rgba(239, 68, 68, 0.5)',
} as const;

export interface LegendItem {
    label: string;
    color: string;
    icon?: 'location';
}

export const LEGEND_ITEMS: readonly LegendItem[] = [
    { label: 'Walls', color: FLOOR_PLAN_PALETTE.wall },
    { label: 'Doors', color: FLOOR_PLAN_PALETTE.door },
    { label: 'Windows', color: FLOOR_PLAN_PALETTE.windowCrossbar },
    { label: 'Objects', color: FLOOR_PLAN_PALETTE.objectStroke },
    { label: 'You', color: FLOOR_PLAN_PALETTE.device, icon: 'location' },
];
