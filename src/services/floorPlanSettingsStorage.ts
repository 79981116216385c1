import {
    DEFAULT_FLOOR_PLAN_SETTINGS,
    MAX_DEFAULT_SCALE,
    MAX_FIT_PADDING_M,
    MAX_FOV_HALF_ANGLE_DEG,
    MAX_MARGIN_FACTOR,
    MAX_TRAIL_CAPACITY,
    MAX_TRAIL_INTERVAL_MS,
    MIN_DEFAULT_SCALE,
    MIN_FIT_PADDING_M,
    MIN_FOV_HALF_ANGLE_DEG,
    MIN_MARGIN_FACTOR,
    MIN_TRAIL_CAPACITY,
    MIN_TRAIL_INTERVAL_MS,
    type FloorPlanSettings,
} from '@/constants/floorPlan';

const STORAGE_KEY = 'roomscan:floorplan-settings';
export const FLOOR_PLAN_SETTINGS_STORAGE_KEY = STORAGE_KEY;
const CURRENT_VERSION = 1;

interface StoredPayload {
    version: number;
    settings: FloorPlanSettings;
}

const clampRange = (value: number, min: number, max: number): number =>
    Math.min(max, Math.max(min, value));

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (value: unknown, fallback: number, min: number, max: number): number =>
    isFiniteNumber(value) ? clampRange(value, min, max) : fallback;

/** Clamp every field into its supported range; missing or invalid fields fall back to defaults. */
export const sanitizeFloorPlanSettings = (input: unknown): FloorPlanSettings => {
    const candidate = isRecord(input) ? input : {};
    const defaults = DEFAULT_FLOOR_PLAN_SETTINGS;
    return {
        trailCapacity: Math.round(
            readNumber(
                candidate.trailCapacity,
                defaults.trailCapacity,
                MIN_TRAIL_CAPACITY,
                MAX_TRAIL_CAPACITY,
            ),
        ),
        trailIntervalMs: readNumber(
            candidate.trailIntervalMs,
            defaults.trailIntervalMs,
            MIN_TRAIL_INTERVAL_MS,
            MAX_TRAIL_INTERVAL_MS,
        ),
        fitPadding: readNumber(
            candidate.fitPadding,
            defaults.fitPadding,
            MIN_FIT_PADDING_M,
            MAX_FIT_PADDING_M,
        ),
        marginFactor: readNumber(
            candidate.marginFactor,
            defaults.marginFactor,
            MIN_MARGIN_FACTOR,
            MAX_MARGIN_FACTOR,
        ),
        defaultScale: readNumber(
            candidate.defaultScale,
            defaults.defaultScale,
            MIN_DEFAULT_SCALE,
            MAX_DEFAULT_SCALE,
        ),
        fovHalfAngleDeg: readNumber(
            candidate.fovHalfAngleDeg,
            defaults.fovHalfAngleDeg,
            MIN_FOV_HALF_ANGLE_DEG,
            MAX_FOV_HALF_ANGLE_DEG,
        ),
    };
};

export const loadFloorPlanSettings = (storage: Storage | undefined): FloorPlanSettings | null => {
    if (!storage) {
        return null;
    }
    const raw = storage.getItem(STORAGE_KEY);
    if (!raw) {
        return null;
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        if (!isRecord(parsed) || parsed.version !== CURRENT_VERSION) {
            return null;
        }
        return sanitizeFloorPlanSettings(parsed.settings);
    } catch (error) {
        console.warn('Failed to parse floor plan settings', error);
        return null;
    }
};

export const persistFloorPlanSettings = (
    storage: Storage | undefined,
    settings: FloorPlanSettings,
): void => {
    if (!storage) {
        return;
    }
    const payload: StoredPayload = {
        version: CURRENT_VERSION,
        settings: sanitizeFloorPlanSettings(settings),
    };
    try {
        storage.setItem(STORAGE_KEY, JSON.stringify(payload));
    } catch (error) {
        console.warn('Failed to persist floor plan settings', error);
    }
};

export const getInitialFloorPlanSettings = (storage: Storage | undefined): FloorPlanSettings =>
    loadFloorPlanSettings(storage) ?? { ...DEFAULT_FLOOR_PLAN_SETTINGS };
