import { DEFAULT_TRAIL_CAPACITY, DEFAULT_TRAIL_INTERVAL_MS } from '@/constants/floorPlan';
import type { PlanPoint, TrailHistory, Vec3 } from '@/types';

export interface TrailHistoryOptions {
    capacity?: number;
    minIntervalMs?: number;
}

export const createTrailHistory = (options: TrailHistoryOptions = {}): TrailHistory => ({
    samples: [],
    capacity: Math.max(1, Math.floor(options.capacity ?? DEFAULT_TRAIL_CAPACITY)),
    minIntervalMs: Math.max(0, options.minIntervalMs ?? DEFAULT_TRAIL_INTERVAL_MS),
    lastAcceptedAtMs: null,
});

/**
 * Append a raw position estimate. The sample is accepted only when strictly more than
 * `minIntervalMs` has elapsed since the last accepted sample; the oldest samples are
 * evicted once `capacity` is exceeded. Returns the same object when rejected.
 */
export const recordTrailSample = (
    history: TrailHistory,
    position: Vec3,
    timestampMs: number,
): TrailHistory => {
    if (!Number.isFinite(timestampMs)) {
        return history;
    }
    if (
        history.lastAcceptedAtMs !== null &&
        timestampMs - history.lastAcceptedAtMs <= history.minIntervalMs
    ) {
        return history;
    }
    const appended = [...history.samples, { position: { ...position }, timestampMs }];
    const samples =
        appended.length > history.capacity
            ? appended.slice(appended.length - history.capacity)
            : appended;
    return {
        ...history,
        samples,
        lastAcceptedAtMs: timestampMs,
    };
};

export const resetTrailHistory = (history: TrailHistory): TrailHistory => ({
    ...history,
    samples: [],
    lastAcceptedAtMs: null,
});

export const trailPlanPoints = (history: TrailHistory): PlanPoint[] =>
    history.samples.map((sample) => ({ x: sample.position.x, z: sample.position.z }));
