/**
 * Live floor plan session.
 *
 * Pure state transitions over the latest snapshot, trail, heading and pan. Each
 * function returns a new state; the host keeps the current one and asks for a frame
 * whenever it redraws.
 */
import { DEFAULT_FLOOR_PLAN_SETTINGS, type FloorPlanSettings } from '@/constants/floorPlan';
import { projectScene } from '@/overlays/builders';
import type { Drawable } from '@/overlays/types';
import type {
    CanvasPoint,
    CanvasSize,
    PanState,
    RigidTransform,
    Snapshot,
    TrailHistory,
    ViewportState,
} from '@/types';
import { normalizeHeading } from '@/utils/compass';
import { transformPosition } from '@/utils/rigidTransform';
import { createTrailHistory, recordTrailSample, trailPlanPoints } from '@/utils/trailHistory';
import {
    commitPan,
    computePlanBounds,
    createPanState,
    currentPan,
    dragPan,
    fitPreset,
    fitViewport,
    type FitPresetName,
    type FitSettings,
} from '@/utils/viewportFit';

import { estimateDevicePose } from './devicePoseEstimator';

/** Where the device pose comes from: the wall centroid, or the host's tracking. */
export type DevicePoseSource = 'estimate' | 'tracked';

export interface FloorPlanSessionState {
    settings: FloorPlanSettings;
    snapshot: Snapshot | null;
    trail: TrailHistory;
    /** Degrees in [0, 360), or null when no heading is available. */
    heading: number | null;
    pan: PanState;
    devicePose: RigidTransform | null;
    poseSource: DevicePoseSource;
}

export interface FloorPlanFrame {
    viewport: ViewportState;
    drawables: Drawable[];
}

export const createFloorPlanSession = (
    settings: FloorPlanSettings = DEFAULT_FLOOR_PLAN_SETTINGS,
): FloorPlanSessionState => ({
    settings: { ...settings },
    snapshot: null,
    trail: createTrailHistory({
        capacity: settings.trailCapacity,
        minIntervalMs: settings.trailIntervalMs,
    }),
    heading: null,
    pan: createPanState(),
    devicePose: null,
    poseSource: 'estimate',
});

/**
 * Swap in a new snapshot and feed the estimated device position into the trail.
 * Without walls the pose is cleared and the trail is left untouched. Once a tracked
 * pose has arrived, only the snapshot changes.
 */
export const applySnapshot = (
    state: FloorPlanSessionState,
    snapshot: Snapshot,
    nowMs: number,
): FloorPlanSessionState => {
    if (state.poseSource === 'tracked') {
        return { ...state, snapshot };
    }
    const estimate = estimateDevicePose(snapshot);
    return {
        ...state,
        snapshot,
        devicePose: estimate?.transform ?? null,
        trail: estimate ? recordTrailSample(state.trail, estimate.position, nowMs) : state.trail,
    };
};

/** Use a tracked device pose instead of the wall-centroid estimate until the next reset. */
export const applyDevicePose = (
    state: FloorPlanSessionState,
    transform: RigidTransform,
    nowMs: number,
): FloorPlanSessionState => ({
    ...state,
    devicePose: transform,
    poseSource: 'tracked',
    trail: recordTrailSample(state.trail, transformPosition(transform), nowMs),
});

export const applyHeading = (
    state: FloorPlanSessionState,
    heading: number | null | undefined,
): FloorPlanSessionState => ({
    ...state,
    heading: normalizeHeading(heading),
});

export const applyPanDrag = (
    state: FloorPlanSessionState,
    translation: CanvasPoint,
): FloorPlanSessionState => ({
    ...state,
    pan: dragPan(state.pan, translation),
});

export const commitPanDrag = (state: FloorPlanSessionState): FloorPlanSessionState => ({
    ...state,
    pan: commitPan(state.pan),
});

/** Replace the settings; the trail keeps its newest samples that fit the new capacity. */
export const applySettings = (
    state: FloorPlanSessionState,
    settings: FloorPlanSettings,
): FloorPlanSessionState => {
    const trail = createTrailHistory({
        capacity: settings.trailCapacity,
        minIntervalMs: settings.trailIntervalMs,
    });
    const samples = state.trail.samples.slice(-trail.capacity);
    return {
        ...state,
        settings: { ...settings },
        trail: {
            ...trail,
            samples,
            lastAcceptedAtMs: state.trail.lastAcceptedAtMs,
        },
    };
};

/** New scan: drop snapshot, trail, pose source and pan. Settings and heading carry over. */
export const resetFloorPlanSession = (state: FloorPlanSessionState): FloorPlanSessionState => ({
    ...createFloorPlanSession(state.settings),
    heading: state.heading,
});

/** The mapping view follows the session settings; the preview keeps its own margin. */
const resolveFitSettings = (state: FloorPlanSessionState, preset: FitPresetName): FitSettings => {
    const base = fitPreset(preset);
    if (preset === 'preview') {
        return { ...base, defaultScale: state.settings.defaultScale };
    }
    return {
        ...base,
        padding: state.settings.fitPadding,
        marginFactor: state.settings.marginFactor,
        defaultScale: state.settings.defaultScale,
    };
};

export const computeFrame = (
    state: FloorPlanSessionState,
    canvasSize: CanvasSize,
    preset: FitPresetName = 'mapping',
): FloorPlanFrame => {
    const fit = resolveFitSettings(state, preset);
    const walls = state.snapshot?.walls ?? [];
    const trail = fit.includeTrail ? trailPlanPoints(state.trail) : [];
    const viewport = fitViewport({
        bounds: computePlanBounds(walls, trail, fit.padding),
        canvasSize,
        pan: currentPan(state.pan),
        marginFactor: fit.marginFactor,
        defaultScale: fit.defaultScale,
    });
    const drawables = projectScene(state.snapshot, state.trail, viewport, {
        heading: state.heading,
        devicePose: state.devicePose,
        fovHalfAngleDeg: state.settings.fovHalfAngleDeg,
        elementsOnly: !fit.includeTrail,
    });
    return { viewport, drawables };
};
