/**
 * Decomposition of 3D rigid transforms into plan (top-down) geometry.
 *
 * Two conventions are used:
 * - `'right'`: walls, openings and objects. Orientation comes from the right basis
 *   vector, angle = atan2(right.z, right.x).
 * - `'forward'`: the device glyph. Orientation comes from the forward basis vector,
 *   angle = atan2(forward.x, forward.z).
 *
 * A basis vector whose horizontal length is below DIRECTION_EPSILON is replaced by
 * the identity direction for that convention, so noisy input never yields NaN.
 */
import { DIRECTION_EPSILON } from '@/constants/floorPlan';
import type { PlanPoint, RigidTransform, Vec3, WallElement } from '@/types';

import {
    transformForward,
    transformPosition,
    transformRight,
    transformUp,
} from './rigidTransform';

export type OrientationConvention = 'right' | 'forward';

export interface PlanDecomposition {
    position: PlanPoint;
    /** Unit direction on the plane. */
    direction: PlanPoint;
    /** Radians; see module docs for the per-convention formula. */
    angle: number;
    /** True when the fallback direction was substituted. */
    degenerate: boolean;
}

export const DEFAULT_RIGHT_DIRECTION: PlanPoint = { x: 1, z: 0 };
export const DEFAULT_FORWARD_DIRECTION: PlanPoint = { x: 0, z: 1 };

export const toPlanPoint = (v: Vec3): PlanPoint => ({ x: v.x, z: v.z });

const planDirection = (
    v: Vec3,
    fallback: PlanPoint,
): { direction: PlanPoint; degenerate: boolean } => {
    const length = Math.hypot(v.x, v.z);
    if (!Number.isFinite(length) || length < DIRECTION_EPSILON) {
        return { direction: { ...fallback }, degenerate: true };
    }
    return { direction: { x: v.x / length, z: v.z / length }, degenerate: false };
};

export const decomposeTransform = (
    transform: RigidTransform,
    convention: OrientationConvention,
): PlanDecomposition => {
    const position = toPlanPoint(transformPosition(transform));
    if (convention === 'forward') {
        const { direction, degenerate } = planDirection(
            transformForward(transform),
            DEFAULT_FORWARD_DIRECTION,
        );
        return {
            position,
            direction,
            angle: Math.atan2(direction.x, direction.z),
            degenerate,
        };
    }
    const { direction, degenerate } = planDirection(
        transformRight(transform),
        DEFAULT_RIGHT_DIRECTION,
    );
    return {
        position,
        direction,
        angle: Math.atan2(direction.z, direction.x),
        degenerate,
    };
};

export interface PlanSegment {
    start: PlanPoint;
    end: PlanPoint;
}

/** Endpoints at position ± width/2 along the normalized horizontal right vector. */
export const segmentEndpoints = (transform: RigidTransform, width: number): PlanSegment => {
    const { position, direction } = decomposeTransform(transform, 'right');
    const half = width / 2;
    return {
        start: { x: position.x - direction.x * half, z: position.z - direction.z * half },
        end: { x: position.x + direction.x * half, z: position.z + direction.z * half },
    };
};

export const wallEndpoints = (wall: WallElement): PlanSegment =>
    segmentEndpoints(wall.transform, wall.dimensions.width);

const finiteAbs = (value: number): number => (Number.isFinite(value) ? Math.abs(value) : 0);

/**
 * Per-axis half-extent of the wall's oriented box (width along right, height along up,
 * thickness along forward).
 */
export const wallHalfExtents = (wall: WallElement): Vec3 => {
    const right = transformRight(wall.transform);
    const up = transformUp(wall.transform);
    const forward = transformForward(wall.transform);
    const hw = wall.dimensions.width / 2;
    const hh = wall.dimensions.height / 2;
    const ht = wall.dimensions.thickness / 2;
    return {
        x: finiteAbs(right.x) * hw + finiteAbs(up.x) * hh + finiteAbs(forward.x) * ht,
        y: finiteAbs(right.y) * hw + finiteAbs(up.y) * hh + finiteAbs(forward.y) * ht,
        z: finiteAbs(right.z) * hw + finiteAbs(up.z) * hh + finiteAbs(forward.z) * ht,
    };
};
