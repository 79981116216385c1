// @vitest-environment node
import { describe, expect, it } from 'vitest';

import type { WallElement } from '@/types';

import { createRigidTransform, createYawTransform } from '../rigidTransform';
import {
    DEFAULT_FORWARD_DIRECTION,
    DEFAULT_RIGHT_DIRECTION,
    decomposeTransform,
    wallEndpoints,
    wallHalfExtents,
} from '../transformDecomposer';

const createWall = (overrides: Partial<WallElement> = {}): WallElement => ({
    kind: 'wall',
    id: 'wall-1',
    transform: createRigidTransform(),
    dimensions: { width: 4, height: 2.5, thickness: 0.2 },
    ...overrides,
});

describe('decomposeTransform', () => {
    it('reads the right vector angle from +x towards +z', () => {
        const result = decomposeTransform(createYawTransform({ x: 1, y: 0, z: 2 }, Math.PI / 2), 'right');
        expect(result.position).toEqual({ x: 1, z: 2 });
        expect(result.angle).toBeCloseTo(Math.PI / 2);
        expect(result.direction.x).toBeCloseTo(0);
        expect(result.direction.z).toBeCloseTo(1);
        expect(result.degenerate).toBe(false);
    });

    it('reads the forward vector angle as atan2(x, z)', () => {
        // forward = (-sin θ, 0, cos θ), so the forward angle is -θ
        const result = decomposeTransform(
            createYawTransform({ x: 0, y: 0, z: 0 }, Math.PI / 4),
            'forward',
        );
        expect(result.angle).toBeCloseTo(-Math.PI / 4);
    });

    it('normalizes a tilted right vector on the plane', () => {
        const transform = createRigidTransform({ right: { x: 3, y: 5, z: 4 } });
        const { direction, angle } = decomposeTransform(transform, 'right');
        expect(direction.x).toBeCloseTo(0.6);
        expect(direction.z).toBeCloseTo(0.8);
        expect(angle).toBeCloseTo(Math.atan2(0.8, 0.6));
    });

    it('falls back to the identity right direction for a near-vertical right vector', () => {
        const transform = createRigidTransform({ right: { x: 1e-4, y: 1, z: -1e-4 } });
        const result = decomposeTransform(transform, 'right');
        expect(result.degenerate).toBe(true);
        expect(result.direction).toEqual(DEFAULT_RIGHT_DIRECTION);
        expect(result.angle).toBe(0);
    });

    it('falls back to the identity forward direction for a near-zero forward vector', () => {
        const transform = createRigidTransform({ forward: { x: 0, y: 0, z: 0 } });
        const result = decomposeTransform(transform, 'forward');
        expect(result.degenerate).toBe(true);
        expect(result.direction).toEqual(DEFAULT_FORWARD_DIRECTION);
        expect(result.angle).toBe(0);
    });

    it('treats non-finite basis vectors as degenerate', () => {
        const transform = createRigidTransform({ right: { x: Number.NaN, y: 0, z: 1 } });
        const result = decomposeTransform(transform, 'right');
        expect(result.degenerate).toBe(true);
        expect(Number.isFinite(result.angle)).toBe(true);
    });
});

describe('wallEndpoints', () => {
    it('puts a 4 m wall at the origin between (-2, 0) and (2, 0)', () => {
        const wall = createWall({
            transform: createRigidTransform(),
            dimensions: { width: 4, height: 2.5, thickness: 0.2 },
        });
        expect(wallEndpoints(wall)).toEqual({
            start: { x: -2, z: 0 },
            end: { x: 2, z: 0 },
        });
    });

    it('places endpoints at position ± width/2 along the right vector', () => {
        const wall = createWall({ transform: createRigidTransform({ position: { x: 1, y: 0, z: 2 } }) });
        expect(wallEndpoints(wall)).toEqual({
            start: { x: -1, z: 2 },
            end: { x: 3, z: 2 },
        });
    });

    it('recovers position and width from the endpoints of a rotated wall', () => {
        const wall = createWall({
            transform: createYawTransform({ x: -2, y: 1.25, z: 3 }, Math.PI / 6),
            dimensions: { width: 3.5, height: 2.5, thickness: 0.1 },
        });
        const { start, end } = wallEndpoints(wall);
        expect((start.x + end.x) / 2).toBeCloseTo(-2);
        expect((start.z + end.z) / 2).toBeCloseTo(3);
        expect(Math.hypot(end.x - start.x, end.z - start.z)).toBeCloseTo(3.5);
    });

    it('keeps a degenerate wall along +x', () => {
        const wall = createWall({
            transform: createRigidTransform({ right: { x: 0, y: 1, z: 0 } }),
            dimensions: { width: 2, height: 2.5, thickness: 0.2 },
        });
        expect(wallEndpoints(wall)).toEqual({
            start: { x: -1, z: 0 },
            end: { x: 1, z: 0 },
        });
    });
});

describe('wallHalfExtents', () => {
    it('maps width, height and thickness onto x, y and z for an unrotated wall', () => {
        expect(wallHalfExtents(createWall())).toEqual({ x: 2, y: 1.25, z: 0.1 });
    });

    it('swaps the plan extents for a wall turned a quarter turn', () => {
        const half = wallHalfExtents(
            createWall({ transform: createYawTransform({ x: 0, y: 0, z: 0 }, Math.PI / 2) }),
        );
        expect(half.x).toBeCloseTo(0.1);
        expect(half.y).toBeCloseTo(1.25);
        expect(half.z).toBeCloseTo(2);
    });
});
