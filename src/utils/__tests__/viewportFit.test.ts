// @vitest-environment node
import { describe, expect, it } from 'vitest';

import type { WallElement } from '@/types';

import { createRigidTransform, createYawTransform } from '../rigidTransform';
import { wallEndpoints } from '../transformDecomposer';
import {
    commitPan,
    computeFitScale,
    computePlanBounds,
    createPanState,
    currentPan,
    dragPan,
    fitPreset,
    fitViewport,
    planLengthToCanvas,
    planToCanvas,
    resetPan,
} from '../viewportFit';

const createWall = (id: string, overrides: Partial<WallElement> = {}): WallElement => ({
    kind: 'wall',
    id,
    transform: createRigidTransform(),
    dimensions: { width: 4, height: 2.5, thickness: 0.2 },
    ...overrides,
});

describe('computePlanBounds', () => {
    it('returns null when neither walls nor trail contribute', () => {
        expect(computePlanBounds([], [])).toBeNull();
    });

    it('pads the wall extents', () => {
        expect(computePlanBounds([createWall('w1')], [], 0.5)).toEqual({
            minX: -2.5,
            maxX: 2.5,
            minZ: -0.6,
            maxZ: 0.6,
        });
    });

    it('includes trail positions', () => {
        expect(computePlanBounds([], [{ x: 1, z: 2 }], 0.5)).toEqual({
            minX: 0.5,
            maxX: 1.5,
            minZ: 1.5,
            maxZ: 2.5,
        });
    });

    it('skips non-finite trail positions', () => {
        expect(computePlanBounds([], [{ x: Number.NaN, z: 0 }])).toBeNull();
    });
});

describe('computeFitScale', () => {
    const canvas = { width: 400, height: 300 };

    it('fits the tighter axis with the margin factor', () => {
        const bounds = { minX: -2.5, maxX: 2.5, minZ: -0.6, maxZ: 0.6 };
        // min(400 / 5, 300 / 1.2) * 0.85
        expect(computeFitScale(bounds, canvas)).toBeCloseTo(68);
    });

    it('uses the default scale for empty or degenerate extents', () => {
        expect(computeFitScale(null, canvas)).toBe(20);
        expect(computeFitScale({ minX: 0, maxX: 0, minZ: 0, maxZ: 5 }, canvas)).toBe(20);
        expect(computeFitScale({ minX: 0, maxX: 5, minZ: 1, maxZ: 1.0005 }, canvas)).toBe(20);
    });

    it('uses the default scale for a canvas without area', () => {
        const bounds = { minX: 0, maxX: 5, minZ: 0, maxZ: 5 };
        expect(computeFitScale(bounds, { width: 0, height: 300 })).toBe(20);
        expect(computeFitScale(bounds, { width: Number.NaN, height: 300 })).toBe(20);
    });

    it('honours a custom default scale', () => {
        expect(computeFitScale(null, canvas, 0.85, 35)).toBe(35);
    });
});

describe('fitViewport', () => {
    it('centers the world origin for an empty scene', () => {
        const viewport = fitViewport({ bounds: null, canvasSize: { width: 400, height: 300 } });
        expect(viewport.scale).toBe(20);
        expect(planToCanvas({ x: 0, z: 0 }, viewport)).toEqual({ x: 200, y: 150 });
    });

    it('adds the pan delta on top of the fitted offset', () => {
        const viewport = fitViewport({
            bounds: null,
            canvasSize: { width: 400, height: 300 },
            pan: { x: 10, y: -5 },
        });
        expect(planToCanvas({ x: 0, z: 0 }, viewport)).toEqual({ x: 210, y: 145 });
        expect(viewport.offset).toEqual({ x: 200, y: 150 });
    });

    it('centers the bounding box', () => {
        const viewport = fitViewport({
            bounds: { minX: 0, maxX: 4, minZ: 0, maxZ: 2 },
            canvasSize: { width: 400, height: 300 },
            marginFactor: 1,
        });
        // min(400 / 4, 300 / 2) = 100
        expect(viewport.scale).toBe(100);
        expect(planToCanvas({ x: 2, z: 1 }, viewport)).toEqual({ x: 200, y: 150 });
        expect(planLengthToCanvas(1.5, viewport)).toBe(150);
    });

    it('keeps every wall endpoint inside the canvas minus the margin', () => {
        const walls = [
            createWall('w1', {
                transform: createRigidTransform({ position: { x: 0, y: 1.25, z: -2 } }),
            }),
            createWall('w2', {
                transform: createYawTransform({ x: 2, y: 1.25, z: 0 }, Math.PI / 2),
            }),
            createWall('w3', {
                transform: createYawTransform({ x: -1, y: 1.25, z: 1 }, Math.PI / 4),
                dimensions: { width: 3, height: 2.5, thickness: 0.15 },
            }),
        ];
        const canvasSize = { width: 360, height: 640 };
        const viewport = fitViewport({
            bounds: computePlanBounds(walls, [], 0.5),
            canvasSize,
        });
        const marginX = (canvasSize.width * (1 - 0.85)) / 2;
        const marginY = (canvasSize.height * (1 - 0.85)) / 2;

        for (const wall of walls) {
            const { start, end } = wallEndpoints(wall);
            for (const point of [start, end]) {
                const projected = planToCanvas(point, viewport);
                expect(projected.x).toBeGreaterThan(marginX);
                expect(projected.x).toBeLessThan(canvasSize.width - marginX);
                expect(projected.y).toBeGreaterThan(marginY);
                expect(projected.y).toBeLessThan(canvasSize.height - marginY);
            }
        }
    });
});

describe('fitPreset', () => {
    it('returns independent copies of the named presets', () => {
        const preview = fitPreset('preview');
        expect(preview).toEqual({
            padding: 0.5,
            marginFactor: 0.9,
            defaultScale: 20,
            includeTrail: false,
        });
        preview.marginFactor = 0.1;
        expect(fitPreset('preview').marginFactor).toBe(0.9);
        expect(fitPreset('mapping').includeTrail).toBe(true);
    });
});

describe('pan state', () => {
    it('accumulates committed drags', () => {
        let pan = createPanState();
        pan = dragPan(pan, { x: 10, y: 5 });
        expect(currentPan(pan)).toEqual({ x: 10, y: 5 });
        pan = commitPan(pan);
        expect(pan).toEqual({ committed: { x: 10, y: 5 }, drag: null });

        pan = dragPan(pan, { x: -4, y: 1 });
        expect(currentPan(pan)).toEqual({ x: 6, y: 6 });
        expect(commitPan(pan).committed).toEqual({ x: 6, y: 6 });
    });

    it('replaces rather than adds the in-progress translation', () => {
        let pan = dragPan(createPanState(), { x: 3, y: 3 });
        pan = dragPan(pan, { x: 5, y: 2 });
        expect(currentPan(pan)).toEqual({ x: 5, y: 2 });
    });

    it('resets to zero', () => {
        expect(resetPan()).toEqual({ committed: { x: 0, y: 0 }, drag: null });
    });
});
