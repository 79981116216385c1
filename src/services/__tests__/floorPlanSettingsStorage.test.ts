// @vitest-environment node
import { afterEach, describe, expect, it, vi } from 'vitest';

import { DEFAULT_FLOOR_PLAN_SETTINGS } from '@/constants/floorPlan';

import {
    FLOOR_PLAN_SETTINGS_STORAGE_KEY,
    getInitialFloorPlanSettings,
    loadFloorPlanSettings,
    persistFloorPlanSettings,
    sanitizeFloorPlanSettings,
} from '../floorPlanSettingsStorage';

class MemoryStorage implements Storage {
    private store = new Map<string, string>();

    get length(): number {
        return this.store.size;
    }

    clear(): void {
        this.store.clear();
    }

    getItem(key: string): string | null {
        return this.store.has(key) ? (this.store.get(key) ?? null) : null;
    }

    key(index: number): string | null {
        return Array.from(this.store.keys())[index] ?? null;
    }

    removeItem(key: string): void {
        this.store.delete(key);
    }

    setItem(key: string, value: string): void {
        this.store.set(key, value);
    }
}

describe('floorPlanSettingsStorage', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('falls back to defaults when nothing is stored', () => {
        const storage = new MemoryStorage();
        expect(loadFloorPlanSettings(storage)).toBeNull();
        expect(getInitialFloorPlanSettings(storage)).toEqual(DEFAULT_FLOOR_PLAN_SETTINGS);
        expect(getInitialFloorPlanSettings(undefined)).toEqual(DEFAULT_FLOOR_PLAN_SETTINGS);
    });

    it('persists and reloads settings', () => {
        const storage = new MemoryStorage();
        const settings = {
            trailCapacity: 120,
            trailIntervalMs: 100,
            fitPadding: 1,
            marginFactor: 0.9,
            defaultScale: 30,
            fovHalfAngleDeg: 40,
        };
        persistFloorPlanSettings(storage, settings);
        expect(loadFloorPlanSettings(storage)).toEqual(settings);
    });

    it('clamps out-of-range values and defaults invalid ones', () => {
        const storage = new MemoryStorage();
        storage.setItem(
            FLOOR_PLAN_SETTINGS_STORAGE_KEY,
            JSON.stringify({
                version: 1,
                settings: {
                    trailCapacity: 99_999,
                    trailIntervalMs: -5,
                    fitPadding: 'wide',
                    marginFactor: 2,
                    defaultScale: 0,
                    fovHalfAngleDeg: 30,
                },
            }),
        );
        expect(loadFloorPlanSettings(storage)).toEqual({
            trailCapacity: 5000,
            trailIntervalMs: 0,
            fitPadding: 0.5,
            marginFactor: 1,
            defaultScale: 1,
            fovHalfAngleDeg: 30,
        });
    });

    it('rounds the trail capacity to whole samples', () => {
        expect(sanitizeFloorPlanSettings({ trailCapacity: 12.6 }).trailCapacity).toBe(13);
        expect(sanitizeFloorPlanSettings(null)).toEqual(DEFAULT_FLOOR_PLAN_SETTINGS);
    });

    it('ignores corrupt or outdated payloads', () => {
        const storage = new MemoryStorage();
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        storage.setItem(FLOOR_PLAN_SETTINGS_STORAGE_KEY, '{oops');
        expect(loadFloorPlanSettings(storage)).toBeNull();
        expect(warn).toHaveBeenCalledTimes(1);

        storage.setItem(
            FLOOR_PLAN_SETTINGS_STORAGE_KEY,
            JSON.stringify({ version: 0, settings: DEFAULT_FLOOR_PLAN_SETTINGS }),
        );
        expect(loadFloorPlanSettings(storage)).toBeNull();
    });
});
