import type { CanvasPoint } from '@/types';

import { degToRad } from './rigidTransform';

export const COMPASS_POINTS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

export type CompassPoint = (typeof COMPASS_POINTS)[number];

/** Heading in [0, 360), or null for a missing/non-finite reading. */
export const normalizeHeading = (heading: number | null | undefined): number | null => {
    if (heading === null || heading === undefined || !Number.isFinite(heading)) {
        return null;
    }
    return ((heading % 360) + 360) % 360;
};

export const compassDirection = (heading: number): CompassPoint => {
    const normalized = normalizeHeading(heading) ?? 0;
    const index = Math.floor((normalized + 22.5) / 45) % COMPASS_POINTS.length;
    return COMPASS_POINTS[index] ?? 'N';
};

/**
 * Tip of the north arrow drawn from `center`. With heading 0 the arrow points up the
 * canvas; it rotates counter to the device heading.
 */
export const northArrowTip = (center: CanvasPoint, heading: number, length: number): CanvasPoint => {
    const angle = -degToRad(heading);
    return {
        x: center.x + length * Math.sin(angle),
        y: center.y - length * Math.cos(angle),
    };
};
