/**
 * Room dimensions and the export document.
 *
 * Walls are exported with their full transform (position + 4×4 matrix). Doors,
 * windows and objects carry their position only; downstream importers rely on this
 * asymmetry, so keep it.
 */
import type {
    DoorElement,
    ExportObjectRecord,
    ExportOpeningRecord,
    ExportWallRecord,
    ObjectElement,
    RoomDimensions,
    ScanExportDocument,
    Snapshot,
    WallElement,
    WindowElement,
} from '@/types';
import { cloneMatrix, transformPosition } from '@/utils/rigidTransform';
import { wallHalfExtents } from '@/utils/transformDecomposer';

export interface RoomBox {
    min: { x: number; y: number; z: number };
    max: { x: number; y: number; z: number };
}

/** Tightest axis-aligned box containing every wall's half-extent; null without walls. */
export const computeWallBox = (walls: readonly WallElement[]): RoomBox | null => {
    if (walls.length === 0) {
        return null;
    }
    const min = { x: Infinity, y: Infinity, z: Infinity };
    const max = { x: -Infinity, y: -Infinity, z: -Infinity };

    for (const wall of walls) {
        const center = transformPosition(wall.transform);
        const half = wallHalfExtents(wall);
        min.x = Math.min(min.x, center.x - half.x);
        max.x = Math.max(max.x, center.x + half.x);
        min.y = Math.min(min.y, center.y - half.y);
        max.y = Math.max(max.y, center.y + half.y);
        min.z = Math.min(min.z, center.z - half.z);
        max.z = Math.max(max.z, center.z + half.z);
    }

    return { min, max };
};

export const computeRoomDimensions = (walls: readonly WallElement[]): RoomDimensions => {
    const box = computeWallBox(walls);
    if (!box) {
        return { width: 0, height: 0, length: 0 };
    }
    return {
        width: box.max.x - box.min.x,
        height: box.max.y - box.min.y,
        length: box.max.z - box.min.z,
    };
};

// =============================================================================
// RECORDS
// =============================================================================

const wallRecord = (wall: WallElement): ExportWallRecord => ({
    id: wall.id,
    dimensions: {
        width: wall.dimensions.width,
        height: wall.dimensions.height,
        thickness: wall.dimensions.thickness,
    },
    transform: {
        position: transformPosition(wall.transform),
        matrix: cloneMatrix(wall.transform),
    },
});

const openingRecord = (opening: DoorElement | WindowElement): ExportOpeningRecord => ({
    id: opening.id,
    dimensions: {
        width: opening.dimensions.width,
        height: opening.dimensions.height,
        depth: opening.dimensions.thickness,
    },
    transform: { position: transformPosition(opening.transform) },
});

const objectRecord = (object: ObjectElement): ExportObjectRecord => ({
    id: object.id,
    category: object.category,
    confidence: object.confidence,
    dimensions: { ...object.dimensions },
    transform: { position: transformPosition(object.transform) },
});

export const buildExportDocument = (snapshot: Snapshot): ScanExportDocument => ({
    dimensions: computeRoomDimensions(snapshot.walls),
    walls: snapshot.walls.map(wallRecord),
    doors: snapshot.doors.map(openingRecord),
    windows: snapshot.windows.map(openingRecord),
    objects: snapshot.objects.map(objectRecord),
});

export interface SnapshotSummary {
    walls: number;
    doors: number;
    windows: number;
    objects: number;
}

export const summarizeSnapshot = (snapshot: Snapshot | null): SnapshotSummary => ({
    walls: snapshot?.walls.length ?? 0,
    doors: snapshot?.doors.length ?? 0,
    windows: snapshot?.windows.length ?? 0,
    objects: snapshot?.objects.length ?? 0,
});
