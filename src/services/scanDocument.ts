import {
    CONFIDENCE_LEVELS,
    OBJECT_CATEGORIES,
    type ConfidenceLevel,
    type DoorElement,
    type ExportObjectRecord,
    type ExportOpeningRecord,
    type ExportWallRecord,
    type Matrix4,
    type ObjectCategory,
    type ObjectDimensions,
    type ObjectElement,
    type RoomDimensions,
    type ScanExportDocument,
    type Snapshot,
    type SurfaceDimensions,
    type Vec3,
    type Vec4Tuple,
    type WallElement,
    type WindowElement,
} from '@/types';
import { createRigidTransform } from '@/utils/rigidTransform';
import { createSnapshot } from '@/utils/snapshot';

import { computeRoomDimensions } from './dimensionExtractor';

export const serializeScanDocument = (document: ScanExportDocument): string =>
    JSON.stringify(document, null, 2);

// =============================================================================
// PARSING
// =============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

const isObjectCategory = (value: unknown): value is ObjectCategory =>
    OBJECT_CATEGORIES.some((category) => category === value);

const isConfidenceLevel = (value: unknown): value is ConfidenceLevel =>
    CONFIDENCE_LEVELS.some((level) => level === value);

const parseVec3 = (input: unknown): Vec3 | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { x, y, z } = input;
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) {
        return null;
    }
    return { x, y, z };
};

const parseColumn = (input: unknown): Vec4Tuple | null => {
    if (!Array.isArray(input) || input.length !== 4) {
        return null;
    }
    const [a, b, c, d]: unknown[] = input;
    if (!isFiniteNumber(a) || !isFiniteNumber(b) || !isFiniteNumber(c) || !isFiniteNumber(d)) {
        return null;
    }
    return [a, b, c, d];
};

const parseMatrix = (input: unknown): Matrix4 | null => {
    if (!Array.isArray(input) || input.length !== 4) {
        return null;
    }
    const [c0, c1, c2, c3] = input.map(parseColumn);
    if (!c0 || !c1 || !c2 || !c3) {
        return null;
    }
    return [c0, c1, c2, c3];
};

const parseSurfaceDimensions = (input: unknown): SurfaceDimensions | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { width, height, thickness } = input;
    if (!isFiniteNumber(width) || !isFiniteNumber(height) || !isFiniteNumber(thickness)) {
        return null;
    }
    return { width, height, thickness };
};

const parseObjectDimensions = (input: unknown): ObjectDimensions | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { width, height, depth } = input;
    if (!isFiniteNumber(width) || !isFiniteNumber(height) || !isFiniteNumber(depth)) {
        return null;
    }
    return { width, height, depth };
};

const parsePosition = (transform: unknown): Vec3 | null =>
    isRecord(transform) ? parseVec3(transform.position) : null;

const parseWall = (input: unknown): ExportWallRecord | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { id, transform } = input;
    if (typeof id !== 'string' || !isRecord(transform)) {
        return null;
    }
    const dimensions = parseSurfaceDimensions(input.dimensions);
    const position = parseVec3(transform.position);
    const matrix = parseMatrix(transform.matrix);
    if (!dimensions || !position || !matrix) {
        return null;
    }
    return { id, dimensions, transform: { position, matrix } };
};

const parseOpening = (input: unknown): ExportOpeningRecord | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { id } = input;
    const dimensions = parseObjectDimensions(input.dimensions);
    const position = parsePosition(input.transform);
    if (typeof id !== 'string' || !dimensions || !position) {
        return null;
    }
    return { id, dimensions, transform: { position } };
};

const parseObject = (input: unknown): ExportObjectRecord | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { id, category, confidence } = input;
    if (
        typeof id !== 'string' ||
        !isObjectCategory(category) ||
        !isConfidenceLevel(confidence)
    ) {
        return null;
    }
    const dimensions = parseObjectDimensions(input.dimensions);
    const position = parsePosition(input.transform);
    if (!dimensions || !position) {
        return null;
    }
    return { id, category, confidence, dimensions, transform: { position } };
};

const parseList = <T>(input: unknown, parse: (entry: unknown) => T | null): T[] => {
    if (!Array.isArray(input)) {
        return [];
    }
    const parsed: T[] = [];
    for (const entry of input) {
        const value = parse(entry);
        if (value) {
            parsed.push(value);
        }
    }
    return parsed;
};

const parseRoomDimensions = (input: unknown): RoomDimensions | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { width, height, length } = input;
    if (!isFiniteNumber(width) || !isFiniteNumber(height) || !isFiniteNumber(length)) {
        return null;
    }
    return { width, height, length };
};

/**
 * Parse an export document. Malformed element records are dropped; missing room
 * dimensions are recomputed from the walls. Returns null for invalid JSON or a
 * payload that is not an object.
 */
export const parseScanDocument = (text: string): ScanExportDocument | null => {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        console.warn('Failed to parse scan document', error);
        return null;
    }
    if (!isRecord(raw)) {
        return null;
    }

    const walls = parseList(raw.walls, parseWall);
    const doors = parseList(raw.doors, parseOpening);
    const windows = parseList(raw.windows, parseOpening);
    const objects = parseList(raw.objects, parseObject);
    const dimensions =
        parseRoomDimensions(raw.dimensions) ?? computeRoomDimensions(walls.map(wallFromRecord));

    return { dimensions, walls, doors, windows, objects };
};

// =============================================================================
// DOCUMENT → SNAPSHOT
// =============================================================================

function wallFromRecord(record: ExportWallRecord): WallElement {
    return {
        kind: 'wall',
        id: record.id,
        transform: { columns: record.transform.matrix },
        dimensions: { ...record.dimensions },
    };
}

const openingBase = (record: ExportOpeningRecord) => ({
    id: record.id,
    transform: createRigidTransform({ position: record.transform.position }),
    dimensions: {
        width: record.dimensions.width,
        height: record.dimensions.height,
        thickness: record.dimensions.depth,
    },
});

const doorFromRecord = (record: ExportOpeningRecord): DoorElement => ({
    kind: 'door',
    ...openingBase(record),
});

const windowFromRecord = (record: ExportOpeningRecord): WindowElement => ({
    kind: 'window',
    ...openingBase(record),
});

const objectFromRecord = (record: ExportObjectRecord): ObjectElement => ({
    id: record.id,
    transform: createRigidTransform({ position: record.transform.position }),
    dimensions: { ...record.dimensions },
    category: record.category,
    confidence: record.confidence,
});

/**
 * Rebuild a Snapshot from a saved document so it can be drawn again. Only walls keep
 * their orientation; the other elements were exported with position only and come
 * back axis-aligned.
 */
export const snapshotFromDocument = (document: ScanExportDocument): Snapshot =>
    createSnapshot({
        walls: document.walls.map(wallFromRecord),
        doors: document.doors.map(doorFromRecord),
        windows: document.windows.map(windowFromRecord),
        objects: document.objects.map(objectFromRecord),
    });
