import type { DoorElement, ObjectElement, Snapshot, WallElement, WindowElement } from '@/types';

export interface SnapshotInput {
    walls?: readonly WallElement[];
    doors?: readonly DoorElement[];
    windows?: readonly WindowElement[];
    objects?: readonly ObjectElement[];
}

/** Freeze the element lists of one capture update into a Snapshot value. */
export const createSnapshot = (input: SnapshotInput = {}): Snapshot =>
    Object.freeze({
        walls: Object.freeze([...(input.walls ?? [])]),
        doors: Object.freeze([...(input.doors ?? [])]),
        windows: Object.freeze([...(input.windows ?? [])]),
        objects: Object.freeze([...(input.objects ?? [])]),
    });

export const EMPTY_SNAPSHOT: Snapshot = createSnapshot();
