/**
 * Device position estimate.
 *
 * The capture API does not expose the tracked camera pose, so the device is placed at
 * the centroid of the current wall positions with identity orientation. This is an
 * approximation: it follows the room's center, not the device. Swap the input here if
 * a real pose becomes available; the trail contract stays the same.
 */
import type { DevicePoseEstimate, Snapshot, Vec3 } from '@/types';
import { createRigidTransform, transformPosition } from '@/utils/rigidTransform';

export const wallCentroid = (snapshot: Snapshot): Vec3 | null => {
    if (snapshot.walls.length === 0) {
        return null;
    }
    let x = 0;
    let y = 0;
    let z = 0;
    for (const wall of snapshot.walls) {
        const position = transformPosition(wall.transform);
        x += position.x;
        y += position.y;
        z += position.z;
    }
    const count = snapshot.walls.length;
    return { x: x / count, y: y / count, z: z / count };
};

export const estimateDevicePose = (snapshot: Snapshot): DevicePoseEstimate | null => {
    const position = wallCentroid(snapshot);
    if (!position) {
        return null;
    }
    return { position, transform: createRigidTransform({ position }) };
};
