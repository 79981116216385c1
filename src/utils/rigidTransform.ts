import type { Matrix4, RigidTransform, Vec3, Vec4Tuple } from '../types';

export const degToRad = (value: number): number => (value * Math.PI) / 180;

export const ORIGIN: Vec3 = { x: 0, y: 0, z: 0 };
export const UNIT_RIGHT: Vec3 = { x: 1, y: 0, z: 0 };
export const UNIT_UP: Vec3 = { x: 0, y: 1, z: 0 };
export const UNIT_FORWARD: Vec3 = { x: 0, y: 0, z: 1 };

const directionColumn = (v: Vec3): Vec4Tuple => [v.x, v.y, v.z, 0];
const pointColumn = (v: Vec3): Vec4Tuple => [v.x, v.y, v.z, 1];
const columnVector = (column: Vec4Tuple): Vec3 => ({ x: column[0], y: column[1], z: column[2] });

export interface RigidTransformParts {
    position?: Vec3;
    right?: Vec3;
    up?: Vec3;
    forward?: Vec3;
}

/** Assemble a transform from its basis vectors; omitted parts default to identity. */
export const createRigidTransform = (parts: RigidTransformParts = {}): RigidTransform => {
    const columns: Matrix4 = [
        directionColumn(parts.right ?? UNIT_RIGHT),
        directionColumn(parts.up ?? UNIT_UP),
        directionColumn(parts.forward ?? UNIT_FORWARD),
        pointColumn(parts.position ?? ORIGIN),
    ];
    return { columns };
};

/**
 * Transform rotated about the vertical axis. `yawRadians` is the plan angle of the
 * right vector, measured from +x towards +z.
 */
export const createYawTransform = (position: Vec3, yawRadians: number): RigidTransform => {
    const cos = Math.cos(yawRadians);
    const sin = Math.sin(yawRadians);
    return createRigidTransform({
        position,
        right: { x: cos, y: 0, z: sin },
        up: UNIT_UP,
        // right × up keeps the basis right-handed
        forward: { x: -sin, y: 0, z: cos },
    });
};

export const transformRight = (transform: RigidTransform): Vec3 =>
    columnVector(transform.columns[0]);
export const transformUp = (transform: RigidTransform): Vec3 => columnVector(transform.columns[1]);
export const transformForward = (transform: RigidTransform): Vec3 =>
    columnVector(transform.columns[2]);
export const transformPosition = (transform: RigidTransform): Vec3 =>
    columnVector(transform.columns[3]);

const copyColumn = ([x, y, z, w]: Vec4Tuple): Vec4Tuple => [x, y, z, w];

export const cloneMatrix = (transform: RigidTransform): Matrix4 => [
    copyColumn(transform.columns[0]),
    copyColumn(transform.columns[1]),
    copyColumn(transform.columns[2]),
    copyColumn(transform.columns[3]),
];
