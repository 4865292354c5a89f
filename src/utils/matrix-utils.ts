/**
 * Matrix Utilities
 *
 * Rotation math for turning glTF node poses into SceneGraph transforms.
 * Matrices are 3x3, row-major. Quaternions use the glTF layout [x, y, z, w].
 * Euler angles follow the document convention: degrees, R = Rz * Ry * Rx.
 */

import type { Transform, Vector3 } from '../core/scene-node';
import type { UpAxis } from '../schemas';

export type Matrix3 = [
  number, number, number,
  number, number, number,
  number, number, number
];

export type Quaternion = [number, number, number, number];

const GIMBAL_THRESHOLD = 0.9999999;
const RAD_TO_DEG = 180 / Math.PI;
const DEG_TO_RAD = Math.PI / 180;

/**
 * Basis change from glTF (Y-up, +Z forward, -X right) to the document
 * convention (Z-up, +Y forward, +X right). A proper rotation, so handedness
 * and triangle winding are preserved.
 */
export const Y_UP_TO_Z_UP: Matrix3 = [
  -1, 0, 0,
  0, 0, 1,
  0, 1, 0
];

/**
 * Same basis change as a column-major 4x4, the layout gltf-transform expects
 */
export const Y_UP_TO_Z_UP_MAT4: [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number
] = [
  -1, 0, 0, 0,
  0, 0, 1, 0,
  0, 1, 0, 0,
  0, 0, 0, 1
];

function cleanZero(value: number): number {
  return value === 0 ? 0 : value;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function multiplyMatrix3(a: Matrix3, b: Matrix3): Matrix3 {
  const out: number[] = [];
  for (let row = 0; row < 3; row++) {
    for (let col = 0; col < 3; col++) {
      out.push(
        a[row * 3] * b[col] +
        a[row * 3 + 1] * b[3 + col] +
        a[row * 3 + 2] * b[6 + col]
      );
    }
  }
  return [out[0], out[1], out[2], out[3], out[4], out[5], out[6], out[7], out[8]];
}

export function transposeMatrix3(m: Matrix3): Matrix3 {
  return [
    m[0], m[3], m[6],
    m[1], m[4], m[7],
    m[2], m[5], m[8]
  ];
}

export function transformVector3(m: Matrix3, v: Vector3): Vector3 {
  return [
    cleanZero(m[0] * v[0] + m[1] * v[1] + m[2] * v[2]),
    cleanZero(m[3] * v[0] + m[4] * v[1] + m[5] * v[2]),
    cleanZero(m[6] * v[0] + m[7] * v[1] + m[8] * v[2])
  ];
}

/**
 * Rotation matrix of a (possibly unnormalized) quaternion
 */
export function quaternionToMatrix3(q: Quaternion): Matrix3 {
  const length = Math.hypot(q[0], q[1], q[2], q[3]);
  if (length === 0) {
    return [1, 0, 0, 0, 1, 0, 0, 0, 1];
  }
  const qx = q[0] / length;
  const qy = q[1] / length;
  const qz = q[2] / length;
  const qw = q[3] / length;

  const xx = qx * qx;
  const yy = qy * qy;
  const zz = qz * qz;
  const xy = qx * qy;
  const xz = qx * qz;
  const yz = qy * qz;
  const wx = qw * qx;
  const wy = qw * qy;
  const wz = qw * qz;

  return [
    1 - 2 * (yy + zz), 2 * (xy - wz), 2 * (xz + wy),
    2 * (xy + wz), 1 - 2 * (xx + zz), 2 * (yz - wx),
    2 * (xz - wy), 2 * (yz + wx), 1 - 2 * (xx + yy)
  ];
}

/**
 * Decomposes a rotation matrix into XYZ Euler degrees with R = Rz * Ry * Rx.
 * At gimbal lock the X angle is fixed to 0.
 */
export function matrix3ToEulerDegrees(m: Matrix3): Vector3 {
  const m20 = clamp(m[6], -1, 1);
  const y = Math.asin(-m20);
  let x: number;
  let z: number;
  if (Math.abs(m20) < GIMBAL_THRESHOLD) {
    x = Math.atan2(m[7], m[8]);
    z = Math.atan2(m[3], m[0]);
  } else {
    x = 0;
    z = Math.atan2(-m[1], m[4]);
  }
  return [cleanZero(x * RAD_TO_DEG), cleanZero(y * RAD_TO_DEG), cleanZero(z * RAD_TO_DEG)];
}

export function quaternionToEulerDegrees(q: Quaternion): Vector3 {
  return matrix3ToEulerDegrees(quaternionToMatrix3(q));
}

/**
 * Inverse of {@link quaternionToEulerDegrees}: q = qz * qy * qx
 */
export function eulerDegreesToQuaternion(euler: Vector3): Quaternion {
  const hx = (euler[0] * DEG_TO_RAD) / 2;
  const hy = (euler[1] * DEG_TO_RAD) / 2;
  const hz = (euler[2] * DEG_TO_RAD) / 2;
  const c1 = Math.cos(hx);
  const c2 = Math.cos(hy);
  const c3 = Math.cos(hz);
  const s1 = Math.sin(hx);
  const s2 = Math.sin(hy);
  const s3 = Math.sin(hz);
  return [
    s1 * c2 * c3 - c1 * s2 * s3,
    c1 * s2 * c3 + s1 * c2 * s3,
    c1 * c2 * s3 - s1 * s2 * c3,
    c1 * c2 * c3 + s1 * s2 * s3
  ];
}

/**
 * Builds a document transform from a glTF local TRS. With a Y-up source the
 * pose is conjugated by {@link Y_UP_TO_Z_UP}; scale axes follow the same
 * permutation, so (sx, sy, sz) becomes (sx, sz, sy).
 */
export function localTrsToTransform(
  translation: Vector3,
  rotation: Quaternion,
  scale: Vector3,
  sourceUpAxis: UpAxis
): Transform {
  if (sourceUpAxis === 'Z') {
    return {
      translate: [cleanZero(translation[0]), cleanZero(translation[1]), cleanZero(translation[2])],
      rotate: quaternionToEulerDegrees(rotation),
      scale: [cleanZero(scale[0]), cleanZero(scale[1]), cleanZero(scale[2])],
    };
  }

  const basis = Y_UP_TO_Z_UP;
  const rotationMatrix = multiplyMatrix3(
    multiplyMatrix3(basis, quaternionToMatrix3(rotation)),
    transposeMatrix3(basis)
  );

  return {
    translate: transformVector3(basis, translation),
    rotate: matrix3ToEulerDegrees(rotationMatrix),
    scale: [cleanZero(scale[0]), cleanZero(scale[2]), cleanZero(scale[1])],
  };
}

/**
 * Whether all scale components are within `tolerance` of the X component
 */
export function isUniformScale(scale: Vector3, tolerance: number): boolean {
  return Math.abs(scale[1] - scale[0]) <= tolerance && Math.abs(scale[2] - scale[0]) <= tolerance;
}
