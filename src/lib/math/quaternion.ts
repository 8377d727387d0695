/**
 * Quaternion Value Helpers
 * ========================
 *
 * Immutable (w, x, y, z) quaternion values shared by every pipeline stage.
 * Arithmetic is delegated to THREE.Quaternion; results are always new frozen
 * values, never a mutated instance that a consumer might still hold.
 *
 * Euler convention: roll about X, pitch about Y, yaw about Z, composed
 * yaw → pitch → roll (THREE order "ZYX").
 *
 * @module quaternion
 */

import * as THREE from "three";

export interface Quaternion {
  readonly w: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface EulerAngles {
  roll: number;
  pitch: number;
  yaw: number;
}

const RAD2DEG = 180 / Math.PI;

export function quat(w: number, x: number, y: number, z: number): Quaternion {
  return Object.freeze({ w, x, y, z });
}

export const IDENTITY: Quaternion = quat(1, 0, 0, 0);

// ============================================================================
// THREE.js INTEROP
// ============================================================================

/** Note THREE's constructor order is (x, y, z, w). */
export function toThree(
  q: Quaternion,
  target: THREE.Quaternion = new THREE.Quaternion(),
): THREE.Quaternion {
  return target.set(q.x, q.y, q.z, q.w);
}

export function fromThree(q: THREE.Quaternion): Quaternion {
  return quat(q.w, q.x, q.y, q.z);
}

// ============================================================================
// ARITHMETIC
// ============================================================================

export function norm(q: Quaternion): number {
  return Math.sqrt(q.w * q.w + q.x * q.x + q.y * q.y + q.z * q.z);
}

export function dot(a: Quaternion, b: Quaternion): number {
  return a.w * b.w + a.x * b.x + a.y * b.y + a.z * b.z;
}

/** Inverse of a unit quaternion. */
export function conjugate(q: Quaternion): Quaternion {
  return quat(q.w, -q.x, -q.y, -q.z);
}

/** Hamilton product a ⊗ b. */
export function multiply(a: Quaternion, b: Quaternion): Quaternion {
  return fromThree(toThree(a).multiply(toThree(b)));
}

/**
 * Rotation angle between two orientations (radians, 0..π).
 * q and -q describe the same rotation, hence the absolute dot product.
 */
export function angleBetween(a: Quaternion, b: Quaternion): number {
  const d = Math.min(1, Math.abs(dot(a, b)) / (norm(a) * norm(b)));
  return 2 * Math.acos(d);
}

/** Component-wise closeness, treating q and -q as equal. */
export function approxEqual(
  a: Quaternion,
  b: Quaternion,
  epsilon = 1e-6,
): boolean {
  const sign = dot(a, b) < 0 ? -1 : 1;
  return (
    Math.abs(a.w - sign * b.w) <= epsilon &&
    Math.abs(a.x - sign * b.x) <= epsilon &&
    Math.abs(a.y - sign * b.y) <= epsilon &&
    Math.abs(a.z - sign * b.z) <= epsilon
  );
}

/**
 * Shortest-path axis-angle form, angle in radians (0..π).
 * A zero quaternion maps to angle 0 about +Z; a null rotation reports +X.
 */
export function toAxisAngle(q: Quaternion): { axis: THREE.Vector3; angle: number } {
  const n = norm(q);
  if (n === 0) return { axis: new THREE.Vector3(0, 0, 1), angle: 0 };

  // q and -q are the same rotation; w >= 0 keeps the angle <= π
  const sign = q.w < 0 ? -1 : 1;
  const w = Math.min(1, (sign * q.w) / n);
  const angle = 2 * Math.acos(w);
  const s = Math.sqrt(1 - w * w);
  if (s < 1e-6) return { axis: new THREE.Vector3(1, 0, 0), angle };

  const k = sign / (n * s);
  return { axis: new THREE.Vector3(q.x * k, q.y * k, q.z * k), angle };
}

// ============================================================================
// EULER / MATRIX
// ============================================================================

export function fromEuler(roll: number, pitch: number, yaw: number): Quaternion {
  return fromThree(
    new THREE.Quaternion().setFromEuler(
      new THREE.Euler(roll, pitch, yaw, "ZYX"),
    ),
  );
}

/** Roll/pitch/yaw in radians. */
export function toEuler(q: Quaternion): EulerAngles {
  const e = new THREE.Euler().setFromQuaternion(toThree(q), "ZYX");
  return { roll: e.x, pitch: e.y, yaw: e.z };
}

export function toEulerDegrees(q: Quaternion): EulerAngles {
  const e = toEuler(q);
  return {
    roll: e.roll * RAD2DEG,
    pitch: e.pitch * RAD2DEG,
    yaw: e.yaw * RAD2DEG,
  };
}

/** Row-major 3x3 rotation matrix. */
export function toRotationMatrix(q: Quaternion): number[][] {
  const m = new THREE.Matrix4().makeRotationFromQuaternion(toThree(q));
  // THREE stores column-major
  const e = m.elements;
  return [
    [e[0], e[4], e[8]],
    [e[1], e[5], e[9]],
    [e[2], e[6], e[10]],
  ];
}
