import * as THREE from "three";

/** Rotation magnitudes below this are treated as no rotation at all. */
const AXIS_EPSILON = 1e-9;

/**
 * Rotation vector (axis * angle) of `from · to⁻¹`, taking the shorter arc.
 */
export function rotationBetween(from: THREE.Quaternion, to: THREE.Quaternion): THREE.Vector3 {
  const rel = from.clone().multiply(to.clone().invert());
  return logRotation(rel);
}

/** Quaternion -> rotation vector. */
export function logRotation(q: THREE.Quaternion): THREE.Vector3 {
  // q and -q are the same rotation; pick the one with w >= 0 so the angle is <= π.
  const sign = q.w < 0 ? -1 : 1;
  const x = q.x * sign;
  const y = q.y * sign;
  const z = q.z * sign;
  const w = q.w * sign;

  const sinHalf = Math.sqrt(x * x + y * y + z * z);
  if (sinHalf < AXIS_EPSILON) {
    return new THREE.Vector3();
  }

  const angle = 2 * Math.atan2(sinHalf, w);
  return new THREE.Vector3(x, y, z).multiplyScalar(angle / sinHalf);
}

/** Rotation vector -> quaternion. Degenerate axes map to identity. */
export function expRotation(v: THREE.Vector3): THREE.Quaternion {
  const angle = v.length();
  if (angle < AXIS_EPSILON) {
    return new THREE.Quaternion();
  }
  return new THREE.Quaternion().setFromAxisAngle(v.clone().divideScalar(angle), angle);
}
