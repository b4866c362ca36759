import { Euler, Quaternion, Spherical, Vector3 } from "three";
import type { OrbitAngles, OrbitTransform, Quat, RadiusLimit, Vec3 } from "./types";

export const MIN_RADIUS = 1e-3;
// Keeps |sin(pitch)| below three's YXZ gimbal threshold so decomposition stays exact.
export const PITCH_LIMIT = Math.PI / 2 - 1e-3;

const TWO_PI = Math.PI * 2;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Wraps an angle into (-PI, PI]. */
export function wrapAngle(angle: number): number {
  if (!Number.isFinite(angle)) return 0;
  let wrapped = angle - TWO_PI * Math.ceil((angle - Math.PI) / TWO_PI);
  if (wrapped <= -Math.PI) wrapped += TWO_PI;
  return wrapped === 0 ? 0 : wrapped;
}

export function clampPitch(pitch: number): number {
  if (Number.isNaN(pitch)) return 0;
  return clamp(pitch, -PITCH_LIMIT, PITCH_LIMIT);
}

export function radiusBounds(limit?: RadiusLimit): { lower: number; upper: number } {
  const lower = Math.max(MIN_RADIUS, limit?.min ?? MIN_RADIUS);
  const upper = Math.max(lower, limit?.max ?? Number.POSITIVE_INFINITY);
  return { lower, upper };
}

export function clampRadius(radius: number, limit?: RadiusLimit): number {
  const { lower, upper } = radiusBounds(limit);
  if (!Number.isFinite(radius)) {
    return radius > 0 && Number.isFinite(upper) ? upper : lower;
  }
  return clamp(radius, lower, upper);
}

export function toVector3(v: Vec3, target: Vector3 = new Vector3()): Vector3 {
  return target.set(v[0], v[1], v[2]);
}

export function fromVector3(v: Vector3): Vec3 {
  return [v.x, v.y, v.z];
}

export function toQuaternion(q: Quat, target: Quaternion = new Quaternion()): Quaternion {
  return target.set(q[0], q[1], q[2], q[3]);
}

export function fromQuaternion(q: Quaternion): Quat {
  return [q.x, q.y, q.z, q.w];
}

/** Unit vector from the pivot toward the camera, Y up; yaw 0 / pitch 0 points along +Z. */
export function orbitDirection(yaw: number, pitch: number): Vec3 {
  const v = new Vector3().setFromSphericalCoords(1, Math.PI / 2 - pitch, yaw);
  return fromVector3(v);
}

/**
 * Rotation that looks from the orbit position toward the pivot, twisted by `roll`
 * about the view axis. Built from a YXZ Euler so it never goes through a look-at
 * cross product and stays continuous across every yaw.
 */
export function orbitOrientation(yaw: number, pitch: number, roll: number): Quat {
  const q = new Quaternion().setFromEuler(new Euler(-pitch, yaw, roll, "YXZ"));
  return fromQuaternion(q);
}

export function composeOrbitTransform(
  pivot: Vec3,
  radius: number,
  yaw: number,
  pitch: number,
  roll: number
): OrbitTransform {
  const [dx, dy, dz] = orbitDirection(yaw, pitch);
  return {
    position: [pivot[0] + dx * radius, pivot[1] + dy * radius, pivot[2] + dz * radius],
    orientation: orbitOrientation(yaw, pitch, roll),
  };
}

export function decomposeOrbitTransform(transform: OrbitTransform, pivot: Vec3): OrbitAngles {
  const offset = toVector3(transform.position).sub(toVector3(pivot));
  const spherical = new Spherical().setFromVector3(offset);
  const euler = new Euler().setFromQuaternion(toQuaternion(transform.orientation), "YXZ");
  return {
    radius: spherical.radius,
    yaw: wrapAngle(spherical.theta),
    pitch: Math.PI / 2 - spherical.phi,
    roll: wrapAngle(euler.z),
  };
}
