import * as THREE from "three";
import {
  OrbitState,
  decomposeOrbitTransform,
  fromQuaternion,
  fromVector3,
  orbitDirection,
} from "@orbit-camera-kit/orbit-core";
import type {
  InputSample,
  OrbitController,
  OrbitStateInit,
  OrbitTransform,
  Vec3,
} from "@orbit-camera-kit/orbit-core";

export function applyOrbitTransform(object: THREE.Object3D, transform: OrbitTransform): void {
  const [x, y, z] = transform.position;
  const [qx, qy, qz, qw] = transform.orientation;
  object.position.set(x, y, z);
  object.quaternion.set(qx, qy, qz, qw);
  object.updateMatrixWorld();
}

/**
 * Perspective cameras take the orbit transform as is. Orthographic cameras keep the
 * orientation, sit halfway between their clip planes and zoom by `1 / radius`, since
 * distance has no effect on their image.
 */
export function applyOrbitToCamera(camera: THREE.Camera, state: OrbitState): void {
  if (camera instanceof THREE.OrthographicCamera) {
    const distance = (camera.near + camera.far) / 2;
    const [dx, dy, dz] = orbitDirection(state.yaw, state.pitch);
    const [px, py, pz] = state.pivot;
    applyOrbitTransform(camera, {
      position: [px + dx * distance, py + dy * distance, pz + dz * distance],
      orientation: state.transform.orientation,
    });
    camera.zoom = 1 / state.radius;
    camera.updateProjectionMatrix();
    return;
  }
  applyOrbitTransform(camera, state.transform);
}

/** Reads an orbit state back from an object's pose, orbiting `pivot`. */
export function orbitStateFromObject(
  object: THREE.Object3D,
  pivot: Vec3 = [0, 0, 0],
  init: Pick<OrbitStateInit, "radiusLimit"> = {}
): OrbitState {
  const { radius, yaw, pitch, roll } = decomposeOrbitTransform(
    { position: fromVector3(object.position), orientation: fromQuaternion(object.quaternion) },
    pivot
  );
  return OrbitState.create({ pivot, radius, yaw, pitch, roll, radiusLimit: init.radiusLimit });
}

export function stepOrbitCamera(
  controller: OrbitController,
  state: OrbitState,
  input: InputSample,
  camera: THREE.Camera,
  dt: number
): void {
  controller.update(state, input, dt);
  applyOrbitToCamera(camera, state);
}
