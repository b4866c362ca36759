export type Vec2 = [number, number];
export type Vec3 = [number, number, number];
/** Quaternion as `[x, y, z, w]`. */
export type Quat = [number, number, number, number];

/**
 * Opaque identifier for a pointer button or key, compared by value.
 * The DOM collector uses `"MouseLeft" | "MouseMiddle" | "MouseRight"` and `KeyboardEvent.code`.
 */
export type InputToken = string;

/** Keys bound to roll, as `[increase, decrease]`. */
export type RollBinding = readonly [increase: InputToken, decrease: InputToken];

export type ScrollUnit = "line" | "pixel" | "page";

export interface InputSample {
  /** Pointer movement since the previous frame, screen space (+y down). */
  pointerDelta: Vec2;
  /** Positive values zoom in. */
  scrollDelta: number;
  scrollUnit?: ScrollUnit;
  isHeld(token: InputToken): boolean;
}

export interface OrbitTransform {
  position: Vec3;
  orientation: Quat;
}

export interface RadiusLimit {
  min: number | null;
  max: number | null;
}

export interface OrbitStateInit {
  pivot?: Vec3;
  radius?: number;
  yaw?: number;
  pitch?: number;
  roll?: number;
  radiusLimit?: Partial<RadiusLimit>;
}

export interface OrbitStateSnapshot {
  pivot: Vec3;
  radius: number;
  targetRadius: number;
  yaw: number;
  pitch: number;
  roll: number;
}

export interface OrbitAngles {
  radius: number;
  yaw: number;
  pitch: number;
  roll: number;
}

export interface OrbitControlConfig {
  enable: boolean;
  enableZoom: boolean;
  enableRotation: boolean;
  enablePan: boolean;
  enableRoll: boolean;
  zoomSpeed: number;
  rotationSpeed: number;
  panSpeed: number;
  rollSpeed: number;
  /**
   * Zoom damping in [0, 1). 0 snaps to the target radius; values near 1 converge slowly.
   */
  zoomSmoothness: number;
  /** `null` rotates on any pointer movement. */
  rotateButton: InputToken | null;
  /** `null` lets scroll zoom without a modifier. */
  zoomButton: InputToken | null;
  /** `null` pans on any pointer movement. */
  panButton: InputToken | null;
  rollButton: RollBinding | null;
}

/** `undefined` keeps the default; `null` clears a binding. */
export type OrbitControlOptions = Partial<OrbitControlConfig>;
