import { Vector3 } from "three";
import {
  clamp,
  clampPitch,
  clampRadius,
  composeOrbitTransform,
  fromVector3,
  toQuaternion,
  wrapAngle,
} from "./math";
import type {
  OrbitStateInit,
  OrbitStateSnapshot,
  OrbitTransform,
  RadiusLimit,
  Vec3,
} from "./types";

// stepZoom treats one 60 Hz frame as one application of the smoothness factor.
const REFERENCE_FRAME_RATE = 60;
export const MAX_ZOOM_SMOOTHNESS = 0.999;

function sanitizeVec3(v: Vec3): Vec3 {
  return [finiteOr(v[0], 0), finiteOr(v[1], 0), finiteOr(v[2], 0)];
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

export class OrbitState {
  private _pivot: Vec3;
  private _radius: number;
  private _targetRadius: number;
  private _yaw: number;
  private _pitch: number;
  private _roll: number;
  private _radiusLimit: RadiusLimit = { min: null, max: null };
  private cached: OrbitTransform | null = null;

  constructor(pivot: Vec3, radius: number, yaw: number, pitch: number, roll: number) {
    this._pivot = sanitizeVec3(pivot);
    this._radius = clampRadius(radius);
    this._targetRadius = this._radius;
    this._yaw = wrapAngle(yaw);
    this._pitch = clampPitch(pitch);
    this._roll = wrapAngle(roll);
  }

  static create(init: OrbitStateInit = {}): OrbitState {
    const state = new OrbitState(
      init.pivot ?? [0, 0, 0],
      init.radius ?? 1,
      init.yaw ?? 0,
      init.pitch ?? 0,
      init.roll ?? 0
    );
    if (init.radiusLimit) {
      state.setRadiusLimit(init.radiusLimit);
    }
    return state;
  }

  get pivot(): Vec3 {
    return [...this._pivot];
  }

  get radius(): number {
    return this._radius;
  }

  get targetRadius(): number {
    return this._targetRadius;
  }

  get yaw(): number {
    return this._yaw;
  }

  get pitch(): number {
    return this._pitch;
  }

  get roll(): number {
    return this._roll;
  }

  get radiusLimit(): RadiusLimit {
    return { ...this._radiusLimit };
  }

  get transform(): OrbitTransform {
    if (!this.cached) {
      this.cached = this.computeTransform();
    }
    return {
      position: [...this.cached.position],
      orientation: [...this.cached.orientation],
    };
  }

  applyDelta(dYaw: number, dPitch: number, dRoll: number, dRadiusTarget: number, dPivot: Vec3): void {
    this._yaw = wrapAngle(this._yaw + finiteOr(dYaw, 0));
    this._pitch = clampPitch(this._pitch + finiteOr(dPitch, 0));
    this._roll = wrapAngle(this._roll + finiteOr(dRoll, 0));
    this._targetRadius = clampRadius(this._targetRadius + finiteOr(dRadiusTarget, 0), this._radiusLimit);
    const [px, py, pz] = sanitizeVec3(dPivot);
    this._pivot = [this._pivot[0] + px, this._pivot[1] + py, this._pivot[2] + pz];
    this.invalidate();
  }

  /**
   * Moves `radius` toward `targetRadius` by `1 - smoothness^(dt * 60)`. The remaining gap
   * after any split of the same elapsed time is `smoothness^(total * 60)`.
   */
  stepZoom(smoothness: number, dt: number): void {
    const s = clamp(finiteOr(smoothness, 0), 0, MAX_ZOOM_SMOOTHNESS);
    if (s === 0) {
      this.snapRadius();
      return;
    }
    const elapsed = Math.max(finiteOr(dt, 0), 0);
    if (elapsed === 0) return;
    const factor = 1 - Math.pow(s, elapsed * REFERENCE_FRAME_RATE);
    const next = this._radius + (this._targetRadius - this._radius) * factor;
    if (next === this._radius) return;
    this._radius = clampRadius(next, this._radiusLimit);
    this.invalidate();
  }

  computeTransform(): OrbitTransform {
    return composeOrbitTransform(this._pivot, this._radius, this._yaw, this._pitch, this._roll);
  }

  /** Camera right axis in world space, roll included. */
  right(): Vec3 {
    return this.axis(1, 0, 0);
  }

  /** Camera up axis in world space, roll included. */
  up(): Vec3 {
    return this.axis(0, 1, 0);
  }

  setPivot(pivot: Vec3): void {
    this._pivot = sanitizeVec3(pivot);
    this.invalidate();
  }

  /** Sets both the rendered and the target radius, skipping smoothing. */
  setRadius(radius: number): void {
    this._targetRadius = clampRadius(radius, this._radiusLimit);
    this.snapRadius();
  }

  setRadiusLimit(limit: Partial<RadiusLimit>): void {
    this._radiusLimit = { min: limit.min ?? null, max: limit.max ?? null };
    this._targetRadius = clampRadius(this._targetRadius, this._radiusLimit);
    this._radius = clampRadius(this._radius, this._radiusLimit);
    this.invalidate();
  }

  snapshot(): OrbitStateSnapshot {
    return {
      pivot: this.pivot,
      radius: this._radius,
      targetRadius: this._targetRadius,
      yaw: this._yaw,
      pitch: this._pitch,
      roll: this._roll,
    };
  }

  clone(): OrbitState {
    const copy = new OrbitState(this._pivot, this._radius, this._yaw, this._pitch, this._roll);
    copy.setRadiusLimit(this._radiusLimit);
    copy._targetRadius = this._targetRadius;
    return copy;
  }

  private snapRadius(): void {
    if (this._radius === this._targetRadius) return;
    this._radius = this._targetRadius;
    this.invalidate();
  }

  private axis(x: number, y: number, z: number): Vec3 {
    const orientation = toQuaternion(this.transform.orientation);
    return fromVector3(new Vector3(x, y, z).applyQuaternion(orientation));
  }

  private invalidate(): void {
    this.cached = null;
  }
}
