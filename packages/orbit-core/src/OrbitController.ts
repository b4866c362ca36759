import { defaultOrbitControlConfig, resolveOrbitControlConfig } from "./config";
import { isBindingActive, rollDirection, scrollToLines } from "./input";
import type { OrbitState } from "./OrbitState";
import type { InputSample, OrbitControlConfig, OrbitControlOptions, Vec3 } from "./types";

const NO_PIVOT_DELTA: Vec3 = [0, 0, 0];

/**
 * Advances one orbit camera by one frame.
 *
 * Rotation, zoom target, pan and roll are applied in that order; each is gated by its
 * own enable flag and binding, and simultaneous actions add up. Zoom smoothing runs on
 * every frame while `config.enable` is set, even with zoom disabled, so an in-flight
 * zoom always settles.
 */
export function updateOrbit(
  config: OrbitControlConfig,
  input: InputSample,
  dt: number,
  state: OrbitState
): void {
  if (!config.enable) return;

  const elapsed = Number.isFinite(dt) && dt > 0 ? dt : 0;
  const [dx, dy] = input.pointerDelta;

  if (config.enableRotation && isBindingActive(config.rotateButton, input)) {
    // Dragging right swings the camera left around the pivot.
    const dYaw = -dx * config.rotationSpeed * elapsed;
    const dPitch = -dy * config.rotationSpeed * elapsed;
    state.applyDelta(dYaw, dPitch, 0, 0, NO_PIVOT_DELTA);
  }

  if (config.enableZoom && isBindingActive(config.zoomButton, input)) {
    const scroll = scrollToLines(input.scrollDelta, input.scrollUnit);
    if (scroll !== 0) {
      state.applyDelta(0, 0, 0, -scroll * config.zoomSpeed, NO_PIVOT_DELTA);
    }
  }
  state.stepZoom(config.zoomSmoothness, elapsed);

  if (config.enablePan && isBindingActive(config.panButton, input) && (dx !== 0 || dy !== 0)) {
    // Scaled by radius so the pivot tracks the pointer at any zoom level.
    const scale = config.panSpeed * state.radius;
    const right = state.right();
    const up = state.up();
    const sx = -dx * scale;
    const sy = dy * scale;
    state.applyDelta(0, 0, 0, 0, [
      right[0] * sx + up[0] * sy,
      right[1] * sx + up[1] * sy,
      right[2] * sx + up[2] * sy,
    ]);
  }

  if (config.enableRoll) {
    const direction = rollDirection(config.rollButton, input);
    if (direction !== 0) {
      state.applyDelta(0, 0, direction * config.rollSpeed * elapsed, 0, NO_PIVOT_DELTA);
    }
  }
}

export class OrbitController {
  private _config: OrbitControlConfig;

  constructor(options?: OrbitControlOptions) {
    this._config = resolveOrbitControlConfig(options);
  }

  get config(): OrbitControlConfig {
    return { ...this._config };
  }

  /** Merges `options` over the current config; applies from the next update. */
  configure(options: OrbitControlOptions): void {
    this._config = resolveOrbitControlConfig(options, this._config);
  }

  reset(): void {
    this._config = resolveOrbitControlConfig(undefined, defaultOrbitControlConfig);
  }

  update(state: OrbitState, input: InputSample, dt: number): void {
    updateOrbit(this._config, input, dt, state);
  }
}
