import { MAX_ZOOM_SMOOTHNESS } from "./OrbitState";
import type { OrbitControlConfig, OrbitControlOptions } from "./types";

const DEFAULT_CONFIG: OrbitControlConfig = {
  enable: true,
  enableZoom: true,
  enableRotation: true,
  enablePan: true,
  enableRoll: true,
  zoomSpeed: 0.2,
  // Pointer deltas arrive in pixels: rotation is radians per pixel-second, pan is
  // pivot travel per pixel in units of radius (a 500 px drag moves one radius).
  rotationSpeed: Math.PI / 10,
  panSpeed: 0.002,
  rollSpeed: Math.PI / 2,
  zoomSmoothness: 0.75,
  rotateButton: "MouseLeft",
  zoomButton: null,
  panButton: "MouseRight",
  rollButton: ["KeyQ", "KeyE"],
};

const NUMERIC_KEYS = ["zoomSpeed", "rotationSpeed", "panSpeed", "rollSpeed", "zoomSmoothness"] as const;

export function resolveOrbitControlConfig(
  options?: OrbitControlOptions,
  base: OrbitControlConfig = DEFAULT_CONFIG
): OrbitControlConfig {
  const merged: OrbitControlConfig = { ...base };
  if (options) {
    for (const [key, value] of Object.entries(options)) {
      if (value !== undefined && key in merged) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  for (const key of NUMERIC_KEYS) {
    if (!Number.isFinite(merged[key])) {
      console.warn(`orbit-core: ignoring non-finite ${key}`, merged[key]);
      merged[key] = DEFAULT_CONFIG[key];
    }
  }

  if (merged.zoomSmoothness < 0 || merged.zoomSmoothness > MAX_ZOOM_SMOOTHNESS) {
    const clamped = Math.min(Math.max(merged.zoomSmoothness, 0), MAX_ZOOM_SMOOTHNESS);
    console.warn(`orbit-core: zoomSmoothness ${merged.zoomSmoothness} clamped to ${clamped}`);
    merged.zoomSmoothness = clamped;
  }

  return merged;
}

export { DEFAULT_CONFIG as defaultOrbitControlConfig };
