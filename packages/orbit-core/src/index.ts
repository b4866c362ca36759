export * from "./types";
export * from "./math";
export * from "./input";
export { OrbitState, MAX_ZOOM_SMOOTHNESS } from "./OrbitState";
export { OrbitController, updateOrbit } from "./OrbitController";
export { resolveOrbitControlConfig, defaultOrbitControlConfig } from "./config";
export { OrbitCameraRegistry } from "./OrbitCameraRegistry";
export type { OrbitCameraEntry, OrbitCameraFilter } from "./OrbitCameraRegistry";
