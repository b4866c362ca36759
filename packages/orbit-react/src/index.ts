export { useOrbitCamera, OrbitCameraRig } from "./useOrbitCamera";
export type { OrbitCameraHandle, OrbitCameraRigProps, UseOrbitCameraOptions } from "./useOrbitCamera";
