export {
  applyOrbitTransform,
  applyOrbitToCamera,
  orbitStateFromObject,
  stepOrbitCamera,
} from "./applyOrbit";
export {
  PointerInputCollector,
  defaultPointerInputCollectorOptions,
  mouseButtonToken,
} from "./PointerInputCollector";
export type {
  OrbitEventTarget,
  OrbitPointerTarget,
  PointerInputCollectorOptions,
} from "./PointerInputCollector";
