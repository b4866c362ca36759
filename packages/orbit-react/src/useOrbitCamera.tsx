import { useEffect, useMemo, useRef } from "react";
import { useFrame, useThree } from "@react-three/fiber";
import { OrbitController, OrbitState } from "@orbit-camera-kit/orbit-core";
import type { OrbitControlOptions, OrbitStateInit } from "@orbit-camera-kit/orbit-core";
import {
  PointerInputCollector,
  applyOrbitToCamera,
  stepOrbitCamera,
} from "@orbit-camera-kit/orbit-three";
import type { PointerInputCollectorOptions } from "@orbit-camera-kit/orbit-three";

export type UseOrbitCameraOptions = {
  initial?: OrbitStateInit;
  options?: OrbitControlOptions;
  input?: PointerInputCollectorOptions;
  /** Frames are skipped while false; input is still drained. */
  active?: boolean;
};

export type OrbitCameraHandle = {
  state: OrbitState;
  controller: OrbitController;
};

export function useOrbitCamera(opts: UseOrbitCameraOptions = {}): OrbitCameraHandle {
  const { initial, options, input, active = true } = opts;
  const { camera, gl } = useThree();

  // Created once; later changes to `initial` or `input` do not rebuild them.
  const stateRef = useRef<OrbitState | null>(null);
  if (stateRef.current === null) {
    stateRef.current = OrbitState.create(initial);
  }
  const state = stateRef.current;
  const controller = useMemo(() => new OrbitController(), []);
  const collector = useMemo(() => new PointerInputCollector(input), []);

  useEffect(() => {
    controller.reset();
    if (options) controller.configure(options);
  }, [controller, options]);

  useEffect(() => {
    if (typeof window === "undefined") return;
    return collector.attach(gl.domElement, window);
  }, [collector, gl]);

  useEffect(() => {
    applyOrbitToCamera(camera, state);
  }, [camera, state]);

  useFrame((frame, delta) => {
    const sample = collector.sample();
    if (!active) return;
    stepOrbitCamera(controller, state, sample, frame.camera, delta);
  });

  return { state, controller };
}

export type OrbitCameraRigProps = UseOrbitCameraOptions & {
  onReady?: (handle: OrbitCameraHandle) => void;
};

/** Component form of `useOrbitCamera`; renders nothing. */
export function OrbitCameraRig({ onReady, ...opts }: OrbitCameraRigProps): null {
  const handle = useOrbitCamera(opts);
  const onReadyRef = useRef(onReady);
  useEffect(() => {
    onReadyRef.current = onReady;
  }, [onReady]);
  useEffect(() => {
    onReadyRef.current?.(handle);
  }, [handle.state, handle.controller]);
  return null;
}
