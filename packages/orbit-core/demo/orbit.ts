import { OrbitController, OrbitState, createInputSample } from "../src";

const controller = new OrbitController({ zoomSmoothness: 0 });
const state = OrbitState.create({ radius: 6, pitch: Math.PI / 8 });

controller.update(state, createInputSample({ pointerDelta: [5, -3], held: ["MouseLeft"] }), 1 / 60);
controller.update(state, createInputSample({ scrollDelta: 1 }), 1 / 60);

console.log("Orbit state after input:", state.snapshot());
console.log("Camera transform:", state.transform);
