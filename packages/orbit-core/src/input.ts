import type { InputSample, InputToken, RollBinding, ScrollUnit, Vec2 } from "./types";

// Browsers report pixel wheel deltas roughly 100-200x larger than line deltas.
export const PIXEL_SCROLL_SCALE = 0.005;
export const LINES_PER_PAGE = 20;

export interface InputSampleInit {
  pointerDelta?: Vec2;
  scrollDelta?: number;
  scrollUnit?: ScrollUnit;
  held?: Iterable<InputToken>;
}

export function createInputSample(init: InputSampleInit = {}): InputSample {
  const held = new Set(init.held ?? []);
  return {
    pointerDelta: init.pointerDelta ?? [0, 0],
    scrollDelta: init.scrollDelta ?? 0,
    scrollUnit: init.scrollUnit ?? "line",
    isHeld: (token) => held.has(token),
  };
}

export const EMPTY_INPUT: InputSample = createInputSample();

export function scrollToLines(delta: number, unit: ScrollUnit = "line"): number {
  switch (unit) {
    case "pixel":
      return delta * PIXEL_SCROLL_SCALE;
    case "page":
      return delta * LINES_PER_PAGE;
    default:
      return delta;
  }
}

export function isBindingActive(binding: InputToken | null, input: InputSample): boolean {
  return binding === null || input.isHeld(binding);
}

/** Both keys held cancel out. */
export function rollDirection(binding: RollBinding | null, input: InputSample): -1 | 0 | 1 {
  if (binding === null) return 0;
  const [increase, decrease] = binding;
  const direction = (input.isHeld(increase) ? 1 : 0) - (input.isHeld(decrease) ? 1 : 0);
  if (direction > 0) return 1;
  if (direction < 0) return -1;
  return 0;
}
