import { createInputSample, scrollToLines } from "@orbit-camera-kit/orbit-core";
import type { InputSample, InputToken, ScrollUnit, Vec2 } from "@orbit-camera-kit/orbit-core";

export interface PointerInputCollectorOptions {
  /** Multiplier applied to pointer movement before it is reported. */
  pointerScale?: number;
  preventContextMenu?: boolean;
}

export interface OrbitEventTarget {
  addEventListener<K extends keyof GlobalEventHandlersEventMap>(
    type: K,
    listener: (event: GlobalEventHandlersEventMap[K]) => void,
    options?: AddEventListenerOptions | boolean
  ): void;
  removeEventListener<K extends keyof GlobalEventHandlersEventMap>(
    type: K,
    listener: (event: GlobalEventHandlersEventMap[K]) => void
  ): void;
}

/** An element that can hold pointer capture, such as the renderer's canvas. */
export interface OrbitPointerTarget extends OrbitEventTarget {
  setPointerCapture(pointerId: number): void;
  releasePointerCapture(pointerId: number): void;
  hasPointerCapture(pointerId: number): boolean;
}

type PointerMoveLike = Pick<PointerEvent, "movementX" | "movementY">;
type ButtonLike = Pick<PointerEvent, "button" | "pointerId">;
type PointerIdLike = Pick<PointerEvent, "pointerId">;
type WheelLike = Pick<WheelEvent, "deltaY" | "deltaMode" | "preventDefault">;
type KeyLike = Pick<KeyboardEvent, "code">;

const DEFAULTS: Required<PointerInputCollectorOptions> = {
  pointerScale: 1,
  preventContextMenu: true,
};

const MOUSE_BUTTON_TOKENS: Record<number, InputToken> = {
  0: "MouseLeft",
  1: "MouseMiddle",
  2: "MouseRight",
};

// WheelEvent.DOM_DELTA_PIXEL / DOM_DELTA_PAGE
const DELTA_MODE_PIXEL = 0;
const DELTA_MODE_PAGE = 2;

function wheelUnit(deltaMode: number): ScrollUnit {
  if (deltaMode === DELTA_MODE_PIXEL) return "pixel";
  if (deltaMode === DELTA_MODE_PAGE) return "page";
  return "line";
}

export function mouseButtonToken(button: number): InputToken {
  return MOUSE_BUTTON_TOKENS[button] ?? `Mouse${button}`;
}

/**
 * Accumulates DOM pointer, wheel and key events between frames and hands them out as
 * one InputSample per frame. Wheel input is normalized to line units, with scrolling
 * up (negative deltaY) reported as a positive zoom-in delta.
 *
 * While attached, a pressed pointer is captured by the target so its release is seen
 * even outside the element. Losing capture or leaving the element drops that pointer's
 * buttons.
 */
export class PointerInputCollector {
  private readonly options: Required<PointerInputCollectorOptions>;
  private pointerDelta: Vec2 = [0, 0];
  private scrollDelta = 0;
  private readonly held = new Set<InputToken>();
  private readonly pointerButtons = new Map<number, Set<InputToken>>();
  private captureTarget: OrbitPointerTarget | null = null;

  constructor(opts?: PointerInputCollectorOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  handlePointerMove(event: PointerMoveLike): void {
    const scale = this.options.pointerScale;
    this.pointerDelta = [
      this.pointerDelta[0] + event.movementX * scale,
      this.pointerDelta[1] + event.movementY * scale,
    ];
  }

  handlePointerDown(event: ButtonLike): void {
    const token = mouseButtonToken(event.button);
    this.held.add(token);
    const buttons = this.pointerButtons.get(event.pointerId) ?? new Set<InputToken>();
    buttons.add(token);
    this.pointerButtons.set(event.pointerId, buttons);
    this.captureTarget?.setPointerCapture(event.pointerId);
  }

  handlePointerUp(event: ButtonLike): void {
    const token = mouseButtonToken(event.button);
    this.held.delete(token);
    const buttons = this.pointerButtons.get(event.pointerId);
    buttons?.delete(token);
    if (buttons && buttons.size === 0) {
      this.pointerButtons.delete(event.pointerId);
    }
    const target = this.captureTarget;
    if (target && target.hasPointerCapture(event.pointerId)) {
      target.releasePointerCapture(event.pointerId);
    }
  }

  /** Drops every button still held by a pointer that lost capture or left the target. */
  handlePointerRelease(event: PointerIdLike): void {
    const buttons = this.pointerButtons.get(event.pointerId);
    if (!buttons) return;
    for (const token of buttons) {
      this.held.delete(token);
    }
    this.pointerButtons.delete(event.pointerId);
  }

  handleWheel(event: WheelLike): void {
    event.preventDefault();
    this.scrollDelta += scrollToLines(-event.deltaY, wheelUnit(event.deltaMode));
  }

  handleKeyDown(event: KeyLike): void {
    this.held.add(event.code);
  }

  handleKeyUp(event: KeyLike): void {
    this.held.delete(event.code);
  }

  /** Drops every held button and key, e.g. when the window loses focus. */
  releaseAll(): void {
    this.held.clear();
    this.pointerButtons.clear();
  }

  /** Returns the input gathered since the previous call and starts a new frame. */
  sample(): InputSample {
    const sample = createInputSample({
      pointerDelta: this.pointerDelta,
      scrollDelta: this.scrollDelta,
      scrollUnit: "line",
      held: this.held,
    });
    this.pointerDelta = [0, 0];
    this.scrollDelta = 0;
    return sample;
  }

  attach(target: OrbitPointerTarget, keyTarget: OrbitEventTarget = target): () => void {
    this.captureTarget = target;
    const onPointerMove = (event: PointerEvent) => this.handlePointerMove(event);
    const onPointerDown = (event: PointerEvent) => this.handlePointerDown(event);
    const onPointerUp = (event: PointerEvent) => this.handlePointerUp(event);
    const onPointerRelease = (event: PointerEvent) => this.handlePointerRelease(event);
    const onWheel = (event: WheelEvent) => this.handleWheel(event);
    const onKeyDown = (event: KeyboardEvent) => this.handleKeyDown(event);
    const onKeyUp = (event: KeyboardEvent) => this.handleKeyUp(event);
    const onBlur = () => this.releaseAll();
    const onContextMenu = (event: MouseEvent) => {
      if (this.options.preventContextMenu) event.preventDefault();
    };

    target.addEventListener("pointermove", onPointerMove);
    target.addEventListener("pointerdown", onPointerDown);
    target.addEventListener("pointerup", onPointerUp);
    target.addEventListener("pointercancel", onPointerUp);
    target.addEventListener("lostpointercapture", onPointerRelease);
    target.addEventListener("pointerleave", onPointerRelease);
    target.addEventListener("wheel", onWheel, { passive: false });
    target.addEventListener("contextmenu", onContextMenu);
    keyTarget.addEventListener("keydown", onKeyDown);
    keyTarget.addEventListener("keyup", onKeyUp);
    keyTarget.addEventListener("blur", onBlur);

    return () => {
      target.removeEventListener("pointermove", onPointerMove);
      target.removeEventListener("pointerdown", onPointerDown);
      target.removeEventListener("pointerup", onPointerUp);
      target.removeEventListener("pointercancel", onPointerUp);
      target.removeEventListener("lostpointercapture", onPointerRelease);
      target.removeEventListener("pointerleave", onPointerRelease);
      target.removeEventListener("wheel", onWheel);
      target.removeEventListener("contextmenu", onContextMenu);
      keyTarget.removeEventListener("keydown", onKeyDown);
      keyTarget.removeEventListener("keyup", onKeyUp);
      keyTarget.removeEventListener("blur", onBlur);
      if (this.captureTarget === target) this.captureTarget = null;
      this.releaseAll();
    };
  }
}

export { DEFAULTS as defaultPointerInputCollectorOptions };
