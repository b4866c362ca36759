import { describe, expect, it, vi } from "vitest";
import { PointerInputCollector, mouseButtonToken } from "../src";
import type { OrbitPointerTarget } from "../src";

class RecordingTarget implements OrbitPointerTarget {
  readonly types = new Set<string>();
  readonly captured = new Set<number>();

  addEventListener<K extends keyof GlobalEventHandlersEventMap>(type: K): void {
    this.types.add(type);
  }

  removeEventListener<K extends keyof GlobalEventHandlersEventMap>(type: K): void {
    this.types.delete(type);
  }

  setPointerCapture(pointerId: number): void {
    this.captured.add(pointerId);
  }

  releasePointerCapture(pointerId: number): void {
    this.captured.delete(pointerId);
  }

  hasPointerCapture(pointerId: number): boolean {
    return this.captured.has(pointerId);
  }
}

describe("mouseButtonToken", () => {
  it("names the common buttons", () => {
    expect(mouseButtonToken(0)).toBe("MouseLeft");
    expect(mouseButtonToken(1)).toBe("MouseMiddle");
    expect(mouseButtonToken(2)).toBe("MouseRight");
    expect(mouseButtonToken(4)).toBe("Mouse4");
  });
});

describe("PointerInputCollector", () => {
  it("accumulates pointer movement until sampled", () => {
    const collector = new PointerInputCollector();
    collector.handlePointerMove({ movementX: 3, movementY: -1 });
    collector.handlePointerMove({ movementX: 3, movementY: -1 });

    expect(collector.sample().pointerDelta).toEqual([6, -2]);
    expect(collector.sample().pointerDelta).toEqual([0, 0]);
  });

  it("scales pointer movement", () => {
    const collector = new PointerInputCollector({ pointerScale: 0.5 });
    collector.handlePointerMove({ movementX: 4, movementY: 2 });
    expect(collector.sample().pointerDelta).toEqual([2, 1]);
  });

  it("reports wheel-up as positive line scroll", () => {
    const collector = new PointerInputCollector();
    const preventDefault = vi.fn();
    collector.handleWheel({ deltaY: -200, deltaMode: 0, preventDefault });
    collector.handleWheel({ deltaY: 2, deltaMode: 1, preventDefault });

    const sample = collector.sample();
    expect(sample.scrollUnit).toBe("line");
    expect(sample.scrollDelta).toBeCloseTo(-1, 12);
    expect(preventDefault).toHaveBeenCalledTimes(2);
    expect(collector.sample().scrollDelta).toBe(0);
  });

  it("expands page wheel deltas to lines", () => {
    const collector = new PointerInputCollector();
    collector.handleWheel({ deltaY: 1, deltaMode: 2, preventDefault: vi.fn() });
    expect(collector.sample().scrollDelta).toBe(-20);
  });

  it("tracks held buttons and keys per sample", () => {
    const collector = new PointerInputCollector();
    collector.handlePointerDown({ button: 2, pointerId: 1 });
    collector.handleKeyDown({ code: "KeyQ" });
    const held = collector.sample();

    collector.handlePointerUp({ button: 2, pointerId: 1 });
    const released = collector.sample();

    expect(held.isHeld("MouseRight")).toBe(true);
    expect(held.isHeld("KeyQ")).toBe(true);
    expect(released.isHeld("MouseRight")).toBe(false);
    expect(released.isHeld("KeyQ")).toBe(true);

    collector.handleKeyUp({ code: "KeyQ" });
    expect(collector.sample().isHeld("KeyQ")).toBe(false);
  });

  it("releases everything on releaseAll", () => {
    const collector = new PointerInputCollector();
    collector.handlePointerDown({ button: 0, pointerId: 1 });
    collector.handleKeyDown({ code: "KeyE" });
    collector.releaseAll();

    const sample = collector.sample();
    expect(sample.isHeld("MouseLeft")).toBe(false);
    expect(sample.isHeld("KeyE")).toBe(false);
  });

  it("registers pointer and key listeners and removes them on detach", () => {
    const collector = new PointerInputCollector();
    const element = new RecordingTarget();
    const keys = new RecordingTarget();

    const detach = collector.attach(element, keys);

    expect([...element.types].sort()).toEqual([
      "contextmenu",
      "lostpointercapture",
      "pointercancel",
      "pointerdown",
      "pointerleave",
      "pointermove",
      "pointerup",
      "wheel",
    ]);
    expect([...keys.types].sort()).toEqual(["blur", "keydown", "keyup"]);

    detach();
    expect(element.types.size).toBe(0);
    expect(keys.types.size).toBe(0);
  });

  it("captures the pointer on press and releases it on button up", () => {
    const collector = new PointerInputCollector();
    const element = new RecordingTarget();
    collector.attach(element, new RecordingTarget());

    collector.handlePointerDown({ button: 0, pointerId: 7 });
    expect([...element.captured]).toEqual([7]);
    expect(collector.sample().isHeld("MouseLeft")).toBe(true);

    collector.handlePointerUp({ button: 0, pointerId: 7 });
    expect(element.captured.size).toBe(0);
    expect(collector.sample().isHeld("MouseLeft")).toBe(false);
  });

  it("drops a pointer's buttons when it loses capture", () => {
    const collector = new PointerInputCollector();
    collector.attach(new RecordingTarget(), new RecordingTarget());

    collector.handlePointerDown({ button: 0, pointerId: 7 });
    collector.handlePointerDown({ button: 2, pointerId: 8 });
    collector.handlePointerRelease({ pointerId: 7 });

    const sample = collector.sample();
    expect(sample.isHeld("MouseLeft")).toBe(false);
    expect(sample.isHeld("MouseRight")).toBe(true);
  });

  it("stops capturing after detach", () => {
    const collector = new PointerInputCollector();
    const element = new RecordingTarget();
    const detach = collector.attach(element, new RecordingTarget());

    detach();
    collector.handlePointerDown({ button: 0, pointerId: 3 });

    expect(element.captured.size).toBe(0);
    expect(collector.sample().isHeld("MouseLeft")).toBe(true);
  });
});
