import type { OrbitController } from "./OrbitController";
import type { OrbitState } from "./OrbitState";
import type { InputSample, OrbitTransform } from "./types";

export interface OrbitCameraEntry<T = unknown> {
  id: string;
  state: OrbitState;
  tags: T | undefined;
}

export type OrbitCameraFilter<T = unknown> = (entry: OrbitCameraEntry<T>) => boolean;

/** Host-side collection of orbit cameras; the caller decides which ones a frame updates. */
export class OrbitCameraRegistry<T = unknown> {
  private readonly entries = new Map<string, OrbitCameraEntry<T>>();

  spawn(id: string, state: OrbitState, tags?: T): OrbitCameraEntry<T> {
    if (this.entries.has(id)) {
      throw new Error(`Duplicate camera id: ${id}`);
    }
    const entry: OrbitCameraEntry<T> = { id, state, tags };
    this.entries.set(id, entry);
    return entry;
  }

  despawn(id: string): boolean {
    return this.entries.delete(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): OrbitState {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new Error(`Unknown camera id: ${id}`);
    }
    return entry.state;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  update(
    controller: OrbitController,
    input: InputSample,
    dt: number,
    filter?: OrbitCameraFilter<T>
  ): Map<string, OrbitTransform> {
    const transforms = new Map<string, OrbitTransform>();
    for (const entry of this.entries.values()) {
      if (filter && !filter(entry)) continue;
      controller.update(entry.state, input, dt);
      transforms.set(entry.id, entry.state.transform);
    }
    return transforms;
  }
}
