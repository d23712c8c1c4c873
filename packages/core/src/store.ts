import type { TidalEvent } from "@tidetable/contracts";

export const DEFAULT_CAPACITY = 32;
export const MAX_CAPACITY = 1024;

export type AppendResult = "stored" | "full" | "out_of_order";

export function emptyTidalEvent(): TidalEvent {
  return {
    epochTime: 0,
    isHighTide: false,
    heightM: 0,
    rawTimestamp: "",
    isValid: false,
  };
}

/**
 * Bounded, chronologically ordered table of finalized tidal events. The
 * capacity is fixed at construction and the backing array never grows past it.
 */
export class TidalEventStore {
  readonly capacity: number;
  private readonly slots: TidalEvent[];
  private length = 0;
  private droppedCount = 0;

  constructor(capacity = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1 || capacity > MAX_CAPACITY) {
      throw new RangeError(`store capacity must be an integer between 1 and ${MAX_CAPACITY}`);
    }
    this.capacity = capacity;
    this.slots = Array.from({ length: capacity }, () => emptyTidalEvent());
  }

  get count(): number {
    return this.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isFull(): boolean {
    return this.length >= this.capacity;
  }

  reset(): void {
    for (let i = 0; i < this.length; i += 1) {
      this.slots[i] = emptyTidalEvent();
    }
    this.length = 0;
    this.droppedCount = 0;
  }

  append(event: TidalEvent): AppendResult {
    if (this.isFull) {
      this.droppedCount += 1;
      return "full";
    }
    const last = this.length > 0 ? this.slots[this.length - 1] : undefined;
    if (last && event.epochTime < last.epochTime) {
      return "out_of_order";
    }
    this.slots[this.length] = { ...event, isValid: true };
    this.length += 1;
    return "stored";
  }

  at(index: number): TidalEvent {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      return emptyTidalEvent();
    }
    return { ...(this.slots[index] ?? emptyTidalEvent()) };
  }

  events(): TidalEvent[] {
    return this.slots.slice(0, this.length).map((event) => ({ ...event }));
  }
}
