import type { TidalEvent, TideStatus, TimeSpan } from "@tidetable/contracts";
import { emptyTidalEvent, TidalEventStore } from "./store.js";

export type EventSource = TidalEventStore | readonly TidalEvent[];

function eventsOf(source: EventSource): readonly TidalEvent[] {
  return source instanceof TidalEventStore ? source.events() : source;
}

// Events are stored in time order.
export function previousTidalEvent(source: EventSource, time: number): TidalEvent {
  let bestMatch = emptyTidalEvent();
  for (const event of eventsOf(source)) {
    if (event.epochTime > time) break;
    bestMatch = { ...event };
  }
  return bestMatch;
}

export function nextTidalEvent(source: EventSource, time: number): TidalEvent {
  for (const event of eventsOf(source)) {
    if (event.epochTime > time) return { ...event };
  }
  return emptyTidalEvent();
}

/**
 * Whole hours and minutes between the event and `time`, in either direction.
 */
export function timeFrom(event: TidalEvent, time: number): TimeSpan {
  const diff = Math.trunc(Math.abs(event.epochTime - time));
  const hours = Math.floor(diff / 3600);
  const minutes = Math.floor((diff - hours * 3600) / 60);
  return { hours, minutes };
}

export function tideStatus(source: EventSource, time: number): TideStatus {
  const events = eventsOf(source);
  const previous = previousTidalEvent(events, time);
  const next = nextTidalEvent(events, time);
  return {
    at: time,
    previous,
    next,
    sincePrevious: previous.isValid ? timeFrom(previous, time) : null,
    untilNext: next.isValid ? timeFrom(next, time) : null,
  };
}

export function formatTimeSpan(span: TimeSpan): string {
  return `${span.hours}h ${String(span.minutes).padStart(2, "0")}m`;
}
