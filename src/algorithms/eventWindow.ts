import { RideEvent } from '../types';

export const EVENT_WINDOW_MS = 24 * 60 * 60 * 1000;

/**
 * Earliest createdAt a list view still shows. Computed once per request so
 * every ride on a page shares the same cutoff.
 */
export function eventWindowCutoff(now: Date): Date {
  return new Date(now.getTime() - EVENT_WINDOW_MS);
}

export function isWithinWindow(event: Pick<RideEvent, 'createdAt'>, cutoff: Date): boolean {
  return event.createdAt.getTime() >= cutoff.getTime();
}

/** Newest first; equal timestamps fall back to id descending */
export function compareEventsNewestFirst(a: RideEvent, b: RideEvent): number {
  const diff = b.createdAt.getTime() - a.createdAt.getTime();
  if (diff !== 0) {
    return diff;
  }
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/**
 * Group a prefetched batch of events by ride, each group newest first.
 * Rides without events are absent from the map.
 */
export function groupEventsByRide(events: RideEvent[]): Map<string, RideEvent[]> {
  const grouped = new Map<string, RideEvent[]>();

  for (const event of events) {
    const bucket = grouped.get(event.rideId);
    if (bucket) {
      bucket.push(event);
    } else {
      grouped.set(event.rideId, [event]);
    }
  }

  for (const bucket of grouped.values()) {
    bucket.sort(compareEventsNewestFirst);
  }
  return grouped;
}
