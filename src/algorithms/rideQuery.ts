import { Location, RideEvent, RideListItem, RideWithParties } from '../types';
import { parseOrigin } from './distance';
import { eventWindowCutoff, groupEventsByRide } from './eventWindow';

export const RIDE_ORDERINGS = [
  'pickupTime',
  '-pickupTime',
  'distance',
  '-distance',
  'id',
  '-id',
  'status',
  '-status'
] as const;

export type RideOrdering = (typeof RIDE_ORDERINGS)[number];

export const DEFAULT_RIDE_ORDERING: RideOrdering = '-pickupTime';

export interface RideListOptions {
  status?: string;
  riderEmail?: string;
  riderId?: string;
  driverId?: string;
  /** Case-insensitive substring of the status */
  search?: string;
  latitude?: unknown;
  longitude?: unknown;
  ordering?: string;
  limit: number;
  offset: number;
}

export interface RideFilters {
  status?: string;
  riderEmail?: string;
  riderId?: string;
  driverId?: string;
  search?: string;
}

/**
 * Everything one ride listing needs, fixed at the start of the request.
 * Plans are plain values; nothing here is shared between requests.
 */
export interface RideQueryPlan {
  readonly filters: Readonly<RideFilters>;
  readonly origin: Location | null;
  readonly ordering: RideOrdering;
  readonly eventCutoff: Date;
  readonly limit: number;
  readonly offset: number;
}

function isRideOrdering(value: string): value is RideOrdering {
  return (RIDE_ORDERINGS as readonly string[]).includes(value);
}

export function isDistanceOrdering(ordering: RideOrdering): boolean {
  return ordering === 'distance' || ordering === '-distance';
}

/**
 * Resolve the requested ordering. Unknown keys, and distance ordering without
 * an origin to measure from, fall back to newest pickup first.
 */
export function resolveOrdering(requested: string | undefined, origin: Location | null): RideOrdering {
  if (!requested || !isRideOrdering(requested)) {
    return DEFAULT_RIDE_ORDERING;
  }
  if (isDistanceOrdering(requested) && origin === null) {
    return DEFAULT_RIDE_ORDERING;
  }
  return requested;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

export function composeRideQuery(options: RideListOptions, now: Date): RideQueryPlan {
  const origin = parseOrigin(options.latitude, options.longitude);

  const filters: RideFilters = {};
  const status = nonEmpty(options.status);
  const riderEmail = nonEmpty(options.riderEmail);
  const riderId = nonEmpty(options.riderId);
  const driverId = nonEmpty(options.driverId);
  const search = nonEmpty(options.search?.trim());
  if (status !== undefined) filters.status = status;
  if (riderEmail !== undefined) filters.riderEmail = riderEmail;
  if (riderId !== undefined) filters.riderId = riderId;
  if (driverId !== undefined) filters.driverId = driverId;
  if (search !== undefined) filters.search = search;

  return Object.freeze({
    filters: Object.freeze(filters),
    origin,
    ordering: resolveOrdering(options.ordering, origin),
    eventCutoff: eventWindowCutoff(now),
    limit: options.limit,
    offset: options.offset
  });
}

/**
 * Attach each ride's windowed events to the page. Events for rides outside
 * the page are ignored.
 */
export function attachWindowedEvents(rides: RideWithParties[], events: RideEvent[]): RideListItem[] {
  const grouped = groupEventsByRide(events);
  return rides.map(ride => ({
    ...ride,
    todaysRideEvents: grouped.get(ride.id) ?? []
  }));
}
