export interface Location {
  latitude: number;
  longitude: number;
}

export enum UserRole {
  RIDER = 'rider',
  DRIVER = 'driver',
  ADMIN = 'admin'
}

export const USER_ROLES = [UserRole.RIDER, UserRole.DRIVER, UserRole.ADMIN] as const;

/**
 * Status labels seen in practice. Ride status is stored as a free-form
 * string; this list documents the vocabulary and seeds dummy data.
 */
export const KNOWN_RIDE_STATUSES = [
  'requested',
  'accepted',
  'en-route',
  'pickup',
  'in-progress',
  'dropoff',
  'completed',
  'cancelled'
] as const;

export interface User {
  id: string;
  role: UserRole;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  createdAt: Date;
  updatedAt: Date;
}

/** The slice of a user inlined into ride responses */
export type UserSummary = Pick<User, 'id' | 'username' | 'role' | 'firstName' | 'lastName' | 'email' | 'phoneNumber'>;

export interface Ride {
  id: string;
  status: string;
  riderId: string;
  driverId: string;
  pickupLatitude: number;
  pickupLongitude: number;
  dropoffLatitude: number;
  dropoffLongitude: number;
  pickupTime: Date;
}

export interface RideEvent {
  id: string;
  rideId: string;
  description: string;
  createdAt: Date;
}

/** A ride joined with its rider and driver, as the storage layer returns it */
export interface RideWithParties extends Ride {
  riderDetails: UserSummary;
  driverDetails: UserSummary;
  distanceToPickup: number | null;
}

export interface RideListItem extends RideWithParties {
  todaysRideEvents: RideEvent[];
}

export interface RideDetail extends Omit<RideWithParties, 'distanceToPickup'> {
  events: RideEvent[];
}

export type RideInput = Omit<Ride, 'id'>;
export type RideChanges = Partial<RideInput>;

export type UserInput = Omit<User, 'id' | 'createdAt' | 'updatedAt'>;
export type UserChanges = Partial<UserInput>;

export interface Page<T> {
  count: number;
  rows: T[];
}

export interface PageRequest {
  limit: number;
  offset: number;
}

/** Event descriptions the long-trip report keys on */
export const PICKUP_ARRIVAL_EVENT = 'Driver arrived at pickup location';
export const RIDE_COMPLETED_EVENT = 'Ride completed';

export interface LongTripReportRow {
  month: string;
  driver: string;
  count: number;
}
