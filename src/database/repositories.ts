import {
  LongTripReportRow,
  Page,
  PageRequest,
  Ride,
  RideChanges,
  RideEvent,
  RideInput,
  RideWithParties,
  User,
  UserChanges,
  UserInput,
  UserRole
} from '../types';
import { RideQueryPlan } from '../algorithms/rideQuery';

/**
 * Storage contracts the services depend on. The pg-backed classes in this
 * directory implement them for production; tests supply in-process doubles.
 */

export type UserOrdering = 'id' | '-id' | 'username' | '-username' | 'firstName' | '-firstName' | 'lastName' | '-lastName' | 'email' | '-email';

export interface UserListQuery extends PageRequest {
  role?: UserRole;
  email?: string;
  username?: string;
  search?: string;
  ordering: UserOrdering;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  /** Case-insensitive email lookup, optionally ignoring one user */
  emailTaken(email: string, excludeId?: string): Promise<boolean>;
  usernameTaken(username: string, excludeId?: string): Promise<boolean>;
  list(query: UserListQuery): Promise<Page<User>>;
  create(input: UserInput): Promise<User>;
  update(id: string, changes: UserChanges): Promise<User | null>;
  /** Deletes the user together with their rides and those rides' events */
  delete(id: string): Promise<boolean>;
}

export interface RideRepository {
  /** Page of rides with rider/driver summaries and derived distance */
  list(plan: RideQueryPlan): Promise<Page<RideWithParties>>;
  findById(id: string): Promise<RideWithParties | null>;
  create(input: RideInput): Promise<Ride>;
  update(id: string, changes: RideChanges): Promise<Ride | null>;
  delete(id: string): Promise<boolean>;
  longTripReport(minimumHours: number): Promise<LongTripReportRow[]>;
}

export type AppendEventResult =
  | { status: 'created'; event: RideEvent }
  | { status: 'ride-not-found' }
  | { status: 'cap-reached'; count: number };

export type RideEventOrdering = 'createdAt' | '-createdAt' | 'id' | '-id';

export interface RideEventListQuery extends PageRequest {
  rideId?: string;
  /** Case-insensitive substring of the description */
  search?: string;
  ordering: RideEventOrdering;
}

export interface RideEventRepository {
  /**
   * Events for a set of rides in one round-trip. With a cutoff only events
   * created at or after it are returned.
   */
  findForRides(rideIds: string[], since: Date | null): Promise<RideEvent[]>;
  /**
   * Insert an event unless the ride is missing or already holds `cap`
   * events. The existence check, count and insert are one atomic step.
   */
  appendWithinCap(rideId: string, description: string, cap: number): Promise<AppendEventResult>;
  findById(id: string): Promise<RideEvent | null>;
  list(query: RideEventListQuery): Promise<Page<RideEvent>>;
  updateDescription(id: string, description: string): Promise<RideEvent | null>;
  delete(id: string): Promise<boolean>;
}
