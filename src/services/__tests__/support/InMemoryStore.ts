import { v4 as uuidv4 } from 'uuid';
import { distanceToPickup } from '../../../algorithms/distance';
import { compareEventsNewestFirst, isWithinWindow } from '../../../algorithms/eventWindow';
import { RideOrdering, RideQueryPlan } from '../../../algorithms/rideQuery';
import { mergeRideChanges } from '../../../algorithms/validation';
import {
  AppendEventResult,
  RideEventListQuery,
  RideEventRepository,
  RideRepository,
  UserListQuery,
  UserRepository
} from '../../../database/repositories';
import {
  LongTripReportRow,
  Page,
  PICKUP_ARRIVAL_EVENT,
  Ride,
  RIDE_COMPLETED_EVENT,
  RideChanges,
  RideEvent,
  RideInput,
  RideWithParties,
  User,
  UserChanges,
  UserInput,
  UserSummary
} from '../../../types';

/**
 * In-process stand-in for the three pg repositories, sharing one set of
 * tables so cascades and joins behave like the database.
 */
export class InMemoryStore {
  readonly users = new Map<string, User>();
  readonly rides = new Map<string, Ride>();
  readonly events = new Map<string, RideEvent>();

  readonly userRepository: UserRepository;
  readonly rideRepository: RideRepository;
  readonly eventRepository: RideEventRepository;

  constructor(readonly clock: () => Date = () => new Date()) {
    this.userRepository = new InMemoryUserRepository(this);
    this.rideRepository = new InMemoryRideRepository(this);
    this.eventRepository = new InMemoryRideEventRepository(this);
  }

  insertUser(input: UserInput): User {
    const now = this.clock();
    const user: User = { id: uuidv4(), ...input, createdAt: now, updatedAt: now };
    this.users.set(user.id, user);
    return user;
  }

  insertRide(input: RideInput): Ride {
    const ride: Ride = { id: uuidv4(), ...input };
    this.rides.set(ride.id, ride);
    return ride;
  }

  insertEvent(rideId: string, description: string, createdAt: Date = this.clock()): RideEvent {
    const event: RideEvent = { id: uuidv4(), rideId, description, createdAt };
    this.events.set(event.id, event);
    return event;
  }

  eventsFor(rideId: string): RideEvent[] {
    return [...this.events.values()].filter(event => event.rideId === rideId);
  }

  deleteRideCascade(rideId: string): boolean {
    for (const event of this.eventsFor(rideId)) {
      this.events.delete(event.id);
    }
    return this.rides.delete(rideId);
  }

  withParties(ride: Ride, distance: number | null): RideWithParties | null {
    const rider = this.users.get(ride.riderId);
    const driver = this.users.get(ride.driverId);
    if (!rider || !driver) {
      return null;
    }
    return { ...ride, riderDetails: summary(rider), driverDetails: summary(driver), distanceToPickup: distance };
  }
}

function summary(user: User): UserSummary {
  const { id, username, role, firstName, lastName, email, phoneNumber } = user;
  return { id, username, role, firstName, lastName, email, phoneNumber };
}

function paginate<T>(rows: T[], limit: number, offset: number): Page<T> {
  return { count: rows.length, rows: rows.slice(offset, offset + limit) };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function containsIgnoringCase(value: string, term: string | undefined): boolean {
  return term === undefined || value.toLowerCase().includes(term.toLowerCase());
}

/**
 * In-process counterpart of the ORDER BY clauses in rideQueries.ts: id
 * ascending breaks ties and rides without a distance sort last.
 */
function compareRides(ordering: RideOrdering): (a: RideWithParties, b: RideWithParties) => number {
  const descending = ordering.startsWith('-');
  const key = descending ? ordering.slice(1) : ordering;

  const primary = (a: RideWithParties, b: RideWithParties): number => {
    switch (key) {
      case 'pickupTime':
        return a.pickupTime.getTime() - b.pickupTime.getTime();
      case 'status':
        return compareText(a.status, b.status);
      case 'distance':
        return a.distanceToPickup === null || b.distanceToPickup === null ? 0 : a.distanceToPickup - b.distanceToPickup;
      default:
        return 0;
    }
  };

  return (a, b) => {
    if (key === 'distance') {
      if (a.distanceToPickup === null && b.distanceToPickup !== null) return 1;
      if (b.distanceToPickup === null && a.distanceToPickup !== null) return -1;
    }
    if (key === 'id') {
      const byId = compareText(a.id, b.id);
      return descending ? -byId : byId;
    }
    const result = primary(a, b);
    if (result !== 0) {
      return descending ? -result : result;
    }
    return compareText(a.id, b.id);
  };
}

class InMemoryUserRepository implements UserRepository {
  constructor(private readonly store: InMemoryStore) {}

  async findById(id: string): Promise<User | null> {
    return this.store.users.get(id) ?? null;
  }

  async emailTaken(email: string, excludeId?: string): Promise<boolean> {
    const lowered = email.toLowerCase();
    return [...this.store.users.values()].some(user => user.id !== excludeId && user.email.toLowerCase() === lowered);
  }

  async usernameTaken(username: string, excludeId?: string): Promise<boolean> {
    return [...this.store.users.values()].some(user => user.id !== excludeId && user.username === username);
  }

  async list(query: UserListQuery): Promise<Page<User>> {
    const search = query.search?.toLowerCase();
    const descending = query.ordering.startsWith('-');
    const key = descending ? query.ordering.slice(1) : query.ordering;

    const rows = [...this.store.users.values()]
      .filter(user => query.role === undefined || user.role === query.role)
      .filter(user => query.email === undefined || user.email === query.email)
      .filter(user => query.username === undefined || user.username === query.username)
      .filter(
        user =>
          search === undefined ||
          [user.username, user.firstName, user.lastName, user.email, user.phoneNumber].some(value =>
            value.toLowerCase().includes(search)
          )
      )
      .sort((a, b) => {
        const field = key === 'username' || key === 'firstName' || key === 'lastName' || key === 'email' ? key : 'id';
        const primary = compareText(a[field], b[field]);
        if (primary !== 0 || field === 'id') {
          return descending ? -primary : primary;
        }
        return compareText(a.id, b.id);
      });

    return paginate(rows, query.limit, query.offset);
  }

  async create(input: UserInput): Promise<User> {
    return this.store.insertUser(input);
  }

  async update(id: string, changes: UserChanges): Promise<User | null> {
    const existing = this.store.users.get(id);
    if (!existing) {
      return null;
    }
    const updated: User = {
      ...existing,
      role: changes.role ?? existing.role,
      username: changes.username ?? existing.username,
      firstName: changes.firstName ?? existing.firstName,
      lastName: changes.lastName ?? existing.lastName,
      email: changes.email ?? existing.email,
      phoneNumber: changes.phoneNumber ?? existing.phoneNumber,
      updatedAt: this.store.clock()
    };
    this.store.users.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.store.users.has(id)) {
      return false;
    }
    for (const ride of [...this.store.rides.values()]) {
      if (ride.riderId === id || ride.driverId === id) {
        this.store.deleteRideCascade(ride.id);
      }
    }
    return this.store.users.delete(id);
  }
}

class InMemoryRideRepository implements RideRepository {
  constructor(private readonly store: InMemoryStore) {}

  async list(plan: RideQueryPlan): Promise<Page<RideWithParties>> {
    const { filters, origin } = plan;
    const rows: RideWithParties[] = [];

    for (const ride of this.store.rides.values()) {
      const joined = this.store.withParties(ride, origin === null ? null : distanceToPickup(origin, ride));
      if (!joined) continue;
      if (filters.status !== undefined && ride.status !== filters.status) continue;
      if (filters.riderEmail !== undefined && joined.riderDetails.email !== filters.riderEmail) continue;
      if (filters.riderId !== undefined && ride.riderId !== filters.riderId) continue;
      if (filters.driverId !== undefined && ride.driverId !== filters.driverId) continue;
      if (!containsIgnoringCase(ride.status, filters.search)) continue;
      rows.push(joined);
    }

    return paginate(rows.sort(compareRides(plan.ordering)), plan.limit, plan.offset);
  }

  async findById(id: string): Promise<RideWithParties | null> {
    const ride = this.store.rides.get(id);
    return ride ? this.store.withParties(ride, null) : null;
  }

  async create(input: RideInput): Promise<Ride> {
    return this.store.insertRide(input);
  }

  async update(id: string, changes: RideChanges): Promise<Ride | null> {
    const existing = this.store.rides.get(id);
    if (!existing) {
      return null;
    }
    const updated: Ride = { id, ...mergeRideChanges(existing, changes) };
    this.store.rides.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.store.deleteRideCascade(id);
  }

  async longTripReport(minimumHours: number): Promise<LongTripReportRow[]> {
    const counts = new Map<string, LongTripReportRow>();

    for (const ride of this.store.rides.values()) {
      const events = this.store.eventsFor(ride.id);
      const firstAt = (description: string): number | undefined =>
        events
          .filter(event => event.description === description)
          .map(event => event.createdAt.getTime())
          .sort((a, b) => a - b)[0];

      const pickupAt = firstAt(PICKUP_ARRIVAL_EVENT);
      const dropoffAt = firstAt(RIDE_COMPLETED_EVENT);
      const driver = this.store.users.get(ride.driverId);
      if (pickupAt === undefined || dropoffAt === undefined || !driver) continue;
      if ((dropoffAt - pickupAt) / 3_600_000 <= minimumHours) continue;

      const month = new Date(pickupAt).toISOString().slice(0, 7);
      const name = `${driver.firstName} ${driver.lastName.slice(0, 1)}`;
      const key = `${month}|${name}`;
      const row = counts.get(key) ?? { month, driver: name, count: 0 };
      row.count++;
      counts.set(key, row);
    }

    return [...counts.values()].sort((a, b) => compareText(a.month, b.month) || compareText(a.driver, b.driver));
  }
}

class InMemoryRideEventRepository implements RideEventRepository {
  private readonly rideLocks = new Map<string, Promise<void>>();

  constructor(private readonly store: InMemoryStore) {}

  async findForRides(rideIds: string[], since: Date | null): Promise<RideEvent[]> {
    const wanted = new Set(rideIds);
    return [...this.store.events.values()]
      .filter(event => wanted.has(event.rideId) && (since === null || isWithinWindow(event, since)))
      .sort(compareEventsNewestFirst);
  }

  async appendWithinCap(rideId: string, description: string, cap: number): Promise<AppendEventResult> {
    return this.withRideLock<AppendEventResult>(rideId, async () => {
      if (!this.store.rides.has(rideId)) {
        return { status: 'ride-not-found' };
      }

      const count = this.store.eventsFor(rideId).length;
      // Yield between count and insert the way a database round-trip would
      await Promise.resolve();
      if (count >= cap) {
        return { status: 'cap-reached', count };
      }

      return { status: 'created', event: this.store.insertEvent(rideId, description) };
    });
  }

  async findById(id: string): Promise<RideEvent | null> {
    return this.store.events.get(id) ?? null;
  }

  async list(query: RideEventListQuery): Promise<Page<RideEvent>> {
    const rows = [...this.store.events.values()]
      .filter(event => query.rideId === undefined || event.rideId === query.rideId)
      .filter(event => containsIgnoringCase(event.description, query.search));

    if (query.ordering === 'id' || query.ordering === '-id') {
      rows.sort((a, b) => compareText(a.id, b.id));
      if (query.ordering === '-id') rows.reverse();
    } else {
      rows.sort(compareEventsNewestFirst);
      if (query.ordering === 'createdAt') rows.reverse();
    }
    return paginate(rows, query.limit, query.offset);
  }

  async updateDescription(id: string, description: string): Promise<RideEvent | null> {
    const existing = this.store.events.get(id);
    if (!existing) {
      return null;
    }
    const updated = { ...existing, description };
    this.store.events.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.store.events.delete(id);
  }

  /** Serialise work per ride, standing in for SELECT ... FOR UPDATE */
  private withRideLock<T>(rideId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.rideLocks.get(rideId) ?? Promise.resolve();
    const run = previous.then(work);
    this.rideLocks.set(
      rideId,
      run.then(
        () => undefined,
        () => undefined
      )
    );
    return run;
  }
}
