import { attachWindowedEvents, composeRideQuery, RideListOptions } from '../algorithms/rideQuery';
import { groupEventsByRide } from '../algorithms/eventWindow';
import { assertValidRide, mergeRideChanges } from '../algorithms/validation';
import { RideEventRepository, RideRepository } from '../database/repositories';
import { Page, RideChanges, RideDetail, RideInput, RideListItem, RideWithParties, User } from '../types';
import { NotFoundError } from '../utils/errors';
import { logInfo } from '../utils/logger';

/** Where ride validation gets rider and driver records from */
export interface UserLookup {
  findUser(userId: string): Promise<User | null>;
}

export class RideService {
  constructor(
    private readonly rides: RideRepository,
    private readonly events: RideEventRepository,
    private readonly users: UserLookup,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * List rides for one request. The clock is read once so every ride on the
   * page is cut to the same 24-hour event window.
   * Round-trips: count + page, then one windowed event prefetch.
   */
  async listRides(options: RideListOptions): Promise<Page<RideListItem>> {
    const plan = composeRideQuery(options, this.clock());

    const page = await this.rides.list(plan);
    const events = await this.events.findForRides(
      page.rows.map(ride => ride.id),
      plan.eventCutoff
    );

    return {
      count: page.count,
      rows: attachWindowedEvents(page.rows, events)
    };
  }

  /**
   * Single ride with its full event history, newest first.
   */
  async getRide(rideId: string): Promise<RideDetail> {
    const ride = await this.rides.findById(rideId);
    if (!ride) {
      throw new NotFoundError('Ride not found', { rideId });
    }

    const events = await this.events.findForRides([ride.id], null);
    return toDetail(ride, groupEventsByRide(events).get(ride.id) ?? []);
  }

  async createRide(input: RideInput): Promise<RideDetail> {
    await this.validate(input, true);

    const ride = await this.rides.create(input);
    logInfo('Ride created', { rideId: ride.id, riderId: ride.riderId, driverId: ride.driverId });
    return this.getRide(ride.id);
  }

  /**
   * Apply a full or partial change set. Fields absent from `changes` are
   * taken from the stored ride before validation runs.
   */
  async updateRide(rideId: string, changes: RideChanges): Promise<RideDetail> {
    const existing = await this.rides.findById(rideId);
    if (!existing) {
      throw new NotFoundError('Ride not found', { rideId });
    }

    const merged = mergeRideChanges(existing, changes);
    await this.validate(merged, changes.pickupTime !== undefined);

    const updated = await this.rides.update(rideId, changes);
    if (!updated) {
      throw new NotFoundError('Ride not found', { rideId });
    }
    return this.getRide(rideId);
  }

  async deleteRide(rideId: string): Promise<void> {
    const deleted = await this.rides.delete(rideId);
    if (!deleted) {
      throw new NotFoundError('Ride not found', { rideId });
    }
    logInfo('Ride deleted', { rideId });
  }

  private async validate(ride: RideInput, checkPickupTime: boolean): Promise<void> {
    const rider = await this.users.findUser(ride.riderId);
    if (!rider) {
      throw new NotFoundError('Rider not found', { field: 'riderId', userId: ride.riderId });
    }
    const driver = await this.users.findUser(ride.driverId);
    if (!driver) {
      throw new NotFoundError('Driver not found', { field: 'driverId', userId: ride.driverId });
    }

    assertValidRide(ride, { rider, driver, now: this.clock(), checkPickupTime });
  }
}

function toDetail(ride: RideWithParties, events: RideDetail['events']): RideDetail {
  const { distanceToPickup: _distance, ...rest } = ride;
  return { ...rest, events };
}
