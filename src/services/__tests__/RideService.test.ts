import { RideService } from '../RideService';
import { UserService } from '../UserService';
import { RideInput, User, UserRole } from '../../types';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { InMemoryStore } from './support/InMemoryStore';

const now = new Date('2024-06-01T12:00:00.000Z');
const clock = () => now;
const minutesFromNow = (minutes: number) => new Date(now.getTime() + minutes * 60 * 1000);

const SF = { latitude: '37.7749', longitude: '-122.4194' };

describe('RideService', () => {
  let store: InMemoryStore;
  let service: RideService;
  let rider: User;
  let driver: User;

  function addUser(username: string, role: UserRole, email = `${username}@example.com`): User {
    return store.insertUser({ role, username, firstName: username, lastName: 'Tester', email, phoneNumber: '' });
  }

  function rideInput(overrides: Partial<RideInput> = {}): RideInput {
    return {
      status: 'requested',
      riderId: rider.id,
      driverId: driver.id,
      pickupLatitude: 37.7749,
      pickupLongitude: -122.4194,
      dropoffLatitude: 37.8049,
      dropoffLongitude: -122.4094,
      pickupTime: minutesFromNow(60),
      ...overrides
    };
  }

  async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
      await promise;
    } catch (error) {
      return error;
    }
    throw new Error('Expected the promise to reject');
  }

  beforeEach(() => {
    store = new InMemoryStore(clock);
    service = new RideService(store.rideRepository, store.eventRepository, new UserService(store.userRepository), clock);
    rider = addUser('rae', UserRole.RIDER);
    driver = addUser('dana', UserRole.DRIVER);
  });

  describe('listRides', () => {
    let same: string;
    let near: string;
    let far: string;

    beforeEach(() => {
      far = store.insertRide(rideInput({ pickupLatitude: 37.9, pickupLongitude: -122.0, pickupTime: minutesFromNow(10) })).id;
      same = store.insertRide(rideInput({ pickupTime: minutesFromNow(20) })).id;
      near = store.insertRide(
        rideInput({ pickupLatitude: 37.8, pickupLongitude: -122.45, pickupTime: minutesFromNow(30), status: 'pickup' })
      ).id;
    });

    it('should rank rides by distance to pickup from the query point', async () => {
      const page = await service.listRides({ ...SF, ordering: 'distance', limit: 10, offset: 0 });

      expect(page.rows.map(ride => ride.id)).toEqual([same, near, far]);
      expect(page.rows[0].distanceToPickup).toBe(0);
      expect(page.rows[1].distanceToPickup).toBeCloseTo(3.8756181671083265, 6);
      expect(page.rows[2].distanceToPickup).toBeCloseTo(39.3696514689789, 6);
    });

    it('should rank rides furthest first for -distance', async () => {
      const page = await service.listRides({ ...SF, ordering: '-distance', limit: 10, offset: 0 });

      expect(page.rows.map(ride => ride.id)).toEqual([far, near, same]);
    });

    it('should fall back to newest pickup first without a query point', async () => {
      const page = await service.listRides({ ordering: 'distance', limit: 10, offset: 0 });

      expect(page.rows.map(ride => ride.id)).toEqual([near, same, far]);
      expect(page.rows.every(ride => ride.distanceToPickup === null)).toBe(true);
    });

    it('should ignore coordinates that do not parse', async () => {
      const page = await service.listRides({ latitude: 'abc', longitude: '-122.4194', ordering: 'distance', limit: 10, offset: 0 });

      expect(page.rows.map(ride => ride.id)).toEqual([near, same, far]);
      expect(page.rows[0].distanceToPickup).toBeNull();
    });

    it('should filter by status and rider email', async () => {
      const other = addUser('otto', UserRole.RIDER);
      store.insertRide(rideInput({ riderId: other.id, status: 'pickup' }));

      const byStatus = await service.listRides({ status: 'pickup', limit: 10, offset: 0 });
      expect(byStatus.count).toBe(2);

      const byEmail = await service.listRides({ status: 'pickup', riderEmail: 'otto@example.com', limit: 10, offset: 0 });
      expect(byEmail.count).toBe(1);
      expect(byEmail.rows[0].riderDetails.username).toBe('otto');
    });

    it('should search statuses case-insensitively', async () => {
      store.insertRide(rideInput({ status: 'en-route' }));

      const page = await service.listRides({ search: 'ROUTE', limit: 10, offset: 0 });

      expect(page.count).toBe(1);
      expect(page.rows[0].status).toBe('en-route');
    });

    it('should page results and report the total count', async () => {
      const page = await service.listRides({ ordering: 'pickupTime', limit: 2, offset: 2 });

      expect(page.count).toBe(3);
      expect(page.rows.map(ride => ride.id)).toEqual([near]);
    });

    it('should attach only the last 24 hours of events, newest first', async () => {
      const recent = store.insertEvent(same, 'Trip started', minutesFromNow(-60));
      const edge = store.insertEvent(same, 'Driver accepted ride', minutesFromNow(-24 * 60));
      store.insertEvent(same, 'Ride requested by passenger', minutesFromNow(-25 * 60));

      const page = await service.listRides({ ...SF, ordering: 'distance', limit: 10, offset: 0 });

      expect(page.rows[0].todaysRideEvents.map(event => event.id)).toEqual([recent.id, edge.id]);
      expect(page.rows[1].todaysRideEvents).toEqual([]);
    });

    it('should fetch events for the whole page in one call', async () => {
      const listSpy = jest.spyOn(store.rideRepository, 'list');
      const eventsSpy = jest.spyOn(store.eventRepository, 'findForRides');

      const page = await service.listRides({ limit: 10, offset: 0 });

      expect(listSpy).toHaveBeenCalledTimes(1);
      expect(eventsSpy).toHaveBeenCalledTimes(1);
      expect(eventsSpy).toHaveBeenCalledWith(
        page.rows.map(ride => ride.id),
        new Date('2024-05-31T12:00:00.000Z')
      );
    });
  });

  describe('getRide', () => {
    it('should return the full event history without a distance', async () => {
      const ride = store.insertRide(rideInput());
      const older = store.insertEvent(ride.id, 'Ride requested by passenger', minutesFromNow(-3 * 24 * 60));
      const newer = store.insertEvent(ride.id, 'Driver accepted ride', minutesFromNow(-5));

      const detail = await service.getRide(ride.id);

      expect(detail.events.map(event => event.id)).toEqual([newer.id, older.id]);
      expect(detail.riderDetails.id).toBe(rider.id);
      expect(detail.driverDetails.role).toBe(UserRole.DRIVER);
      expect('distanceToPickup' in detail).toBe(false);
    });

    it('should throw NotFoundError for an unknown ride', async () => {
      await expect(service.getRide('missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('createRide', () => {
    it('should store a valid ride', async () => {
      const detail = await service.createRide(rideInput());

      expect(store.rides.size).toBe(1);
      expect(detail.status).toBe('requested');
      expect(detail.riderDetails.username).toBe('rae');
      expect(detail.events).toEqual([]);
    });

    it('should reject a latitude out of range without storing anything', async () => {
      const error = await captureError(service.createRide(rideInput({ pickupLatitude: 100 })));

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.errors).toEqual([
          { field: 'pickupLatitude', message: 'pickupLatitude must be between -90 and 90 degrees.' }
        ]);
      }
      expect(store.rides.size).toBe(0);
    });

    it('should accept a latitude of exactly 90', async () => {
      await expect(service.createRide(rideInput({ pickupLatitude: 90 }))).resolves.toBeDefined();
    });

    it('should reject a driver without the driver role', async () => {
      const otherRider = addUser('otto', UserRole.RIDER);

      await expect(service.createRide(rideInput({ driverId: otherRider.id }))).rejects.toThrow(
        `User ${otherRider.id} has role "rider", expected "driver".`
      );
    });

    it('should reject the same user as rider and driver', async () => {
      const error = await captureError(service.createRide(rideInput({ driverId: rider.id })));

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.errors).toContainEqual({ field: 'driverId', message: 'Rider and driver must be different users.' });
      }
    });

    it('should throw NotFoundError for an unknown rider', async () => {
      await expect(service.createRide(rideInput({ riderId: 'missing' }))).rejects.toThrow('Rider not found');
    });

    it('should reject identical pickup and dropoff', async () => {
      await expect(
        service.createRide(rideInput({ dropoffLatitude: 37.7749, dropoffLongitude: -122.4194 }))
      ).rejects.toThrow('Pickup and dropoff locations must be different.');
    });

    it('should allow a pickup up to five minutes in the past', async () => {
      await expect(service.createRide(rideInput({ pickupTime: minutesFromNow(-4) }))).resolves.toBeDefined();
      await expect(service.createRide(rideInput({ pickupTime: minutesFromNow(-10) }))).rejects.toThrow(
        'pickupTime cannot be more than 5 minutes in the past.'
      );
    });
  });

  describe('updateRide', () => {
    it('should apply a partial update without re-checking an old pickup time', async () => {
      const ride = store.insertRide(rideInput({ pickupTime: minutesFromNow(-3 * 24 * 60) }));

      const detail = await service.updateRide(ride.id, { status: 'completed' });

      expect(detail.status).toBe('completed');
      expect(detail.pickupTime).toEqual(minutesFromNow(-3 * 24 * 60));
    });

    it('should validate the merged ride', async () => {
      const ride = store.insertRide(rideInput());

      await expect(
        service.updateRide(ride.id, { dropoffLatitude: 37.7749, dropoffLongitude: -122.4194 })
      ).rejects.toThrow('Pickup and dropoff locations must be different.');
      expect(store.rides.get(ride.id)?.dropoffLatitude).toBe(37.8049);
    });

    it('should check the pickup time when the update sets it', async () => {
      const ride = store.insertRide(rideInput());

      await expect(service.updateRide(ride.id, { pickupTime: minutesFromNow(-60) })).rejects.toThrow(ValidationError);
    });

    it('should throw NotFoundError for an unknown ride', async () => {
      await expect(service.updateRide('missing', { status: 'completed' })).rejects.toThrow('Ride not found');
    });
  });

  describe('deleteRide', () => {
    it('should delete the ride and its events', async () => {
      const ride = store.insertRide(rideInput());
      store.insertEvent(ride.id, 'Trip started');

      await service.deleteRide(ride.id);

      expect(store.rides.size).toBe(0);
      expect(store.events.size).toBe(0);
      await expect(service.deleteRide(ride.id)).rejects.toThrow(NotFoundError);
    });
  });
});
