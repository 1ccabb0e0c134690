import { composeRideQuery } from '../../algorithms/rideQuery';
import { RideOrdering } from '../../algorithms/rideQuery';
import {
  buildRideListQueries,
  containsPattern,
  distanceSql,
  mapRideWithPartiesRow,
  RIDE_WITH_PARTIES_FROM
} from '../rideQueries';
import { UserRole } from '../../types';

const now = new Date('2024-06-01T12:00:00.000Z');

describe('buildRideListQueries', () => {
  it('should number filter parameters before the distance and paging parameters', () => {
    const plan = composeRideQuery(
      {
        status: 'pickup',
        riderEmail: 'rider@example.com',
        latitude: '37.7749',
        longitude: '-122.4194',
        ordering: 'distance',
        limit: 10,
        offset: 20
      },
      now
    );

    const { count, page } = buildRideListQueries(plan);

    expect(count.text).toBe(
      `SELECT COUNT(*) AS count ${RIDE_WITH_PARTIES_FROM} WHERE r.status = $1 AND rider.email = $2`
    );
    expect(count.values).toEqual(['pickup', 'rider@example.com']);

    expect(page.values).toEqual(['pickup', 'rider@example.com', 37.7749, -122.4194, 10, 20]);
    expect(page.text).toContain(`${distanceSql('$3', '$4')} AS distance_to_pickup`);
    expect(page.text).toContain(' WHERE r.status = $1 AND rider.email = $2 ');
    expect(page.text.endsWith('ORDER BY distance_to_pickup ASC NULLS LAST, r.id ASC LIMIT $5 OFFSET $6')).toBe(true);
  });

  it('should select a null distance and order by newest pickup without an origin', () => {
    const plan = composeRideQuery({ ordering: 'distance', limit: 10, offset: 0 }, now);

    const { count, page } = buildRideListQueries(plan);

    expect(count.text).toBe(`SELECT COUNT(*) AS count ${RIDE_WITH_PARTIES_FROM}`);
    expect(count.values).toEqual([]);
    expect(page.text).toContain('NULL::float8 AS distance_to_pickup');
    expect(page.text.endsWith('ORDER BY r.pickup_time DESC, r.id ASC LIMIT $1 OFFSET $2')).toBe(true);
    expect(page.values).toEqual([10, 0]);
  });

  it('should filter by rider and driver ids', () => {
    const plan = composeRideQuery({ riderId: 'rider-1', driverId: 'driver-1', ordering: '-id', limit: 5, offset: 0 }, now);

    const { count, page } = buildRideListQueries(plan);

    expect(count.text.endsWith(' WHERE r.rider_id = $1 AND r.driver_id = $2')).toBe(true);
    expect(page.text.endsWith('ORDER BY r.id DESC LIMIT $3 OFFSET $4')).toBe(true);
    expect(page.values).toEqual(['rider-1', 'driver-1', 5, 0]);
  });
});

describe('buildRideListQueries ordering', () => {
  const origin = { latitude: '37.7749', longitude: '-122.4194' };

  it.each<[RideOrdering, string]>([
    ['pickupTime', 'r.pickup_time ASC, r.id ASC'],
    ['-pickupTime', 'r.pickup_time DESC, r.id ASC'],
    ['distance', 'distance_to_pickup ASC NULLS LAST, r.id ASC'],
    ['-distance', 'distance_to_pickup DESC NULLS LAST, r.id ASC'],
    ['id', 'r.id ASC'],
    ['-id', 'r.id DESC'],
    ['status', 'r.status ASC, r.id ASC'],
    ['-status', 'r.status DESC, r.id ASC']
  ])('should order %s by %s', (ordering, clause) => {
    const { page } = buildRideListQueries(composeRideQuery({ ...origin, ordering, limit: 10, offset: 0 }, now));

    expect(page.text.endsWith(`ORDER BY ${clause} LIMIT $3 OFFSET $4`)).toBe(true);
  });
});

describe('buildRideListQueries search', () => {
  it('should match the status case-insensitively with wildcards escaped', () => {
    const plan = composeRideQuery({ status: 'pickup', search: 'en_route', limit: 10, offset: 0 }, now);

    const { count, page } = buildRideListQueries(plan);

    expect(count.text).toBe(
      `SELECT COUNT(*) AS count ${RIDE_WITH_PARTIES_FROM} WHERE r.status = $1 AND r.status ILIKE $2 ESCAPE '\\'`
    );
    expect(count.values).toEqual(['pickup', '%en\\_route%']);
    expect(page.values).toEqual(['pickup', '%en\\_route%', 10, 0]);
  });
});

describe('containsPattern', () => {
  it('should wrap the term and escape LIKE metacharacters', () => {
    expect(containsPattern('route')).toBe('%route%');
    expect(containsPattern('50%_\\')).toBe('%50\\%\\_\\\\%');
  });
});

describe('distanceSql', () => {
  it('should answer exactly 0 for the query point and clamp the cosine before ACOS otherwise', () => {
    expect(distanceSql('$1', '$2')).toBe(
      'CASE WHEN r.pickup_latitude = $1::float8 AND r.pickup_longitude = $2::float8 THEN 0::float8 ' +
        'ELSE 6371 * ACOS(LEAST(1, GREATEST(-1, ' +
        'COS(RADIANS($1::float8)) * COS(RADIANS(r.pickup_latitude)) * ' +
        'COS(RADIANS(r.pickup_longitude) - RADIANS($2::float8)) + ' +
        'SIN(RADIANS($1::float8)) * SIN(RADIANS(r.pickup_latitude))))) END'
    );
  });
});

describe('mapRideWithPartiesRow', () => {
  const party = {
    id: 'rider-1',
    username: 'rider',
    role: UserRole.RIDER,
    firstName: 'Rae',
    lastName: 'Rider',
    email: 'rider@example.com',
    phoneNumber: '+15550000001'
  };
  const row = {
    id: 'ride-1',
    status: 'pickup',
    rider_id: 'rider-1',
    driver_id: 'driver-1',
    pickup_latitude: 37.7749,
    pickup_longitude: -122.4194,
    dropoff_latitude: 37.8,
    dropoff_longitude: -122.4,
    pickup_time: new Date('2024-06-01T10:00:00.000Z'),
    rider_details: party,
    driver_details: { ...party, id: 'driver-1', role: UserRole.DRIVER }
  };

  it('should map columns to a ride with parties', () => {
    const ride = mapRideWithPartiesRow({ ...row, distance_to_pickup: 3.5 });

    expect(ride.id).toBe('ride-1');
    expect(ride.riderId).toBe('rider-1');
    expect(ride.pickupTime.toISOString()).toBe('2024-06-01T10:00:00.000Z');
    expect(ride.riderDetails).toEqual(party);
    expect(ride.driverDetails.role).toBe(UserRole.DRIVER);
    expect(ride.distanceToPickup).toBe(3.5);
  });

  it('should map a missing distance to null', () => {
    expect(mapRideWithPartiesRow({ ...row, distance_to_pickup: null }).distanceToPickup).toBeNull();
    expect(mapRideWithPartiesRow(row).distanceToPickup).toBeNull();
  });
});
