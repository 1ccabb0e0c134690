import { QueryResult, QueryResultRow } from 'pg';
import { RideQueryPlan, RideOrdering } from '../algorithms/rideQuery';
import { EARTH_RADIUS_KM } from '../algorithms/distance';
import { RideWithParties, UserSummary } from '../types';

/**
 * The slice of pg the repositories use. pg.Pool and pg.PoolClient satisfy it;
 * tests pass a recording fake.
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

/**
 * SQL form of greatCircleDistance, clamped the same way and exactly 0 when the
 * pickup is the query point. `lat` and `lon` are placeholders such as `$3`.
 */
export function distanceSql(lat: string, lon: string): string {
  return (
    `CASE WHEN r.pickup_latitude = ${lat}::float8 AND r.pickup_longitude = ${lon}::float8 THEN 0::float8 ` +
    `ELSE ${EARTH_RADIUS_KM} * ACOS(LEAST(1, GREATEST(-1, ` +
    `COS(RADIANS(${lat}::float8)) * COS(RADIANS(r.pickup_latitude)) * ` +
    `COS(RADIANS(r.pickup_longitude) - RADIANS(${lon}::float8)) + ` +
    `SIN(RADIANS(${lat}::float8)) * SIN(RADIANS(r.pickup_latitude))))) END`
  );
}

/**
 * ILIKE pattern matching `term` anywhere, with its own `%`, `_` and `\`
 * taken literally. Pair it with `ESCAPE '\'`.
 */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, '\\$&')}%`;
}

const ORDER_BY: Record<RideOrdering, string> = {
  pickupTime: 'r.pickup_time ASC, r.id ASC',
  '-pickupTime': 'r.pickup_time DESC, r.id ASC',
  distance: 'distance_to_pickup ASC NULLS LAST, r.id ASC',
  '-distance': 'distance_to_pickup DESC NULLS LAST, r.id ASC',
  id: 'r.id ASC',
  '-id': 'r.id DESC',
  status: 'r.status ASC, r.id ASC',
  '-status': 'r.status DESC, r.id ASC'
};

function partySql(alias: 'rider' | 'driver'): string {
  return (
    `json_build_object('id', ${alias}.id, 'username', ${alias}.username, 'role', ${alias}.role, ` +
    `'firstName', ${alias}.first_name, 'lastName', ${alias}.last_name, 'email', ${alias}.email, ` +
    `'phoneNumber', ${alias}.phone_number) AS ${alias}_details`
  );
}

export const RIDE_WITH_PARTIES_COLUMNS = [
  'r.id',
  'r.status',
  'r.rider_id',
  'r.driver_id',
  'r.pickup_latitude',
  'r.pickup_longitude',
  'r.dropoff_latitude',
  'r.dropoff_longitude',
  'r.pickup_time',
  partySql('rider'),
  partySql('driver')
].join(', ');

export const RIDE_WITH_PARTIES_FROM =
  'FROM rides r JOIN users rider ON rider.id = r.rider_id JOIN users driver ON driver.id = r.driver_id';

/**
 * Translate a plan into its count and page statements. Both share the same
 * WHERE clause and parameter numbering for the filters.
 */
export function buildRideListQueries(plan: RideQueryPlan): { count: SqlQuery; page: SqlQuery } {
  const conditions: string[] = [];
  const values: unknown[] = [];
  let paramCount = 1;

  if (plan.filters.status !== undefined) {
    conditions.push(`r.status = $${paramCount++}`);
    values.push(plan.filters.status);
  }
  if (plan.filters.riderEmail !== undefined) {
    conditions.push(`rider.email = $${paramCount++}`);
    values.push(plan.filters.riderEmail);
  }
  if (plan.filters.riderId !== undefined) {
    conditions.push(`r.rider_id = $${paramCount++}`);
    values.push(plan.filters.riderId);
  }
  if (plan.filters.driverId !== undefined) {
    conditions.push(`r.driver_id = $${paramCount++}`);
    values.push(plan.filters.driverId);
  }
  if (plan.filters.search !== undefined) {
    conditions.push(`r.status ILIKE $${paramCount++} ESCAPE '\\'`);
    values.push(containsPattern(plan.filters.search));
  }

  const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
  const count: SqlQuery = {
    text: `SELECT COUNT(*) AS count ${RIDE_WITH_PARTIES_FROM}${where}`,
    values: [...values]
  };

  const pageValues = [...values];
  let distanceColumn = 'NULL::float8 AS distance_to_pickup';
  if (plan.origin !== null) {
    const lat = `$${paramCount++}`;
    const lon = `$${paramCount++}`;
    pageValues.push(plan.origin.latitude, plan.origin.longitude);
    distanceColumn = `${distanceSql(lat, lon)} AS distance_to_pickup`;
  }
  const limit = `$${paramCount++}`;
  const offset = `$${paramCount++}`;
  pageValues.push(plan.limit, plan.offset);

  const page: SqlQuery = {
    text:
      `SELECT ${RIDE_WITH_PARTIES_COLUMNS}, ${distanceColumn} ${RIDE_WITH_PARTIES_FROM}${where} ` +
      `ORDER BY ${ORDER_BY[plan.ordering]} LIMIT ${limit} OFFSET ${offset}`,
    values: pageValues
  };

  return { count, page };
}

export interface RideWithPartiesRow extends QueryResultRow {
  id: string;
  status: string;
  rider_id: string;
  driver_id: string;
  pickup_latitude: number;
  pickup_longitude: number;
  dropoff_latitude: number;
  dropoff_longitude: number;
  pickup_time: Date;
  rider_details: UserSummary;
  driver_details: UserSummary;
  distance_to_pickup?: number | null;
}

export function mapRideWithPartiesRow(row: RideWithPartiesRow): RideWithParties {
  return {
    id: row.id,
    status: row.status,
    riderId: row.rider_id,
    driverId: row.driver_id,
    pickupLatitude: Number(row.pickup_latitude),
    pickupLongitude: Number(row.pickup_longitude),
    dropoffLatitude: Number(row.dropoff_latitude),
    dropoffLongitude: Number(row.dropoff_longitude),
    pickupTime: new Date(row.pickup_time),
    riderDetails: row.rider_details,
    driverDetails: row.driver_details,
    distanceToPickup:
      row.distance_to_pickup === null || row.distance_to_pickup === undefined
        ? null
        : Number(row.distance_to_pickup)
  };
}
