import { QueryResultRow } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { RideQueryPlan } from '../algorithms/rideQuery';
import {
  LongTripReportRow,
  Page,
  PICKUP_ARRIVAL_EVENT,
  Ride,
  RIDE_COMPLETED_EVENT,
  RideChanges,
  RideInput,
  RideWithParties
} from '../types';
import { RideRepository } from './repositories';
import {
  buildRideListQueries,
  mapRideWithPartiesRow,
  RIDE_WITH_PARTIES_COLUMNS,
  RIDE_WITH_PARTIES_FROM,
  RideWithPartiesRow,
  SqlClient
} from './rideQueries';

interface RideRow extends QueryResultRow {
  id: string;
  status: string;
  rider_id: string;
  driver_id: string;
  pickup_latitude: number;
  pickup_longitude: number;
  dropoff_latitude: number;
  dropoff_longitude: number;
  pickup_time: Date;
}

const RIDE_COLUMNS =
  'id, status, rider_id, driver_id, pickup_latitude, pickup_longitude, dropoff_latitude, dropoff_longitude, pickup_time';

const UPDATABLE_COLUMNS: Array<[keyof RideChanges, string]> = [
  ['status', 'status'],
  ['riderId', 'rider_id'],
  ['driverId', 'driver_id'],
  ['pickupLatitude', 'pickup_latitude'],
  ['pickupLongitude', 'pickup_longitude'],
  ['dropoffLatitude', 'dropoff_latitude'],
  ['dropoffLongitude', 'dropoff_longitude'],
  ['pickupTime', 'pickup_time']
];

function mapRowToRide(row: RideRow): Ride {
  return {
    id: row.id,
    status: row.status,
    riderId: row.rider_id,
    driverId: row.driver_id,
    pickupLatitude: Number(row.pickup_latitude),
    pickupLongitude: Number(row.pickup_longitude),
    dropoffLatitude: Number(row.dropoff_latitude),
    dropoffLongitude: Number(row.dropoff_longitude),
    pickupTime: new Date(row.pickup_time)
  };
}

/**
 * Monthly count of trips per driver where the first pickup-arrival event
 * precedes the first completion event by more than $3 hours.
 */
const LONG_TRIP_REPORT_SQL = `
  WITH trip_durations AS (
    SELECT
      r.id AS ride_id,
      r.driver_id,
      MIN(CASE WHEN e.description = $1 THEN e.created_at END) AS pickup_at,
      MIN(CASE WHEN e.description = $2 THEN e.created_at END) AS dropoff_at
    FROM rides r
    JOIN ride_events e ON e.ride_id = r.id
    WHERE e.description IN ($1, $2)
    GROUP BY r.id, r.driver_id
  )
  SELECT
    TO_CHAR(td.pickup_at, 'YYYY-MM') AS month,
    u.first_name || ' ' || LEFT(u.last_name, 1) AS driver,
    COUNT(*) AS count
  FROM trip_durations td
  JOIN users u ON u.id = td.driver_id
  WHERE td.pickup_at IS NOT NULL
    AND td.dropoff_at IS NOT NULL
    AND EXTRACT(EPOCH FROM (td.dropoff_at - td.pickup_at)) / 3600 > $3
  GROUP BY TO_CHAR(td.pickup_at, 'YYYY-MM'), u.first_name, u.last_name
  ORDER BY month, driver`;

export class PgRideRepository implements RideRepository {
  constructor(private readonly db: SqlClient) {}

  async list(plan: RideQueryPlan): Promise<Page<RideWithParties>> {
    const { count, page } = buildRideListQueries(plan);

    const countResult = await this.db.query<{ count: string }>(count.text, count.values);
    const result = await this.db.query<RideWithPartiesRow>(page.text, page.values);

    return {
      count: parseInt(countResult.rows[0].count, 10),
      rows: result.rows.map(mapRideWithPartiesRow)
    };
  }

  async findById(id: string): Promise<RideWithParties | null> {
    const result = await this.db.query<RideWithPartiesRow>(
      `SELECT ${RIDE_WITH_PARTIES_COLUMNS}, NULL::float8 AS distance_to_pickup ${RIDE_WITH_PARTIES_FROM} WHERE r.id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : mapRideWithPartiesRow(result.rows[0]);
  }

  async create(input: RideInput): Promise<Ride> {
    const result = await this.db.query<RideRow>(
      `INSERT INTO rides (${RIDE_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${RIDE_COLUMNS}`,
      [
        uuidv4(),
        input.status,
        input.riderId,
        input.driverId,
        input.pickupLatitude,
        input.pickupLongitude,
        input.dropoffLatitude,
        input.dropoffLongitude,
        input.pickupTime
      ]
    );
    return mapRowToRide(result.rows[0]);
  }

  async update(id: string, changes: RideChanges): Promise<Ride | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramCount = 1;

    for (const [field, column] of UPDATABLE_COLUMNS) {
      const value = changes[field];
      if (value !== undefined) {
        updates.push(`${column} = $${paramCount++}`);
        values.push(value);
      }
    }

    if (updates.length === 0) {
      const existing = await this.db.query<RideRow>(`SELECT ${RIDE_COLUMNS} FROM rides WHERE id = $1`, [id]);
      return existing.rows.length === 0 ? null : mapRowToRide(existing.rows[0]);
    }

    values.push(id);
    const result = await this.db.query<RideRow>(
      `UPDATE rides SET ${updates.join(', ')} WHERE id = $${paramCount} RETURNING ${RIDE_COLUMNS}`,
      values
    );
    return result.rows.length === 0 ? null : mapRowToRide(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM rides WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }

  async longTripReport(minimumHours: number): Promise<LongTripReportRow[]> {
    const result = await this.db.query<{ month: string; driver: string; count: string }>(LONG_TRIP_REPORT_SQL, [
      PICKUP_ARRIVAL_EVENT,
      RIDE_COMPLETED_EVENT,
      minimumHours
    ]);

    return result.rows.map(row => ({
      month: row.month,
      driver: row.driver,
      count: parseInt(row.count, 10)
    }));
  }
}
