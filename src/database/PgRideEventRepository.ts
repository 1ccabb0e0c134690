import { QueryResultRow } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { Page, RideEvent } from '../types';
import { AppendEventResult, RideEventListQuery, RideEventOrdering, RideEventRepository } from './repositories';
import { containsPattern, SqlPool } from './rideQueries';

interface RideEventRow extends QueryResultRow {
  id: string;
  ride_id: string;
  description: string;
  created_at: Date;
}

const EVENT_COLUMNS = 'id, ride_id, description, created_at';

const EVENT_ORDER_BY: Record<RideEventOrdering, string> = {
  createdAt: 'created_at ASC, id ASC',
  '-createdAt': 'created_at DESC, id DESC',
  id: 'id ASC',
  '-id': 'id DESC'
};

function mapRowToEvent(row: RideEventRow): RideEvent {
  return {
    id: row.id,
    rideId: row.ride_id,
    description: row.description,
    createdAt: new Date(row.created_at)
  };
}

export class PgRideEventRepository implements RideEventRepository {
  constructor(private readonly db: SqlPool) {}

  async findForRides(rideIds: string[], since: Date | null): Promise<RideEvent[]> {
    if (rideIds.length === 0) {
      return [];
    }

    const result =
      since === null
        ? await this.db.query<RideEventRow>(
            `SELECT ${EVENT_COLUMNS} FROM ride_events WHERE ride_id = ANY($1::uuid[]) ORDER BY created_at DESC, id DESC`,
            [rideIds]
          )
        : await this.db.query<RideEventRow>(
            `SELECT ${EVENT_COLUMNS} FROM ride_events
             WHERE ride_id = ANY($1::uuid[]) AND created_at >= $2
             ORDER BY created_at DESC, id DESC`,
            [rideIds, since]
          );

    return result.rows.map(mapRowToEvent);
  }

  /**
   * Existence check, count and insert run in one transaction with the ride
   * row locked, so concurrent appenders on the same ride queue behind each
   * other and each sees the count the previous one left.
   */
  async appendWithinCap(rideId: string, description: string, cap: number): Promise<AppendEventResult> {
    const client = await this.db.connect();

    try {
      await client.query('BEGIN');

      const rideCheck = await client.query('SELECT id FROM rides WHERE id = $1 FOR UPDATE', [rideId]);
      if (rideCheck.rows.length === 0) {
        await client.query('ROLLBACK');
        return { status: 'ride-not-found' };
      }

      const countResult = await client.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM ride_events WHERE ride_id = $1',
        [rideId]
      );
      const count = parseInt(countResult.rows[0].count, 10);
      if (count >= cap) {
        await client.query('ROLLBACK');
        return { status: 'cap-reached', count };
      }

      const inserted = await client.query<RideEventRow>(
        `INSERT INTO ride_events (id, ride_id, description) VALUES ($1, $2, $3) RETURNING ${EVENT_COLUMNS}`,
        [uuidv4(), rideId, description]
      );

      await client.query('COMMIT');
      return { status: 'created', event: mapRowToEvent(inserted.rows[0]) };
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async findById(id: string): Promise<RideEvent | null> {
    const result = await this.db.query<RideEventRow>(`SELECT ${EVENT_COLUMNS} FROM ride_events WHERE id = $1`, [id]);
    return result.rows.length === 0 ? null : mapRowToEvent(result.rows[0]);
  }

  async list(query: RideEventListQuery): Promise<Page<RideEvent>> {
    const conditions: string[] = [];
    const filterValues: unknown[] = [];
    let paramCount = 1;

    if (query.rideId !== undefined) {
      conditions.push(`ride_id = $${paramCount++}`);
      filterValues.push(query.rideId);
    }
    if (query.search !== undefined) {
      conditions.push(`description ILIKE $${paramCount++} ESCAPE '\\'`);
      filterValues.push(containsPattern(query.search));
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';

    const countResult = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ride_events${where}`,
      filterValues
    );
    const result = await this.db.query<RideEventRow>(
      `SELECT ${EVENT_COLUMNS} FROM ride_events${where} ORDER BY ${EVENT_ORDER_BY[query.ordering]} ` +
        `LIMIT $${paramCount++} OFFSET $${paramCount}`,
      [...filterValues, query.limit, query.offset]
    );

    return {
      count: parseInt(countResult.rows[0].count, 10),
      rows: result.rows.map(mapRowToEvent)
    };
  }

  async updateDescription(id: string, description: string): Promise<RideEvent | null> {
    const result = await this.db.query<RideEventRow>(
      `UPDATE ride_events SET description = $1 WHERE id = $2 RETURNING ${EVENT_COLUMNS}`,
      [description, id]
    );
    return result.rows.length === 0 ? null : mapRowToEvent(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM ride_events WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }
}
