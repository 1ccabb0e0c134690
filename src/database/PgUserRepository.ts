import { QueryResultRow } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { Page, User, UserChanges, UserInput, UserRole } from '../types';
import { UserListQuery, UserOrdering, UserRepository } from './repositories';
import { containsPattern, SqlClient } from './rideQueries';

interface UserRow extends QueryResultRow {
  id: string;
  role: UserRole;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
  phone_number: string;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, role, username, first_name, last_name, email, phone_number, created_at, updated_at';

const USER_ORDER_BY: Record<UserOrdering, string> = {
  id: 'id ASC',
  '-id': 'id DESC',
  username: 'username ASC, id ASC',
  '-username': 'username DESC, id ASC',
  firstName: 'first_name ASC, id ASC',
  '-firstName': 'first_name DESC, id ASC',
  lastName: 'last_name ASC, id ASC',
  '-lastName': 'last_name DESC, id ASC',
  email: 'email ASC, id ASC',
  '-email': 'email DESC, id ASC'
};

// Field name -> column for partial updates
const UPDATABLE_COLUMNS: Array<[keyof UserChanges, string]> = [
  ['role', 'role'],
  ['username', 'username'],
  ['firstName', 'first_name'],
  ['lastName', 'last_name'],
  ['email', 'email'],
  ['phoneNumber', 'phone_number']
];

function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    role: row.role,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phoneNumber: row.phone_number,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: SqlClient) {}

  async findById(id: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return result.rows.length === 0 ? null : mapRowToUser(result.rows[0]);
  }

  async emailTaken(email: string, excludeId?: string): Promise<boolean> {
    const result = await this.db.query(
      'SELECT 1 FROM users WHERE LOWER(email) = LOWER($1) AND ($2::uuid IS NULL OR id <> $2::uuid) LIMIT 1',
      [email, excludeId ?? null]
    );
    return result.rows.length > 0;
  }

  async usernameTaken(username: string, excludeId?: string): Promise<boolean> {
    const result = await this.db.query(
      'SELECT 1 FROM users WHERE username = $1 AND ($2::uuid IS NULL OR id <> $2::uuid) LIMIT 1',
      [username, excludeId ?? null]
    );
    return result.rows.length > 0;
  }

  async list(query: UserListQuery): Promise<Page<User>> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    let paramCount = 1;

    if (query.role) {
      conditions.push(`role = $${paramCount++}`);
      values.push(query.role);
    }
    if (query.email) {
      conditions.push(`email = $${paramCount++}`);
      values.push(query.email);
    }
    if (query.username) {
      conditions.push(`username = $${paramCount++}`);
      values.push(query.username);
    }
    if (query.search) {
      const param = `$${paramCount++}`;
      conditions.push(
        `(username ILIKE ${param} ESCAPE '\\' OR first_name ILIKE ${param} ESCAPE '\\' ` +
          `OR last_name ILIKE ${param} ESCAPE '\\' OR email ILIKE ${param} ESCAPE '\\' ` +
          `OR phone_number ILIKE ${param} ESCAPE '\\')`
      );
      values.push(containsPattern(query.search));
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const countResult = await this.db.query<{ count: string }>(`SELECT COUNT(*) AS count FROM users${where}`, values);

    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users${where} ORDER BY ${USER_ORDER_BY[query.ordering]} ` +
        `LIMIT $${paramCount++} OFFSET $${paramCount}`,
      [...values, query.limit, query.offset]
    );

    return {
      count: parseInt(countResult.rows[0].count, 10),
      rows: result.rows.map(mapRowToUser)
    };
  }

  async create(input: UserInput): Promise<User> {
    const result = await this.db.query<UserRow>(
      `INSERT INTO users (id, role, username, first_name, last_name, email, phone_number)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${USER_COLUMNS}`,
      [uuidv4(), input.role, input.username, input.firstName, input.lastName, input.email, input.phoneNumber]
    );
    return mapRowToUser(result.rows[0]);
  }

  async update(id: string, changes: UserChanges): Promise<User | null> {
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
      return this.findById(id);
    }

    values.push(id);
    const result = await this.db.query<UserRow>(
      `UPDATE users SET ${updates.join(', ')}, updated_at = NOW() WHERE id = $${paramCount} RETURNING ${USER_COLUMNS}`,
      values
    );
    return result.rows.length === 0 ? null : mapRowToUser(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    // rides and ride_events follow through ON DELETE CASCADE
    const result = await this.db.query('DELETE FROM users WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }
}
