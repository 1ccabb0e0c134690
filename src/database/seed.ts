import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/environment';
import { UserRole } from '../types';
import { logError, logInfo } from '../utils/logger';
import seedData from './seedData.json';

type Stage = keyof typeof seedData.eventsByStatus;

const NUM_RIDERS = 25;
const NUM_DRIVERS = 25;
const NUM_RIDES = 200;
const COMPLETION_RATE = 0.8;

function randomInt(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

function pick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

function randomCoordinates(): [number, number] {
  const { latMin, latMax, lonMin, lonMax } = seedData.bounds;
  const lat = latMin + Math.random() * (latMax - latMin);
  const lon = lonMin + Math.random() * (lonMax - lonMin);
  return [Number(lat.toFixed(6)), Number(lon.toFixed(6))];
}

/**
 * Stages a ride passes through. Completed rides run the full flow; cancelled
 * ones stop after requested, accepted or en-route.
 */
function stagesFor(completes: boolean): Stage[] {
  if (completes) {
    return ['requested', 'accepted', 'en-route', 'pickup', 'in-progress', 'completed'];
  }
  const cancelAfter = randomInt(1, 3);
  const reached: Stage[] = ['requested', 'accepted', 'en-route'];
  return [...reached.slice(0, cancelAfter), 'cancelled'];
}

async function insertUser(pool: Pool, role: UserRole, index: number): Promise<string> {
  const id = uuidv4();
  const firstName = pick(seedData.firstNames);
  const lastName = pick(seedData.lastNames);
  const username = `${firstName}.${lastName}.${role}${index}`.toLowerCase();

  await pool.query(
    `INSERT INTO users (id, role, username, first_name, last_name, email, phone_number)
     VALUES ($1, $2, $3, $4, $5, $6, $7)`,
    [id, role, username, firstName, lastName, `${username}@example.com`, `+1555${String(randomInt(0, 9999999)).padStart(7, '0')}`]
  );
  return id;
}

async function seed() {
  const pool = new Pool({
    host: config.database.host,
    port: config.database.port,
    database: config.database.database,
    user: config.database.user,
    password: config.database.password
  });

  try {
    logInfo('Seeding database with sample data...');

    await pool.query(
      `INSERT INTO users (id, role, username, first_name, last_name, email, phone_number)
       VALUES ($1, $2, 'admin', 'Admin', 'User', 'admin@example.com', '+1234567890')
       ON CONFLICT (username) DO NOTHING`,
      [uuidv4(), UserRole.ADMIN]
    );

    const riders: string[] = [];
    for (let i = 1; i <= NUM_RIDERS; i++) {
      riders.push(await insertUser(pool, UserRole.RIDER, i));
    }

    const drivers: string[] = [];
    for (let i = 1; i <= NUM_DRIVERS; i++) {
      drivers.push(await insertUser(pool, UserRole.DRIVER, i));
    }

    // Rides over the past 30 days, each with a timed event per stage
    const now = Date.now();
    let eventCount = 0;
    for (let i = 0; i < NUM_RIDES; i++) {
      const minutesAgo = randomInt(0, 30 * 24 * 60);
      const pickupTime = new Date(now - minutesAgo * 60 * 1000);
      const [pickupLat, pickupLon] = randomCoordinates();
      const [dropoffLat, dropoffLon] = randomCoordinates();
      const stages = stagesFor(Math.random() < COMPLETION_RATE);

      const rideId = uuidv4();
      await pool.query(
        `INSERT INTO rides
        (id, status, rider_id, driver_id, pickup_latitude, pickup_longitude, dropoff_latitude, dropoff_longitude, pickup_time)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [rideId, stages[stages.length - 1], pick(riders), pick(drivers), pickupLat, pickupLon, dropoffLat, dropoffLon, pickupTime]
      );

      const totalMinutes = randomInt(30, 300);
      const stepMinutes = Math.floor(totalMinutes / (stages.length - 1));
      for (const [index, stage] of stages.entries()) {
        const createdAt = new Date(pickupTime.getTime() + index * stepMinutes * 60 * 1000);
        await pool.query(
          'INSERT INTO ride_events (id, ride_id, description, created_at) VALUES ($1, $2, $3, $4)',
          [uuidv4(), rideId, pick(seedData.eventsByStatus[stage]), createdAt]
        );
        eventCount++;
      }
    }

    logInfo('Database seeded successfully', {
      riders: riders.length,
      drivers: drivers.length,
      rides: NUM_RIDES,
      events: eventCount
    });

    await pool.end();
    process.exit(0);
  } catch (error) {
    logError('Seeding failed', error);
    await pool.end();
    process.exit(1);
  }
}

void seed();
