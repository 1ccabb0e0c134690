import { readFileSync } from 'fs';
import { join } from 'path';
import { Pool } from 'pg';
import { config } from '../config/environment';
import { logError, logInfo } from '../utils/logger';

async function migrate() {
  // Create a dedicated pool for migration
  const pool = new Pool({
    host: config.database.host,
    port: config.database.port,
    database: config.database.database,
    user: config.database.user,
    password: config.database.password
  });

  try {
    logInfo('Running database migrations...', {
      host: config.database.host,
      database: config.database.database,
      user: config.database.user
    });

    // Test connection first
    await pool.query('SELECT NOW()');
    logInfo('Database connection successful');

    const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
    await pool.query(schema);

    logInfo('Database migrations completed successfully');
    await pool.end();
    process.exit(0);
  } catch (error) {
    logError('Migration failed', error);
    await pool.end();
    process.exit(1);
  }
}

void migrate();
