import { Pool } from 'pg';
import { config } from './environment';
import { logError, logInfo } from '../utils/logger';

const dbConfig = {
  host: config.database.host,
  port: config.database.port,
  database: config.database.database,
  user: config.database.user,
  password: config.database.password,
  max: config.database.poolSize,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000
};

export const pool = new Pool(dbConfig);

pool.on('error', (err) => {
  logError('Unexpected database error', err);
  process.exit(-1);
});

export async function checkDatabaseConnection(): Promise<void> {
  await pool.query('SELECT 1');
  logInfo('Database connected', {
    host: dbConfig.host,
    database: dbConfig.database,
    poolSize: dbConfig.max
  });
}

export default pool;
