import { createClient } from 'redis';
import { config } from './environment';
import { logError, logInfo } from '../utils/logger';

export const redisClient = createClient({
  socket: {
    host: config.redis.host,
    port: config.redis.port
  },
  password: config.redis.password
});

redisClient.on('error', (err) => logError('Redis client error', err));
redisClient.on('connect', () => logInfo('Redis connected'));

export const connectRedis = async () => {
  await redisClient.connect();
};

export default redisClient;
