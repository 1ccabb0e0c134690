import { Server } from 'http';
import app from './app';
import { config } from './config/environment';
import pool, { checkDatabaseConnection } from './config/database';
import redisClient, { connectRedis } from './config/redis';
import { logError, logInfo } from './utils/logger';

let server: Server | undefined;

// Start server
async function start(): Promise<void> {
  try {
    await connectRedis();
    await checkDatabaseConnection();

    server = app.listen(config.port, () => {
      logInfo(`Server running on port ${config.port}`);
      logInfo(`API Documentation: http://localhost:${config.port}/api-docs`);
      logInfo(`Health check: http://localhost:${config.port}/health`);
    });
  } catch (error) {
    logError('Failed to start server', error);
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  logInfo(`${signal} received, shutting down gracefully...`);
  try {
    if (server) {
      const listening = server;
      await new Promise<void>((resolve, reject) => listening.close(err => (err ? reject(err) : resolve())));
    }
    await pool.end();
    if (redisClient.isOpen) {
      await redisClient.quit();
    }
    process.exit(0);
  } catch (error) {
    logError('Error during shutdown', error);
    process.exit(1);
  }
}

// Graceful shutdown
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

void start();
