/**
 * Query API entry point
 */

import { createPool, logger, PgDocumentStore } from '@advice-corpus/shared';
import { createApp } from './app';

const port = parseInt(process.env.PORT || '8081', 10);
const pool = createPool();
const store = new PgDocumentStore(pool);

const app = createApp(store, {
  ping: async () => {
    await pool.query('SELECT 1');
  },
});

const server = app.listen(port, () => {
  logger.info('Query API listening', { port });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await store.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
