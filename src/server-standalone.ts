/**
 * Standalone Fastify API Server Entry Point
 *
 * Starts the inventory API against PostgreSQL.
 *
 * **Usage:**
 * - Production: `npm run build && npm start`
 *
 * **Endpoints:**
 * - POST   /inventory                 - Provision a record
 * - GET    /inventory/:id             - Read a record
 * - POST   /inventory/:id/adjustments - Apply a delta with optimistic concurrency control
 * - GET    /health                    - Liveness probe
 *
 * **Environment Variables:**
 * - PORT: Server port (default: 3000)
 * - DATABASE_URL: PostgreSQL connection string
 * - OCC_MAX_ATTEMPTS, OCC_BACKOFF_BASE_MS, OCC_BACKOFF_MAX_MS, OCC_STORE_TIMEOUT_MS
 */

import { Pool } from 'pg';
import { createServer, startServer } from './adapters/primary/http/server';
import { registerInventoryRoutes } from './adapters/primary/http/routes/inventory.routes';
import { PostgresInventoryRepository } from './modules/inventory/adapters/persistence/PostgresInventoryRepository';
import { createBackoffPolicy, getOccConfig } from './modules/inventory/config/occ-config';

const pool = new Pool({ connectionString: process.env['DATABASE_URL'] });
const repository = new PostgresInventoryRepository(pool);

const server = createServer();

const occConfig = getOccConfig();
server.log.info({ occConfig }, 'Optimistic concurrency settings loaded');

registerInventoryRoutes(server, repository, {
  maxAttempts: occConfig.maxAttempts,
  backoffPolicy: createBackoffPolicy(occConfig),
  storeTimeoutMs: occConfig.storeTimeoutMs,
});

/**
 * Health check endpoint
 */
server.get('/health', () => {
  return { status: 'ok', timestamp: new Date().toISOString() };
});

const PORT = Number(process.env['PORT']) || 3000;

repository
  .ensureSchema()
  .then(() => startServer(server, PORT))
  .catch((err: unknown) => {
    server.log.error({ err }, 'Failed to start server');
    process.exit(1);
  });

/**
 * Graceful shutdown handler
 */
const shutdown = async (): Promise<void> => {
  server.log.info('Gracefully shutting down...');
  await server.close();
  await pool.end();
  process.exit(0);
};

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});
