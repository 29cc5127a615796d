import { Pool, PoolClient, PoolConfig } from 'pg';
import { readInt } from '../config';
import { logger } from '../utils/logger';

const isTest = process.env.NODE_ENV === 'test';

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     // In test mode, use minimal connections and short timeouts
     min: isTest ? 0 : readInt(process.env, 'DB_POOL_MIN', 2),
     max: isTest ? 2 : readInt(process.env, 'DB_POOL_MAX', 10),
     idleTimeoutMillis: isTest ? 100 : readInt(process.env, 'DB_IDLE_TIMEOUT_MS', 10000),
     connectionTimeoutMillis: readInt(process.env, 'DB_CONNECTION_TIMEOUT_MS', 5000),
};
export const pool = new Pool(config);

// Log pool errors
pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

// Connection health check
export async function checkConnection(db: Pool = pool): Promise<boolean> {
     try {
          const client = await db.connect();
          try {
               await client.query('SELECT 1');
          } finally {
               client.release();
          }
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(
     fn: (client: PoolClient) => Promise<T>,
     db: Pool = pool
): Promise<T> {
     const client = await db.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          await client.query('ROLLBACK');
          throw err;
     } finally {
          client.release();
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(
     fn: (client: PoolClient) => Promise<T>,
     db: Pool = pool
): Promise<T> {
     const client = await db.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

// Graceful shutdown
export async function closePool(db: Pool = pool): Promise<void> {
     await db.end();
     logger.info('Database pool closed');
}
