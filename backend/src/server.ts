import { createApp } from './app.js';
import { getPool } from './config/database.js';
import { config } from './config/index.js';
import { connectRedis, disconnectRedis, redisClient } from './config/redis.js';
import { MemoryStore } from './db/memoryStore.js';
import { PostgresStore } from './db/postgresStore.js';
import type { ParkStore } from './db/store.js';
import { createServices } from './services/index.js';
import { NoopCache, RedisCache, type Cache } from './utils/cache.js';

function createStore(): ParkStore {
  if (config.database.url) {
    return new PostgresStore(getPool());
  }
  console.warn('DATABASE_URL not set, using the in-memory store');
  return new MemoryStore();
}

async function createCache(): Promise<Cache> {
  if (!config.redis.enabled) {
    return new NoopCache();
  }
  await connectRedis();
  console.log('✓ Redis connected');
  return new RedisCache(redisClient);
}

// Start server
async function startServer() {
  try {
    const store = createStore();
    const cache = await createCache();
    const app = createApp(createServices(store, cache, { tagsTtl: config.cache.tagsTtl }));

    const server = app.listen(config.port, () => {
      console.log(`✓ Server running on http://localhost:${config.port}`);
      console.log(`  Environment: ${config.env}`);
      console.log(`  Health check: http://localhost:${config.port}/health`);
    });

    const shutdown = (signal: string) => {
      console.log(`${signal} received, shutting down`);
      server.close(() => {
        Promise.all([store.close(), disconnectRedis()])
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error('Shutdown failed:', error);
            process.exit(1);
          });
      });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
