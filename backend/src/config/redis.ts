import { createClient } from 'redis';
import { config } from './index.js';

export const redisClient = createClient({
  url: config.redis.url || undefined,
});

export type RedisClient = typeof redisClient;

redisClient.on('error', (err) => {
  console.error('Redis Client Error:', err);
});

export const connectRedis = async (): Promise<void> => {
  if (!redisClient.isOpen) {
    await redisClient.connect();
  }
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient.isOpen) {
    await redisClient.quit();
  }
};
