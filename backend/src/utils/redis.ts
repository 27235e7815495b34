import { createClient } from 'redis';
import { config } from '../config';
import logger from './logger';

const redisClient = createClient({
  url: config.redisUrl,
});

redisClient.on('error', (err) => logger.error({ err }, 'Redis Client Error'));
redisClient.on('connect', () => logger.info('✅ Redis connected'));

export const connectRedis = async () => {
  if (!redisClient.isOpen) {
    await redisClient.connect();
  }
  return redisClient;
};

/**
 * Minimal JSON cache the Reddit client reads listings through.
 */
export interface JsonCache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
}

export const getCached = async (key: string): Promise<unknown> => {
  try {
    const cached = await redisClient.get(key);
    return cached ? JSON.parse(cached) : null;
  } catch (error) {
    logger.warn({ err: error, key }, 'Redis get error');
    return null;
  }
};

export const setCache = async (key: string, value: unknown, ttl: number = 3600): Promise<void> => {
  try {
    await redisClient.setEx(key, ttl, JSON.stringify(value));
  } catch (error) {
    logger.warn({ err: error, key }, 'Redis set error');
  }
};

export const redisCache: JsonCache = {
  get: getCached,
  set: setCache,
};

export default redisClient;
