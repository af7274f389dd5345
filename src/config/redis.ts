import Redis from 'ioredis';
import { logger, describeError } from './logger';

const redisConfig = {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379'),
    password: process.env.REDIS_PASSWORD || undefined,
    keyPrefix: process.env.REDIS_KEY_PREFIX || 'sar:',
    maxRetriesPerRequest: 3,
    lazyConnect: true
};

export const redis = new Redis(redisConfig);

redis.on('connect', () => {
    logger.info('Redis connected successfully');
});

redis.on('error', (error: Error) => {
    logger.error('Redis connection error', { error: error.message });
});

redis.on('ready', () => {
    logger.info('Redis ready for commands');
});

// Every cached entry the API keeps, with how long it may be served stale.
export const CACHE_TTL_SECONDS = {
    'stats:overview': 60,
} as const;

export type CacheKey = keyof typeof CACHE_TTL_SECONDS;

export const STATS_CACHE_KEY: CacheKey = 'stats:overview';

export const setCache = async (key: CacheKey, value: unknown, ttlSeconds: number = CACHE_TTL_SECONDS[key]): Promise<void> => {
    try {
        await redis.setex(key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
        logger.error('Error setting cache', { error: describeError(error), key });
    }
};

export const getCache = async (key: CacheKey): Promise<unknown> => {
    try {
        const result = await redis.get(key);
        return result ? JSON.parse(result) : null;
    } catch (error) {
        logger.error('Error getting cache', { error: describeError(error), key });
        return null;
    }
};

/** Drops the given entries; called after any write that changes what they summarise. */
export const invalidateCache = async (...keys: CacheKey[]): Promise<void> => {
    if (keys.length === 0) {
        return;
    }
    try {
        await redis.del(...keys);
        logger.debug('Cache invalidated', { keys });
    } catch (error) {
        logger.error('Error invalidating cache', { error: describeError(error), keys });
    }
};

export const testRedisConnection = async (): Promise<boolean> => {
    try {
        await redis.ping();
        logger.info('Redis connection test successful');
        return true;
    } catch (error) {
        logger.error('Redis connection test failed', { error: describeError(error) });
        return false;
    }
};
