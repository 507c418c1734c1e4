import Redis from 'ioredis';

const getRedisUrl = () => {
  if (process.env.REDIS_URL) {
    return process.env.REDIS_URL;
  }
  const host = process.env.REDIS_HOST || 'localhost';
  const port = process.env.REDIS_PORT || '6379';
  return `redis://${host}:${port}`;
};

const globalForRedis = global as unknown as { redis?: Redis };

let redis: Redis | undefined = globalForRedis.redis;

/**
 * Shared connection. Nothing connects until the first command, so importing a
 * route module does not open a socket. Reused across hot reloads outside production.
 */
export function getRedis(): Redis {
  if (redis) return redis;

  const client = new Redis(getRedisUrl(), {
    maxRetriesPerRequest: null, // Required for BullMQ
    lazyConnect: true,
  });

  client.on('error', (err) => {
    console.error('[Redis] Connection error:', err.message);
  });

  redis = client;
  if (process.env.NODE_ENV !== 'production') globalForRedis.redis = client;
  return client;
}

export const redisTarget = () => getRedisUrl().replace(/\/\/[^@]*@/, '//');
