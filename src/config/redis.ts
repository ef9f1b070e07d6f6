import { createClient } from 'redis';
import { env } from './env';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

/** Shared session client. Created on first use; only redis-backed sessions need it. */
export function getRedis(): RedisClient {
  if (!client) {
    client = createClient({ url: env.REDIS_URL });

    client.on('error', (err: Error) => {
      logger.error('Redis error', { error: err.message });
    });

    client.on('ready', () => {
      logger.info('Redis ready');
    });
  }
  return client;
}

export async function connectRedis(): Promise<void> {
  const redis = getRedis();
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function disconnectRedis(): Promise<void> {
  if (client?.isOpen) {
    await client.quit();
  }
}

export async function checkRedisHealth(): Promise<{ status: string; latencyMs?: number; error?: string }> {
  const started = Date.now();
  try {
    await getRedis().ping();
    return { status: 'healthy', latencyMs: Date.now() - started };
  } catch (error: unknown) {
    return { status: 'unhealthy', error: error instanceof Error ? error.message : String(error) };
  }
}
