import { Queue, type DefaultJobOptions } from 'bullmq';
import { Redis } from 'ioredis';

import { getLogger } from '../logger';

const logger = getLogger('bullmq');

export interface RedisConnectionOptions {
  host: string;
  port: number;
  db?: number;
  password?: string;
  username?: string;
  tls?: { rejectUnauthorized: boolean };
  /** BullMQ workers require this to be null */
  maxRetriesPerRequest: null;
}

/**
* Parse a redis:// or rediss:// URL into BullMQ connection options.
* Without an explicit connection BullMQ silently falls back to localhost:6379.
*/
export function parseRedisUrl(redisUrl: string): RedisConnectionOptions {
  let url: URL;
  try {
    url = new URL(redisUrl);
  } catch {
    throw new Error('REDIS_URL is not a valid URL');
  }
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new Error(`Unsupported Redis protocol in REDIS_URL: ${url.protocol}`);
  }

  const port = parseInt(url.port || '6379', 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid Redis port in REDIS_URL: ${url.port}`);
  }

  let password: string | undefined;
  if (url.password) {
    try {
      password = decodeURIComponent(url.password);
    } catch {
      throw new Error('REDIS_URL contains an invalid percent-encoded password');
    }
  }

  const dbSegment = url.pathname.replace(/^\//, '');
  const db = dbSegment ? parseInt(dbSegment, 10) : undefined;
  if (db !== undefined && (isNaN(db) || db < 0)) {
    throw new Error(`Invalid Redis database index in REDIS_URL: ${dbSegment}`);
  }

  return {
    host: url.hostname,
    port,
    maxRetriesPerRequest: null,
    ...(db !== undefined && { db }),
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(password ? { password } : {}),
    ...(url.protocol === 'rediss:' ? { tls: { rejectUnauthorized: true } } : {}),
  };
}

/**
* Fail fast at process start when Redis is unreachable. A Queue constructs
* fine against a dead server and only surfaces the problem on first enqueue.
*/
export async function pingRedis(connection: RedisConnectionOptions): Promise<void> {
  const client = new Redis({ ...connection, lazyConnect: true });
  try {
    await client.connect();
    await client.ping();
  } finally {
    client.disconnect();
  }
}

export interface CreateQueueOptions {
  connection: RedisConnectionOptions;
  defaultJobOptions?: DefaultJobOptions;
}

/**
* Create a BullMQ queue with an error listener attached.
* An EventEmitter without an 'error' listener throws and takes the process down.
*/
export function createQueue<T>(name: string, options: CreateQueueOptions): Queue<T> {
  const queue = new Queue<T>(name, {
    connection: options.connection,
    defaultJobOptions: {
      removeOnComplete: { count: 1_000, age: 86_400 },
      removeOnFail: { count: 5_000 },
      ...options.defaultJobOptions,
    },
  });

  queue.on('error', (err) => {
    logger.error('BullMQ queue error', err, { queue: name });
  });

  return queue;
}
