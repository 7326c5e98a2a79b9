/**
 * Redis-backed ResultStore.
 *
 * Each Result is stored as its serialized JSON text under a single string
 * key (`SET key text [EX ttl]`), so the entry can be read by any process
 * that shares the type registry.
 *
 * @module RedisResultStore
 */

import Redis from 'ioredis';
import type { z } from 'zod';
import {
  Codec,
  DecodeError,
  Errors,
  Result,
  defaultCodec,
  type ValueSchema,
} from '@faultline/core';
import { ResultStore } from '../ResultStore';
import { ResultStoreConfig, ResultStoreConfigSchema } from '../config';
import { getResultKey } from './redis-keys';

export interface RedisResultStoreOptions {
  codec?: Codec;
  config?: z.input<typeof ResultStoreConfigSchema>;
}

const NOT_CONNECTED = 'Result store is not connected. Call connect() first';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @example
 * ```typescript
 * const store = new RedisResultStore({ config: { defaultTtlSeconds: 600 } });
 *
 * const connected = await store.connect('redis://localhost:6379');
 * if (connected.isFailure) {
 *   console.error('Connection failed:', connected.error.description);
 *   return;
 * }
 *
 * await store.put('invoice:9', await billing.createInvoice(order));
 * await store.disconnect();
 * ```
 */
export class RedisResultStore implements ResultStore {
  /**
   * Redis client, null until connect() succeeds.
   */
  private client: Redis | null = null;

  /**
   * True while a connect() call waits for its client to become ready.
   */
  private connecting = false;

  private readonly codec: Codec;
  private readonly config: ResultStoreConfig;

  constructor(options: RedisResultStoreOptions = {}) {
    this.codec = options.codec ?? defaultCodec;
    this.config = ResultStoreConfigSchema.parse(options.config ?? {});
  }

  /**
   * Connect to Redis and wait for the client to become ready.
   *
   * @param connectionString - `redis://` or `rediss://` URL
   */
  async connect(connectionString: string): Promise<Result<void>> {
    if (this.client) {
      return Result.failure(Errors.configuration('Result store is already connected'));
    }
    if (this.connecting) {
      return Result.failure(Errors.configuration('Result store is already connecting'));
    }
    if (!/^rediss?:\/\//.test(connectionString)) {
      return Result.failure(
        Errors.configuration(
          'Invalid connection string format. Expected redis://host:port or rediss://host:port'
        )
      );
    }

    let client: Redis | null = null;
    this.connecting = true;
    try {
      client = new Redis(connectionString);
      const pending = client;

      await new Promise<void>((resolve, reject) => {
        pending.once('ready', () => resolve());
        pending.once('error', (error: Error) => reject(error));
      });

      client.on('error', (error: Error) => {
        console.error('[faultline] Redis connection error:', error);
      });
      this.client = client;
      return Result.ok();
    } catch (error) {
      client?.disconnect();
      return Result.failure(Errors.api(`Redis connection failed: ${messageOf(error)}`));
    } finally {
      this.connecting = false;
    }
  }

  /**
   * Quit gracefully, falling back to a forced disconnect.
   */
  async disconnect(): Promise<Result<void>> {
    const client = this.client;
    if (!client) {
      return Result.ok();
    }
    this.client = null;

    try {
      await client.quit();
      return Result.ok();
    } catch (error) {
      client.disconnect();
      return Result.failure(Errors.api(`Redis disconnect failed: ${messageOf(error)}`));
    }
  }

  async put<T>(key: string, result: Result<T>, ttlSeconds?: number): Promise<Result<void>> {
    const ttl = ttlSeconds ?? this.config.defaultTtlSeconds;
    if (ttl !== undefined && (!Number.isInteger(ttl) || ttl <= 0)) {
      return Result.failure(Errors.validation(`TTL must be a positive integer, got ${ttl}`));
    }

    let text: string;
    try {
      text = this.codec.serializeResult(result);
    } catch (error) {
      return Result.failure(Errors.validation(`Cannot store result '${key}': ${messageOf(error)}`));
    }

    return this.withClient('SET', async (client) => {
      const redisKey = getResultKey(key, this.config.keyPrefix);
      if (ttl === undefined) {
        await client.set(redisKey, text);
      } else {
        await client.set(redisKey, text, 'EX', ttl);
      }
      return Result.ok();
    });
  }

  get(key: string): Promise<Result<Result<unknown>>>;
  get<T>(key: string, schema: ValueSchema<T>): Promise<Result<Result<T>>>;
  get<T>(key: string, schema?: ValueSchema<T>): Promise<Result<Result<unknown>>> {
    return this.withClient<Result<unknown>>('GET', async (client) => {
      const text = await client.get(getResultKey(key, this.config.keyPrefix));
      if (text === null) {
        return Result.failure(Errors.notFound(`No result stored under '${key}'`));
      }

      try {
        const stored =
          schema === undefined
            ? this.codec.deserializeResult(text)
            : this.codec.deserializeResult(text, schema);
        return Result.success<Result<unknown>>(stored);
      } catch (error) {
        if (error instanceof DecodeError) {
          return Result.failure(
            Errors.api(`Stored result '${key}' could not be decoded: ${error.message}`)
          );
        }
        throw error;
      }
    });
  }

  async delete(key: string): Promise<Result<boolean>> {
    return this.withClient('DEL', async (client) => {
      const removed = await client.del(getResultKey(key, this.config.keyPrefix));
      return Result.success(removed > 0);
    });
  }

  /**
   * Run a command against the connected client, turning a missing
   * connection into a ConfigurationError and a thrown Redis error into an
   * ApiError.
   */
  private async withClient<T>(
    command: string,
    run: (client: Redis) => Promise<Result<T>>
  ): Promise<Result<T>> {
    const client = this.client;
    if (!client) {
      return Result.failure(Errors.configuration(NOT_CONNECTED));
    }

    try {
      return await run(client);
    } catch (error) {
      return Result.failure(Errors.api(`Redis ${command} failed: ${messageOf(error)}`));
    }
  }
}
