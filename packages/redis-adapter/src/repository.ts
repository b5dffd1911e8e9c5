import type { SagaInstance, SagaRepository } from '@compensa/core';
import { PersistenceError, describeError, isTerminal, parseSagaInstance } from '@compensa/core';
import type { ChainableCommander, Redis } from 'ioredis';

/**
 * Options for {@link RedisSagaRepository}.
 */
export interface RedisSagaRepositoryOptions {
  /**
   * Prefix applied to every key the repository writes. Useful for
   * namespacing sagas when the same Redis instance is shared between
   * multiple applications or environments.
   *
   * @default ""
   * @example "orders:saga:"
   */
  keyPrefix?: string;

  /**
   * Time-to-live in seconds applied once an instance reaches a terminal
   * status. Running and compensating instances never expire. When omitted,
   * instances are stored indefinitely.
   */
  ttlSeconds?: number;
}

/**
 * Redis-backed implementation of {@link SagaRepository}.
 *
 * Each instance is stored as a JSON string under `<keyPrefix><id>`. Ids of
 * non-terminal instances are also kept in the sorted set
 * `<keyPrefix>active`, scored by `updatedAt`, so that the recovery sweep can
 * find stale sagas without scanning the keyspace. Both writes go through one
 * `MULTI` so the index never disagrees with the snapshot.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisSagaRepository } from '@compensa/redis-adapter';
 *
 * const redis = new Redis({ host: 'localhost', port: 6379 });
 * const repository = new RedisSagaRepository(redis, { keyPrefix: 'saga:', ttlSeconds: 86_400 });
 * ```
 */
export class RedisSagaRepository implements SagaRepository {
  private readonly _redis: Redis;
  private readonly _keyPrefix: string;
  private readonly _ttlSeconds: number | undefined;

  constructor(redis: Redis, options: RedisSagaRepositoryOptions = {}) {
    this._redis = redis;
    this._keyPrefix = options.keyPrefix ?? '';
    this._ttlSeconds = options.ttlSeconds;
  }

  /** @internal */
  private _buildKey(id: string): string {
    return `${this._keyPrefix}${id}`;
  }

  /** Sorted set of non-terminal instance ids, scored by `updatedAt`. */
  get activeIndexKey(): string {
    return `${this._keyPrefix}active`;
  }

  async save(instance: SagaInstance): Promise<void> {
    const key = this._buildKey(instance.id);
    const value = JSON.stringify(instance);
    const tx = this._redis.multi();
    if (isTerminal(instance.status)) {
      if (this._ttlSeconds !== undefined) {
        tx.set(key, value, 'EX', this._ttlSeconds);
      } else {
        tx.set(key, value);
      }
      tx.zrem(this.activeIndexKey, instance.id);
    } else {
      tx.set(key, value);
      tx.zadd(this.activeIndexKey, Date.parse(instance.updatedAt), instance.id);
    }
    await this._exec(tx, instance.id);
  }

  async load(id: string): Promise<SagaInstance | undefined> {
    const value = await this._redis.get(this._buildKey(id));
    if (value === null) {
      return undefined;
    }
    let data: unknown;
    try {
      data = JSON.parse(value);
    } catch (err) {
      throw new PersistenceError(`stored saga state is not JSON: ${describeError(err)}`, id, err);
    }
    return parseSagaInstance(data, id);
  }

  async delete(id: string): Promise<void> {
    const tx = this._redis.multi().del(this._buildKey(id)).zrem(this.activeIndexKey, id);
    await this._exec(tx, id);
  }

  /**
   * Ids in the active index whose snapshot key no longer exists (removed
   * outside this repository, or expired) are dropped from the index and not
   * returned.
   */
  async findStale(updatedBefore: Date): Promise<string[]> {
    // "(" makes the upper bound exclusive.
    const ids = await this._redis.zrangebyscore(this.activeIndexKey, '-inf', `(${updatedBefore.getTime()}`);
    if (ids.length === 0) {
      return [];
    }
    const values = await this._redis.mget(...ids.map((id) => this._buildKey(id)));
    const live: string[] = [];
    const gone: string[] = [];
    ids.forEach((id, i) => {
      (values[i] === null ? gone : live).push(id);
    });
    if (gone.length > 0) {
      await this._redis.zrem(this.activeIndexKey, ...gone);
    }
    return live;
  }

  private async _exec(tx: ChainableCommander, sagaId: string): Promise<void> {
    const replies = await tx.exec();
    if (replies === null) {
      throw new PersistenceError('redis transaction was aborted', sagaId);
    }
    for (const [err] of replies) {
      if (err !== null) {
        throw new PersistenceError(`redis transaction failed: ${err.message}`, sagaId, err);
      }
    }
  }
}
