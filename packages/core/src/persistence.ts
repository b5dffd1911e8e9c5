import type { SagaInstance } from './types.js';
import { isTerminal } from './types.js';
import { parseSagaInstance } from './schemas.js';

/**
 * Storage contract for saga instances, keyed by instance id.
 * Implement this to plug in any storage backend (Redis, a database, etc.).
 *
 * @example
 * ```typescript
 * class DynamoRepository implements SagaRepository {
 *   async save(instance: SagaInstance) { ... }
 *   async load(id: string) { ... }
 *   async delete(id: string) { ... }
 *   async findStale(updatedBefore: Date) { ... }
 * }
 * ```
 */
export interface SagaRepository {
  /**
   * Atomically overwrite the stored instance; the last write wins.
   * Must reject when the write does not reach the store.
   */
  save(instance: SagaInstance): Promise<void>;

  /** Load an instance, or `undefined` if none is stored under `id`. */
  load(id: string): Promise<SagaInstance | undefined>;

  /** Remove an instance. Deleting an absent id is a no-op. */
  delete(id: string): Promise<void>;

  /**
   * Ids of non-terminal instances whose `updatedAt` is earlier than
   * `updatedBefore`. Used by the recovery sweep to find stuck sagas.
   */
  findStale(updatedBefore: Date): Promise<string[]>;
}

/**
 * Default in-memory implementation of {@link SagaRepository}.
 * Suitable for single-process use and testing. State is lost when the
 * process exits.
 *
 * Instances are kept as serialized snapshots so that callers never share
 * object references with the store.
 */
export class InMemorySagaRepository implements SagaRepository {
  private readonly _store = new Map<string, string>();

  async save(instance: SagaInstance): Promise<void> {
    this._store.set(instance.id, JSON.stringify(instance));
  }

  async load(id: string): Promise<SagaInstance | undefined> {
    const raw = this._store.get(id);
    if (raw === undefined) {
      return undefined;
    }
    return parseSagaInstance(JSON.parse(raw), id);
  }

  async delete(id: string): Promise<void> {
    this._store.delete(id);
  }

  async findStale(updatedBefore: Date): Promise<string[]> {
    const cutoff = updatedBefore.getTime();
    const stale: string[] = [];
    for (const [id, raw] of this._store) {
      const instance = parseSagaInstance(JSON.parse(raw), id);
      if (!isTerminal(instance.status) && Date.parse(instance.updatedAt) < cutoff) {
        stale.push(id);
      }
    }
    return stale;
  }
}
