import type { SagaInstance, SagaRepository } from '@compensa/core';
import { TERMINAL_STATUSES, parseSagaInstance } from '@compensa/core';
import { pgTable, text, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import { and, eq, lt, notInArray } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';

// ---------------------------------------------------------------------------
// Drizzle schema
// ---------------------------------------------------------------------------

/**
 * Drizzle table definition for saga instances.
 * Export this if you need to include it in your own Drizzle schema object
 * (e.g. to run `drizzle-kit push` or `drizzle-kit generate`).
 *
 * @example
 * ```typescript
 * import { sagaInstances } from '@compensa/postgres-adapter';
 * // Include in your schema for migrations:
 * export { sagaInstances };
 * ```
 */
export const sagaInstances = pgTable(
  'saga_instances',
  {
    id: text('id').primaryKey(),
    definitionId: text('definition_id').notNull(),
    /** Copy of `state.status`, so the recovery sweep can filter in SQL. */
    status: text('status').notNull(),
    /** The full instance snapshot. */
    state: jsonb('state').notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => ({
    statusUpdatedAt: index('saga_instances_status_updated_at_idx').on(table.status, table.updatedAt),
  }),
);

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

/**
 * PostgreSQL-backed implementation of {@link SagaRepository}, powered by
 * Drizzle ORM.
 *
 * Each instance is one row of `saga_instances`; the snapshot lives in a
 * `jsonb` column and is validated when read back. `status` and `updated_at`
 * are denormalized from the snapshot for {@link findStale}.
 *
 * ### Setup
 *
 * 1. Add `sagaInstances` to your Drizzle schema and run `drizzle-kit push`
 *    (or generate + apply a migration) to create the table.
 * 2. Pass your Drizzle `db` instance to `PostgresSagaRepository`.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres';
 * import { Pool } from 'pg';
 * import { PostgresSagaRepository, sagaInstances } from '@compensa/postgres-adapter';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const repository = new PostgresSagaRepository(drizzle(pool));
 * const orchestrator = new SagaOrchestrator({ definition, repository, channel });
 * ```
 */
export class PostgresSagaRepository implements SagaRepository {
  private readonly _db: NodePgDatabase;

  constructor(db: NodePgDatabase) {
    this._db = db;
  }

  async save(instance: SagaInstance): Promise<void> {
    const row = {
      definitionId: instance.definitionId,
      status: instance.status,
      state: instance,
      updatedAt: new Date(instance.updatedAt),
    };
    await this._db
      .insert(sagaInstances)
      .values({ id: instance.id, ...row })
      .onConflictDoUpdate({ target: sagaInstances.id, set: row });
  }

  async load(id: string): Promise<SagaInstance | undefined> {
    const rows = await this._db
      .select()
      .from(sagaInstances)
      .where(eq(sagaInstances.id, id))
      .limit(1);

    if (rows.length === 0) {
      return undefined;
    }
    return parseSagaInstance(rows[0].state, id);
  }

  async delete(id: string): Promise<void> {
    await this._db.delete(sagaInstances).where(eq(sagaInstances.id, id));
  }

  async findStale(updatedBefore: Date): Promise<string[]> {
    const rows = await this._db
      .select({ id: sagaInstances.id })
      .from(sagaInstances)
      .where(
        and(
          notInArray(sagaInstances.status, [...TERMINAL_STATUSES]),
          lt(sagaInstances.updatedAt, updatedBefore),
        ),
      );
    return rows.map((row) => row.id);
  }
}
