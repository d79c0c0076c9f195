/**
 * Directory Store
 *
 * Durable local mirror of the remote community directory, backed by SQLite
 * (better-sqlite3 through Knex) in WAL journal mode. Every write is a
 * committed transaction before it resolves, so a crash leaves either the old
 * or the new value of a record.
 *
 * Writes are serialized through a single write lock; the Knex pool holds one
 * connection, so reads always see the last committed write.
 *
 * @example
 * const store = await DirectoryStore.create(log, './data/db/directory.db')
 * await store.upsert('abc', { name: 'Transcore', allowedUsers: [] })
 * const rows = await store.listAll()
 */
import fs from 'node:fs'
import { dirname } from 'node:path'
import type { ChangeEvent, StoredRecord } from '@root/types/directory.types.js'
import type { RemoteDocument } from '@root/types/directory-source.types.js'
import { PersistenceError } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import pLimit from 'p-limit'

export const DIRECTORY_TABLE = 'communities'

export interface ReconcileResult {
  upserted: number
  removed: string[]
}

export class DirectoryStore {
  private readonly log: FastifyBaseLogger
  /** Single-writer discipline for every mutation */
  private readonly writeLock = pLimit(1)

  private constructor(
    baseLog: FastifyBaseLogger,
    readonly knex: Knex,
  ) {
    this.log = createServiceLogger(baseLog, 'DIRECTORY_STORE')
  }

  /**
   * Opens (and creates if needed) the SQLite mirror at `dbPath`.
   */
  static async create(
    log: FastifyBaseLogger,
    dbPath: string,
  ): Promise<DirectoryStore> {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(dirname(dbPath), { recursive: true })
    }
    const store = new DirectoryStore(
      log,
      knex(DirectoryStore.createKnexConfig(dbPath, log)),
    )
    await store.ensureSchema()
    return store
  }

  /**
   * Knex configuration for better-sqlite3 with a single pooled connection in
   * WAL mode.
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: { pragma: (source: string) => unknown },
          done: (err: Error | null, conn: unknown) => void,
        ) => {
          try {
            conn.pragma('journal_mode = WAL')
            conn.pragma('synchronous = FULL')
            done(null, conn)
          } catch (error) {
            done(error instanceof Error ? error : new Error(String(error)), conn)
          }
        },
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
    }
  }

  private async ensureSchema(): Promise<void> {
    const exists = await this.knex.schema.hasTable(DIRECTORY_TABLE)
    if (exists) return

    await this.knex.schema.createTable(DIRECTORY_TABLE, (table) => {
      table.string('id').primary()
      table.text('data').notNullable()
      table.timestamp('updated_at').defaultTo(this.knex.fn.now())
    })
    this.log.info('Created local directory table')
  }

  /**
   * Insert or replace a record. Idempotent.
   */
  async upsert(id: string, document: Record<string, unknown>): Promise<void> {
    await this.write('upsert', (trx) => this.upsertRow(trx, id, document))
  }

  /**
   * Remove a record. Removing a missing id is a no-op.
   */
  async delete(id: string): Promise<void> {
    await this.write('delete', async (trx) => {
      await trx(DIRECTORY_TABLE).where({ id }).delete()
    })
  }

  /**
   * Apply a batch of change events in one transaction.
   * ADDED and MODIFIED upsert, REMOVED deletes.
   */
  async applyChanges(changes: ChangeEvent[]): Promise<void> {
    if (changes.length === 0) return
    await this.write('applyChanges', async (trx) => {
      for (const change of changes) {
        if (change.kind === 'REMOVED') {
          await trx(DIRECTORY_TABLE).where({ id: change.id }).delete()
        } else {
          await this.upsertRow(trx, change.id, change.document)
        }
      }
    })
  }

  /**
   * Make the mirror equal to `records`: upsert every record, then delete every
   * local id not present. Runs in one transaction, so either all of it is
   * committed or the prior content is kept.
   */
  async reconcile(records: RemoteDocument[]): Promise<ReconcileResult> {
    return this.write('reconcile', async (trx) => {
      const remoteIds = new Set<string>()
      for (const record of records) {
        remoteIds.add(record.id)
        await this.upsertRow(trx, record.id, record.data)
      }

      const localIds = await trx(DIRECTORY_TABLE).pluck<string[]>('id')
      const removed = localIds.filter((id) => !remoteIds.has(id))
      for (const id of removed) {
        await trx(DIRECTORY_TABLE).where({ id }).delete()
      }

      return { upserted: records.length, removed }
    })
  }

  /**
   * Point-in-time snapshot of every record, ordered by id.
   */
  async listAll(): Promise<StoredRecord[]> {
    try {
      return await this.knex(DIRECTORY_TABLE)
        .select<StoredRecord[]>('id', 'data')
        .orderBy('id')
    } catch (error) {
      throw new PersistenceError('Failed to read local directory', {
        cause: error,
      })
    }
  }

  async listIds(): Promise<string[]> {
    try {
      return await this.knex(DIRECTORY_TABLE).orderBy('id').pluck('id')
    } catch (error) {
      throw new PersistenceError('Failed to read local directory ids', {
        cause: error,
      })
    }
  }

  async get(id: string): Promise<StoredRecord | null> {
    try {
      const row = await this.knex(DIRECTORY_TABLE)
        .select<StoredRecord[]>('id', 'data')
        .where({ id })
        .first()
      return row ?? null
    } catch (error) {
      throw new PersistenceError(`Failed to read record ${id}`, {
        cause: error,
      })
    }
  }

  async count(): Promise<number> {
    try {
      const row = await this.knex(DIRECTORY_TABLE)
        .count<{ count: number }[]>({ count: '*' })
        .first()
      return Number(row?.count ?? 0)
    } catch (error) {
      throw new PersistenceError('Failed to count local directory records', {
        cause: error,
      })
    }
  }

  /**
   * Checks that the database answers. Used by the health endpoint.
   */
  async ping(): Promise<void> {
    await this.knex.raw('SELECT 1')
  }

  /**
   * Closes the database connection once pending writes have finished.
   */
  async close(): Promise<void> {
    await this.writeLock(() => this.knex.destroy())
  }

  private async upsertRow(
    trx: Knex.Transaction,
    id: string,
    document: Record<string, unknown>,
  ): Promise<void> {
    await trx(DIRECTORY_TABLE)
      .insert({
        id,
        data: JSON.stringify(document),
        updated_at: this.knex.fn.now(),
      })
      .onConflict('id')
      .merge(['data', 'updated_at'])
  }

  private write<T>(
    operation: string,
    body: (trx: Knex.Transaction) => Promise<T>,
  ): Promise<T> {
    return this.writeLock(async () => {
      try {
        return await this.knex.transaction(body)
      } catch (error) {
        this.log.error({ error, operation }, 'Local directory write failed')
        throw new PersistenceError(`Local directory ${operation} failed`, {
          cause: error,
        })
      }
    })
  }
}
