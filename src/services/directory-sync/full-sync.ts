/**
 * Full Sync
 *
 * Reconciliation pass: fetch the complete remote directory, then make the
 * local mirror equal to it. The fetch must succeed completely before anything
 * is written, so an unreachable remote never causes destructive deletes.
 */

import type { DirectoryStore } from '@services/directory-store.service.js'
import type { FullSyncResult } from '@root/types/directory.types.js'
import type {
  RemoteCollection,
  RemoteDocument,
} from '@root/types/directory-source.types.js'
import {
  errorMessage,
  PersistenceError,
  TransientNetworkError,
} from '@root/types/errors.js'
import type { FastifyBaseLogger } from 'fastify'

export interface FullSyncDeps {
  logger: FastifyBaseLogger
  store: Pick<DirectoryStore, 'reconcile'>
  source: Pick<RemoteCollection, 'fetchAll'>
}

/**
 * Run one reconciliation pass. Never throws; failures are reported in the
 * result and leave the store at its prior state.
 */
export async function runFullSync(deps: FullSyncDeps): Promise<FullSyncResult> {
  const { logger, store, source } = deps
  const startedAt = Date.now()

  logger.info('Starting full directory sync')

  let records: RemoteDocument[]
  try {
    records = await source.fetchAll()
  } catch (error) {
    const failure = new TransientNetworkError(
      'Failed to fetch remote directory',
      { cause: error },
    )
    logger.error({ error: failure }, 'Full sync aborted, store left unchanged')
    return {
      success: false,
      fetched: 0,
      removed: 0,
      durationMs: Date.now() - startedAt,
      error: `${failure.message}: ${errorMessage(error)}`,
    }
  }

  try {
    const { removed } = await store.reconcile(records)

    for (const id of removed) {
      logger.debug({ id }, 'Removed stale record')
    }

    const result: FullSyncResult = {
      success: true,
      fetched: records.length,
      removed: removed.length,
      durationMs: Date.now() - startedAt,
    }
    logger.info(
      { fetched: result.fetched, removed: result.removed },
      `Full sync complete (${result.fetched} records)`,
    )
    return result
  } catch (error) {
    const message =
      error instanceof PersistenceError
        ? error.message
        : `Local directory reconcile failed: ${errorMessage(error)}`
    logger.error({ error }, 'Full sync failed while writing the local store')
    return {
      success: false,
      fetched: records.length,
      removed: 0,
      durationMs: Date.now() - startedAt,
      error: message,
    }
  }
}
