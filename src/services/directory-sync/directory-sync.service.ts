/**
 * Directory Sync Service
 *
 * Keeps the local directory mirror convergent with the remote source.
 *
 * Responsible for:
 * - Full reconciliation at startup and after every detected reconnection
 * - Applying live ADDED / MODIFIED / REMOVED changes through a bounded queue
 * - Owning the community change listener and replacing it atomically
 * - Reporting liveness to the shared connection state
 */

import type { ConnectionState } from '@services/connection-watchdog/connection-state.js'
import type { DirectoryStore } from '@services/directory-store.service.js'
import type {
  ChangeEvent,
  FullSyncResult,
} from '@root/types/directory.types.js'
import type { RemoteCollection } from '@root/types/directory-source.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { ChangeQueue } from './change-queue.js'
import { runFullSync } from './full-sync.js'
import { SubscriptionSlot } from './subscription-slot.js'

export interface DirectorySyncOptions {
  /** Maximum number of pending change events before batches are dropped */
  queueCapacity: number
}

export interface DirectorySyncStatus {
  subscribed: boolean
  pendingEvents: number
  lastSync: FullSyncResult | null
  lastSyncAt: string | null
}

export class DirectorySyncService {
  private readonly log: FastifyBaseLogger
  private readonly listener: SubscriptionSlot
  private readonly queue: ChangeQueue
  private inFlightSync: Promise<FullSyncResult> | null = null
  private lastSync: FullSyncResult | null = null
  private lastSyncAt: Date | null = null

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly store: Pick<DirectoryStore, 'applyChanges' | 'reconcile'>,
    private readonly source: RemoteCollection,
    private readonly state: ConnectionState,
    options: DirectorySyncOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'DIRECTORY_SYNC')
    this.listener = new SubscriptionSlot('Community', this.log)
    this.queue = new ChangeQueue({
      logger: this.log,
      capacity: options.queueCapacity,
      apply: (batch) => this.applyBatch(batch),
      onOverflow: () => {
        // Dropped events are only recovered by a reconciliation pass
        this.state.markStale()
      },
      onApplyError: (error, batch) => {
        this.log.error(
          { error, events: batch.length },
          'Failed to apply change batch, scheduling reconciliation',
        )
        this.state.markStale()
      },
    })
  }

  /**
   * Reconcile the mirror against the full remote directory.
   *
   * Concurrent callers share the pass already in flight. Live changes that
   * arrive while the pass runs are held back and applied after the snapshot
   * is committed, so an older snapshot never overwrites a newer change.
   */
  fullSync(): Promise<FullSyncResult> {
    if (!this.inFlightSync) {
      this.inFlightSync = this.runSync().finally(() => {
        this.inFlightSync = null
      })
    }
    return this.inFlightSync
  }

  /**
   * Apply one change event directly. Re-applying an event is a no-op relative
   * to an already consistent store.
   */
  async applyChange(event: ChangeEvent): Promise<void> {
    await this.store.applyChanges([event])
  }

  /**
   * Queue a batch delivered by the remote listener.
   */
  handleChanges(changes: ChangeEvent[]): boolean {
    return this.queue.enqueue(changes)
  }

  /**
   * Establish the community change listener, replacing any existing one.
   */
  async subscribe(): Promise<void> {
    await this.listener.replace((isCurrent) =>
      this.source.subscribe(
        (changes) => {
          if (!isCurrent()) return
          if (changes.length === 0) {
            // An empty delivery still proves the listener is alive
            this.state.markAlive()
            return
          }
          for (const change of changes) {
            this.log.debug({ id: change.id }, `${change.kind} change received`)
          }
          this.handleChanges(changes)
        },
        (error) => {
          if (!isCurrent()) return
          this.log.warn(
            { error },
            'Community listener failed, waiting for the watchdog to recover',
          )
          this.state.markStale()
        },
      ),
    )
    this.log.info('Community listener established')
  }

  /** Alias used by the watchdog after a reconnection */
  resubscribe(): Promise<void> {
    return this.subscribe()
  }

  /**
   * Tear down the listener and wait for queued changes to be applied.
   */
  async stop(): Promise<void> {
    await this.listener.clear()
    if (this.inFlightSync) {
      await this.inFlightSync
    }
    await this.queue.idle()
  }

  /** Resolves once every queued change has been applied */
  idle(): Promise<void> {
    return this.queue.idle()
  }

  status(): DirectorySyncStatus {
    return {
      subscribed: this.listener.active,
      pendingEvents: this.queue.size,
      lastSync: this.lastSync,
      lastSyncAt: this.lastSyncAt?.toISOString() ?? null,
    }
  }

  private async runSync(): Promise<FullSyncResult> {
    // Changes queued before the pass predate its snapshot
    await this.queue.idle()
    this.queue.hold()
    let result: FullSyncResult
    try {
      await this.queue.idle()
      result = await runFullSync({
        logger: this.log,
        store: this.store,
        source: this.source,
      })
    } finally {
      this.queue.release()
    }
    if (result.success) {
      this.state.markAlive()
    }
    this.lastSync = result
    this.lastSyncAt = new Date()
    return result
  }

  private async applyBatch(batch: ChangeEvent[]): Promise<void> {
    await this.store.applyChanges(batch)
    this.state.markAlive()
  }
}
