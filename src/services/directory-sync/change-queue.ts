/**
 * Change Queue
 *
 * Bounded FIFO between remote listener callbacks and the store. Callbacks only
 * enqueue; one consumer applies batches in arrival order, so the store is
 * never mutated from inside a delivery callback.
 */

import type { ChangeEvent } from '@root/types/directory.types.js'
import type { FastifyBaseLogger } from 'fastify'

export interface ChangeQueueDeps {
  logger: FastifyBaseLogger
  /** Maximum number of pending events */
  capacity: number
  apply: (batch: ChangeEvent[]) => Promise<void>
  /** Called when a batch is rejected because the queue is full */
  onOverflow: (droppedEvents: number) => void
  /** Called when applying a batch failed; the batch is not retried */
  onApplyError: (error: unknown, batch: ChangeEvent[]) => void
}

export class ChangeQueue {
  private readonly pending: ChangeEvent[][] = []
  private pendingEvents = 0
  private draining: Promise<void> | null = null
  private held = false

  constructor(private readonly deps: ChangeQueueDeps) {}

  /**
   * Queue a batch for application. Returns false when the batch was dropped.
   * A batch larger than the capacity is still accepted into an empty queue.
   */
  enqueue(batch: ChangeEvent[]): boolean {
    if (batch.length === 0) return true

    if (
      this.pendingEvents > 0 &&
      this.pendingEvents + batch.length > this.deps.capacity
    ) {
      this.deps.logger.warn(
        { dropped: batch.length, pending: this.pendingEvents },
        'Change queue full, dropping batch',
      )
      this.deps.onOverflow(batch.length)
      return false
    }

    this.pending.push(batch)
    this.pendingEvents += batch.length
    this.startDrain()
    return true
  }

  /** Number of events waiting to be applied */
  get size(): number {
    return this.pendingEvents
  }

  /**
   * Stop applying batches after the one in progress. Incoming batches are
   * still accepted and kept in order until `release()`.
   */
  hold(): void {
    this.held = true
  }

  /** Resume applying batches, starting with those buffered while held */
  release(): void {
    this.held = false
    if (this.pending.length > 0) this.startDrain()
  }

  /**
   * Resolves once no batch is being applied. While held, buffered batches
   * are not waited for.
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining
    }
  }

  private startDrain(): void {
    if (this.draining || this.held) return
    this.draining = this.drain().finally(() => {
      this.draining = null
      // A batch may have arrived after the loop saw an empty queue
      if (this.pending.length > 0 && !this.held) this.startDrain()
    })
  }

  private async drain(): Promise<void> {
    while (!this.held) {
      const batch = this.pending.shift()
      if (!batch) return
      try {
        await this.deps.apply(batch)
      } catch (error) {
        this.deps.onApplyError(error, batch)
      } finally {
        this.pendingEvents -= batch.length
      }
    }
  }
}
