/**
 * Subscription Slot
 *
 * Holds the one live listener for a remote collection. Replacing it
 * unsubscribes the old listener before the new one is created, under a lock,
 * so two overlapping listeners never deliver the same events. Callbacks from
 * a replaced listener are ignored through `isCurrent`.
 */

import type { Subscription } from '@root/types/directory-source.types.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'

export type SubscriptionFactory = (isCurrent: () => boolean) => Subscription

export class SubscriptionSlot {
  private current: Subscription | null = null
  private generation = 0
  private readonly lock = pLimit(1)

  constructor(
    private readonly name: string,
    private readonly logger: FastifyBaseLogger,
  ) {}

  get active(): boolean {
    return this.current !== null
  }

  /**
   * Tear down the current listener (if any) and install a new one.
   */
  replace(factory: SubscriptionFactory): Promise<void> {
    return this.lock(() => {
      this.closeCurrent()
      const generation = ++this.generation
      this.current = factory(() => generation === this.generation)
      this.logger.debug(`${this.name} listener established`)
    })
  }

  /**
   * Tear down the current listener.
   */
  clear(): Promise<void> {
    return this.lock(() => {
      this.generation++
      this.closeCurrent()
    })
  }

  private closeCurrent(): void {
    if (!this.current) return
    try {
      this.current.unsubscribe()
    } catch (error) {
      // A broken listener may fail to unsubscribe; it is replaced regardless
      this.logger.warn({ error }, `Failed to unsubscribe ${this.name} listener`)
    } finally {
      this.current = null
    }
  }
}
