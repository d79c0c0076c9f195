/**
 * Command Channel Service
 *
 * Executes remote commands addressed to this community ("open_gate",
 * "pairing_mode") and consumes each one by deleting it afterwards.
 *
 * Delivery is best-effort exactly-once:
 * - commands are processed one at a time, off the listener callback
 * - the delete happens strictly after actuation was attempted, whatever its
 *   outcome; a crash in between allows a replay on the next subscription
 * - ids in flight or recently completed are not executed again
 * - commands are never reconciled by a full fetch, so one issued while the
 *   gateway is disconnected is lost
 */

import { SubscriptionSlot } from '@services/directory-sync/subscription-slot.js'
import { CommandDocumentSchema } from '@schemas/command/command.schema.js'
import type {
  AccessActuator,
  AccessLogger,
} from '@root/types/access.types.js'
import type {
  CommandOutcome,
  CommandRecord,
} from '@root/types/command.types.js'
import type { ChangeEvent } from '@root/types/directory.types.js'
import type { RemoteCollection } from '@root/types/directory-source.types.js'
import { ActuationError, errorMessage } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'
import { type CommandPlanOptions, planCommand } from './command-plan.js'

export const REMOTE_GRANT_ACTION = 'Access granted (Remote)'

/** How many completed command ids are remembered to suppress replays */
const DEFAULT_RECENT_CAPACITY = 256

export interface CommandChannelDeps {
  commands: RemoteCollection
  actuator: AccessActuator
  accessLog: AccessLogger
}

export interface CommandChannelOptions extends CommandPlanOptions {
  recentCapacity?: number
}

export class CommandChannelService {
  private readonly log: FastifyBaseLogger
  private readonly listener: SubscriptionSlot
  private readonly queue = pLimit(1)
  private readonly inFlight = new Set<string>()
  private readonly completed = new Set<string>()
  private readonly pending = new Set<Promise<CommandOutcome>>()
  private readonly recentCapacity: number

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly deps: CommandChannelDeps,
    private readonly options: CommandChannelOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'COMMANDS')
    this.listener = new SubscriptionSlot('Command', this.log)
    this.recentCapacity = options.recentCapacity ?? DEFAULT_RECENT_CAPACITY
  }

  get subscribed(): boolean {
    return this.listener.active
  }

  /**
   * Listen for commands filtered to this community, replacing any existing
   * listener.
   */
  async subscribe(): Promise<void> {
    await this.listener.replace((isCurrent) =>
      this.deps.commands.subscribe(
        (changes) => {
          if (isCurrent()) this.handleChanges(changes)
        },
        (error) => {
          if (isCurrent()) {
            this.log.warn({ error }, 'Command listener failed')
          }
        },
        { field: 'community', value: this.options.community },
      ),
    )
    this.log.info('Command listener established')
  }

  resubscribe(): Promise<void> {
    return this.subscribe()
  }

  /**
   * Stop listening and wait for queued commands to finish. Actuations in
   * progress are allowed to complete.
   */
  async stop(): Promise<void> {
    await this.listener.clear()
    await this.drain()
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending])
  }

  /**
   * Queue every ADDED command of a delivered batch. Modifications and
   * removals are ignored.
   */
  handleChanges(changes: ChangeEvent[]): void {
    for (const change of changes) {
      if (change.kind !== 'ADDED') continue
      void this.submit(change.id, change.document)
    }
  }

  /**
   * Queue one command for processing. Resolves with what was done.
   */
  submit(id: string, document: Record<string, unknown>): Promise<CommandOutcome> {
    if (this.inFlight.has(id)) {
      this.log.debug({ id }, 'Command already queued, ignoring replay')
      return Promise.resolve({ id, status: 'skipped', reason: 'in_flight' })
    }
    if (this.completed.has(id)) {
      return this.track(this.queue(() => this.consumeReplay(id)))
    }

    this.inFlight.add(id)
    return this.track(
      this.queue(() => this.process(id, document)).finally(() => {
        this.inFlight.delete(id)
        this.remember(id)
      }),
    )
  }

  /** Keep `work` visible to `drain()` until it settles */
  private track(work: Promise<CommandOutcome>): Promise<CommandOutcome> {
    const tracked = work.finally(() => {
      this.pending.delete(tracked)
    })
    this.pending.add(tracked)
    return tracked
  }

  private async process(
    id: string,
    document: Record<string, unknown>,
  ): Promise<CommandOutcome> {
    const record = toCommandRecord(id, document)
    const plan = planCommand(record, this.options)

    if (plan.action === 'discard') {
      if (plan.reason === 'other_community') {
        // Not ours to consume
        return { id, status: 'skipped', reason: plan.reason }
      }
      this.log.warn(
        { id, command: record.command, address: record.address },
        `Discarding command (${plan.reason})`,
      )
      const deleted = await this.remove(id)
      return { id, status: 'discarded', reason: plan.reason, deleted }
    }

    this.log.info(
      { id, command: plan.command, site: plan.site.key },
      plan.command === 'pairing_mode'
        ? `Pairing mode request for ${plan.site.address}, opening for ${plan.holdSeconds}s`
        : `Remote open request for ${plan.site.address}`,
    )

    let actuated = false
    try {
      actuated = await this.deps.actuator.open(plan.site, plan.holdSeconds)
    } catch (error) {
      const failure = new ActuationError(
        `Failed to open ${plan.site.address}: ${errorMessage(error)}`,
        { cause: error },
      )
      this.log.error({ error: failure, id }, 'Actuation failed')
    }

    if (plan.logAccess) {
      void this.deps.accessLog.log(REMOTE_GRANT_ACTION, plan.site.address)
    }

    const deleted = await this.remove(id)
    if (deleted) {
      this.log.info({ id }, `Processed and deleted command: ${plan.command}`)
    }

    return {
      id,
      status: 'executed',
      command: plan.command,
      site: plan.site.key,
      actuated,
      deleted,
    }
  }

  /**
   * A completed id showed up again: make sure it is gone remotely, but never
   * act on it twice.
   */
  private async consumeReplay(id: string): Promise<CommandOutcome> {
    this.log.debug({ id }, 'Command already processed, ignoring replay')
    const deleted = await this.remove(id)
    return { id, status: 'skipped', reason: 'already_processed', deleted }
  }

  private async remove(id: string): Promise<boolean> {
    try {
      await this.deps.commands.remove(id)
      return true
    } catch (error) {
      this.log.error({ error, id }, 'Failed to delete command')
      return false
    }
  }

  private remember(id: string): void {
    this.completed.delete(id)
    this.completed.add(id)
    while (this.completed.size > this.recentCapacity) {
      const oldest = this.completed.values().next()
      if (oldest.done) break
      this.completed.delete(oldest.value)
    }
  }
}

function toCommandRecord(
  id: string,
  document: Record<string, unknown>,
): CommandRecord {
  const parsed = CommandDocumentSchema.safeParse(document)
  if (!parsed.success) {
    // Unusable fields are treated as an unknown command
    return {
      id,
      community:
        typeof document.community === 'string' ? document.community : undefined,
    }
  }
  return {
    id,
    community: parsed.data.community ?? undefined,
    command: parsed.data.command ?? undefined,
    address: parsed.data.address ?? null,
  }
}
