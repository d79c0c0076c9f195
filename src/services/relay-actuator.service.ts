/**
 * Relay Actuator Service
 *
 * Drives the relay board through its command-line tool: switch the site's
 * channel on, hold for the requested duration, switch it off. Each pulse is
 * bounded by a timeout, pulses on the same channel are serialized, and
 * in-flight pulses can be awaited on shutdown so a relay is never left on
 * mid-pulse.
 */

import { execFile } from 'node:child_process'
import { setTimeout as delay } from 'node:timers/promises'
import { promisify } from 'node:util'
import type { AccessActuator } from '@root/types/access.types.js'
import type { SiteConfig } from '@root/types/config.types.js'
import { ActuationError, errorMessage } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit, { type LimitFunction } from 'p-limit'

const execFileAsync = promisify(execFile)

export type RelayState = 0 | 1

/** Runs the relay tool once; rejects when it exits non-zero */
export type RelayCommandRunner = (
  command: string,
  args: string[],
  timeoutMs: number,
) => Promise<void>

export interface RelayActuatorConfig {
  command: string
  /** Arguments placed before `<channel> <state>` */
  args: string[]
  /** Upper bound for one whole pulse */
  timeoutSeconds: number
}

const runRelayCommand: RelayCommandRunner = async (command, args, timeoutMs) => {
  await execFileAsync(command, args, { timeout: timeoutMs })
}

export class RelayActuatorService implements AccessActuator {
  private readonly log: FastifyBaseLogger
  private readonly channelLocks = new Map<number, LimitFunction>()
  private readonly inFlight = new Set<Promise<boolean>>()

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly config: RelayActuatorConfig,
    private readonly run: RelayCommandRunner = runRelayCommand,
  ) {
    this.log = createServiceLogger(baseLog, 'RELAY')
  }

  /**
   * Pulse the relay for `site`. Resolves false on failure or timeout; never
   * rejects.
   */
  open(site: SiteConfig, durationSeconds: number): Promise<boolean> {
    const pulse = this.lockFor(site.relayChannel)(() =>
      this.pulse(site, durationSeconds),
    )
    this.inFlight.add(pulse)
    void pulse.finally(() => this.inFlight.delete(pulse))
    return pulse
  }

  /**
   * Wait for every pulse in flight to complete.
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight])
  }

  private lockFor(channel: number): LimitFunction {
    let lock = this.channelLocks.get(channel)
    if (!lock) {
      lock = pLimit(1)
      this.channelLocks.set(channel, lock)
    }
    return lock
  }

  private async pulse(site: SiteConfig, durationSeconds: number): Promise<boolean> {
    const deadline = Date.now() + this.config.timeoutSeconds * 1000
    this.log.info(
      { site: site.key, channel: site.relayChannel, durationSeconds },
      `Opening ${site.address}`,
    )

    try {
      await this.switchRelay(site, 1, deadline)
    } catch (error) {
      this.log.error(
        { error, site: site.key },
        `Failed to open ${site.address}`,
      )
      // The "on" call may have partially succeeded
      await this.switchOffQuietly(site)
      return false
    }

    await delay(durationSeconds * 1000)

    try {
      await this.switchRelay(site, 0, Math.max(deadline, Date.now() + 5000))
    } catch (error) {
      this.log.error(
        { error, site: site.key },
        `Failed to close relay for ${site.address}`,
      )
      return false
    }

    this.log.info({ site: site.key }, `Closed ${site.address}`)
    return true
  }

  private async switchRelay(
    site: SiteConfig,
    state: RelayState,
    deadline: number,
  ): Promise<void> {
    const remaining = deadline - Date.now()
    if (remaining <= 0) {
      throw new ActuationError(`Relay pulse for ${site.key} timed out`)
    }
    try {
      await this.run(
        this.config.command,
        [...this.config.args, String(site.relayChannel), String(state)],
        remaining,
      )
    } catch (error) {
      throw new ActuationError(
        `Relay command failed for channel ${site.relayChannel}: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  private async switchOffQuietly(site: SiteConfig): Promise<void> {
    try {
      await this.switchRelay(site, 0, Date.now() + 5000)
    } catch (error) {
      this.log.warn({ error, site: site.key }, 'Relay reset after failed open failed')
    }
  }
}
