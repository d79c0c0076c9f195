/**
 * Connection Watchdog Service
 *
 * Detects silent death of the remote change stream. The remote client gives
 * no reliable disconnect signal, so staleness is judged purely by the time
 * since the last applied change:
 *
 * - HEALTHY: last event within `timeoutSeconds`. Nothing to do.
 * - STALE: run a liveness probe.
 *   - Probe fails: count the failure and wait the capped exponential backoff.
 *   - Probe succeeds: force a full sync and replace every listener, because
 *     the push channel may be dead even though the remote is reachable.
 *
 * A recovery whose listeners could not all be replaced is retried on the next
 * cycle even if community events have made the connection look healthy.
 *
 * Cycles run on a fixed interval through toad-scheduler and never overlap.
 */

import type { DirectorySyncService } from '@services/directory-sync/directory-sync.service.js'
import type { WatchdogCycleResult } from '@root/types/connection.types.js'
import { errorMessage } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { setTimeout as delay } from 'node:timers/promises'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'
import { type BackoffConfig, computeBackoffSeconds } from './backoff.js'
import type { ConnectionState } from './connection-state.js'

export const WATCHDOG_JOB_ID = 'connection-watchdog'

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>

/** A listener that the watchdog re-establishes after a reconnection */
export interface Resubscribable {
  resubscribe(): Promise<void>
}

export interface ConnectionWatchdogOptions {
  intervalSeconds: number
  timeoutSeconds: number
  backoff: BackoffConfig
}

export interface ConnectionWatchdogDeps {
  state: ConnectionState
  sync: Pick<DirectorySyncService, 'fullSync' | 'resubscribe'>
  /** Lightweight read against the remote; rejects when unreachable */
  probe: () => Promise<void>
  /** Additional listeners to replace after a resync (e.g. remote commands) */
  listeners: Resubscribable[]
  sleep?: Sleep
}

const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal })
  } catch (error) {
    if (signal.aborted) return
    throw error
  }
}

export class ConnectionWatchdog {
  private readonly log: FastifyBaseLogger
  private readonly scheduler = new ToadScheduler()
  private readonly abortController = new AbortController()
  private readonly sleep: Sleep
  private currentCycle: Promise<WatchdogCycleResult> | null = null
  private listenersLost = false
  private started = false

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly deps: ConnectionWatchdogDeps,
    private readonly options: ConnectionWatchdogOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'WATCHDOG')
    this.sleep = deps.sleep ?? abortableSleep
  }

  /**
   * Start the fixed-interval poll loop.
   */
  start(): void {
    if (this.started) return
    this.started = true

    const task = new AsyncTask(
      WATCHDOG_JOB_ID,
      async () => {
        await this.runCycle()
      },
      (error: Error) => {
        this.log.error({ error }, 'Watchdog cycle failed')
      },
    )
    const job = new SimpleIntervalJob(
      { seconds: this.options.intervalSeconds, runImmediately: false },
      task,
      { id: WATCHDOG_JOB_ID, preventOverrun: true },
    )
    this.scheduler.addSimpleIntervalJob(job)
    this.log.info(
      {
        intervalSeconds: this.options.intervalSeconds,
        timeoutSeconds: this.options.timeoutSeconds,
      },
      'Connection watchdog started',
    )
  }

  /**
   * Stop scheduling cycles, cut short any backoff wait and wait for the
   * running cycle to finish. A stopped watchdog cannot be restarted.
   */
  async stop(): Promise<void> {
    this.scheduler.stop()
    this.abortController.abort()
    if (this.currentCycle) {
      await this.currentCycle
    }
  }

  /**
   * Run one supervision cycle. A call made while a cycle is running is
   * skipped.
   */
  runCycle(): Promise<WatchdogCycleResult> {
    if (this.currentCycle) {
      return Promise.resolve({ status: 'skipped' })
    }
    this.currentCycle = this.check().finally(() => {
      this.currentCycle = null
    })
    return this.currentCycle
  }

  private async check(): Promise<WatchdogCycleResult> {
    const { state } = this.deps

    if (state.health() === 'healthy' && !this.listenersLost) {
      if (state.failures > 0) {
        this.log.info('Connection stable')
        state.clearFailures()
      }
      return { status: 'healthy' }
    }

    if (this.abortController.signal.aborted) {
      return { status: 'skipped' }
    }

    if (this.listenersLost) {
      this.log.warn('Listeners missing after the last recovery, retrying')
    } else {
      this.log.warn(
        `No directory updates in ${Math.floor(state.ageSeconds())}s, checking connection`,
      )
    }

    try {
      await this.deps.probe()
    } catch (error) {
      return this.backOff('probe_failed', error)
    }

    this.log.info('Connection restored, re-synchronizing and re-establishing listeners')

    const result = await this.deps.sync.fullSync()
    if (!result.success) {
      return this.backOff('resync_failed', result.error)
    }

    try {
      await this.deps.sync.resubscribe()
      for (const listener of this.deps.listeners) {
        await listener.resubscribe()
      }
    } catch (error) {
      // The resync already marked the connection alive
      this.listenersLost = true
      state.markStale()
      return this.backOff('resync_failed', error)
    }

    this.listenersLost = false
    state.markAlive()
    this.log.info('Listeners re-established')
    return {
      status: 'recovered',
      fetched: result.fetched,
      removed: result.removed,
    }
  }

  private async backOff(
    status: 'probe_failed' | 'resync_failed',
    cause: unknown,
  ): Promise<WatchdogCycleResult> {
    const { state } = this.deps
    const waitSeconds = computeBackoffSeconds(
      state.failures + 1,
      this.options.backoff,
    )
    const failures = state.recordFailure(waitSeconds)

    this.log.warn(
      { failures, waitSeconds, error: errorMessage(cause) },
      status === 'probe_failed'
        ? `Remote directory unreachable (attempt ${failures}), waiting ${waitSeconds}s before retry`
        : `Re-sync failed (attempt ${failures}), waiting ${waitSeconds}s before retry`,
    )

    await this.sleep(waitSeconds * 1000, this.abortController.signal)
    return { status, failures, waitSeconds }
  }
}
