/**
 * Connection State
 *
 * Process-wide record of remote connection liveness. One instance is owned by
 * the connection watchdog and shared with the change consumer; both mutate it
 * only through these synchronous methods, so no update can interleave with
 * another on the event loop.
 */
import type {
  ConnectionHealth,
  ConnectionStateSnapshot,
} from '@root/types/connection.types.js'

export type Clock = () => number

export class ConnectionState {
  private lastEventTimestamp: number
  private consecutiveFailureCount = 0
  private currentBackoffSeconds = 0

  constructor(
    private readonly timeoutSeconds: number,
    private readonly now: Clock = Date.now,
  ) {
    this.lastEventTimestamp = now()
  }

  /**
   * Record that the remote proved alive (a change batch was applied or a
   * reconciliation succeeded). Returns the state to healthy.
   */
  markAlive(): void {
    this.lastEventTimestamp = this.now()
    this.consecutiveFailureCount = 0
    this.currentBackoffSeconds = 0
  }

  /**
   * Force the next watchdog check to treat the connection as stale, e.g. after
   * change events had to be dropped.
   */
  markStale(): void {
    this.lastEventTimestamp = this.now() - (this.timeoutSeconds + 1) * 1000
  }

  /**
   * Count a failed probe or resync. Returns the new failure count.
   */
  recordFailure(backoffSeconds: number): number {
    this.consecutiveFailureCount += 1
    this.currentBackoffSeconds = backoffSeconds
    return this.consecutiveFailureCount
  }

  /** Clear failures without touching event recency */
  clearFailures(): void {
    this.consecutiveFailureCount = 0
    this.currentBackoffSeconds = 0
  }

  get failures(): number {
    return this.consecutiveFailureCount
  }

  ageSeconds(): number {
    return (this.now() - this.lastEventTimestamp) / 1000
  }

  health(): ConnectionHealth {
    return this.ageSeconds() > this.timeoutSeconds ? 'stale' : 'healthy'
  }

  snapshot(): ConnectionStateSnapshot {
    return {
      health: this.health(),
      lastEventTimestamp: this.lastEventTimestamp,
      ageSeconds: Math.floor(this.ageSeconds()),
      consecutiveFailureCount: this.consecutiveFailureCount,
      currentBackoffSeconds: this.currentBackoffSeconds,
    }
  }
}
