export type ConnectionHealth = 'healthy' | 'stale'

export interface ConnectionStateSnapshot {
  health: ConnectionHealth
  lastEventTimestamp: number
  ageSeconds: number
  consecutiveFailureCount: number
  currentBackoffSeconds: number
}

export type WatchdogCycleResult =
  | { status: 'healthy' }
  | { status: 'probe_failed'; failures: number; waitSeconds: number }
  | { status: 'resync_failed'; failures: number; waitSeconds: number }
  | { status: 'recovered'; fetched: number; removed: number }
  | { status: 'skipped' }
