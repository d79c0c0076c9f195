/** A row of the local mirror. `data` is the serialized document. */
export interface StoredRecord {
  id: string
  data: string
}

export type ChangeKind = 'ADDED' | 'MODIFIED' | 'REMOVED'

export type ChangeEvent =
  | { kind: 'ADDED' | 'MODIFIED'; id: string; document: Record<string, unknown> }
  | { kind: 'REMOVED'; id: string }

export interface FullSyncResult {
  success: boolean
  /** Number of records fetched from the remote source */
  fetched: number
  /** Local ids removed because the remote no longer has them */
  removed: number
  durationMs: number
  error?: string
}
