import type { ChangeEvent } from './directory.types.js'

export interface RemoteDocument {
  id: string
  data: Record<string, unknown>
}

/** Server-side equality filter, e.g. `{ field: 'community', value: 'Transcore' }` */
export interface EqualityFilter {
  field: string
  value: string
}

export interface Subscription {
  unsubscribe(): void
}

export type ChangeBatchHandler = (changes: ChangeEvent[]) => void
export type SubscriptionErrorHandler = (error: Error) => void

/**
 * One remote collection. Implementations must deliver change batches in the
 * order the remote produced them, starting with an ADDED for every existing
 * document that matches the filter.
 */
export interface RemoteCollection {
  /** Fetch every document. Rejects if the remote is unreachable. */
  fetchAll(): Promise<RemoteDocument[]>
  /** Minimal existence read used as a liveness probe */
  probe(): Promise<void>
  subscribe(
    onChanges: ChangeBatchHandler,
    onError: SubscriptionErrorHandler,
    filter?: EqualityFilter,
  ): Subscription
  /** Delete a document. Deleting a missing document is not an error. */
  remove(id: string): Promise<void>
}

export interface DirectorySource {
  communities: RemoteCollection
  commands: RemoteCollection
  close(): Promise<void>
}
