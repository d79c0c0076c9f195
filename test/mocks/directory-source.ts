import type { ChangeEvent } from '@root/types/directory.types.js'
import type {
  ChangeBatchHandler,
  DirectorySource,
  EqualityFilter,
  RemoteCollection,
  RemoteDocument,
  Subscription,
  SubscriptionErrorHandler,
} from '@root/types/directory-source.types.js'

interface Listener {
  onChanges: ChangeBatchHandler
  onError: SubscriptionErrorHandler
  filter?: EqualityFilter
  active: boolean
}

/**
 * In-memory stand-in for a remote collection. Like Firestore, a new listener
 * first receives (asynchronously) an ADDED event for every matching
 * document, possibly an empty batch.
 */
export class FakeRemoteCollection implements RemoteCollection {
  readonly documents = new Map<string, Record<string, unknown>>()
  readonly removedIds: string[] = []
  fetchError: Error | null = null
  probeError: Error | null = null
  removeError: Error | null = null
  subscribeCount = 0
  private listeners: Listener[] = []

  constructor(initial: RemoteDocument[] = []) {
    for (const doc of initial) {
      this.documents.set(doc.id, doc.data)
    }
  }

  async fetchAll(): Promise<RemoteDocument[]> {
    if (this.fetchError) throw this.fetchError
    return [...this.documents].map(([id, data]) => ({
      id,
      data: structuredClone(data),
    }))
  }

  async probe(): Promise<void> {
    if (this.probeError) throw this.probeError
  }

  subscribe(
    onChanges: ChangeBatchHandler,
    onError: SubscriptionErrorHandler,
    filter?: EqualityFilter,
  ): Subscription {
    this.subscribeCount++
    const listener: Listener = { onChanges, onError, filter, active: true }
    this.listeners.push(listener)

    const initial: ChangeEvent[] = [...this.documents]
      .filter(([, data]) => matches(data, filter))
      .map(([id, data]) => ({
        kind: 'ADDED',
        id,
        document: structuredClone(data),
      }))
    queueMicrotask(() => {
      if (listener.active) listener.onChanges(initial)
    })

    return {
      unsubscribe: () => {
        listener.active = false
        this.listeners = this.listeners.filter((entry) => entry !== listener)
      },
    }
  }

  async remove(id: string): Promise<void> {
    if (this.removeError) throw this.removeError
    this.removedIds.push(id)
    this.delete(id)
  }

  get listenerCount(): number {
    return this.listeners.length
  }

  /** Write a document remotely and notify listeners */
  set(id: string, data: Record<string, unknown>): void {
    const kind = this.documents.has(id) ? 'MODIFIED' : 'ADDED'
    this.documents.set(id, data)
    this.deliver(data, [{ kind, id, document: structuredClone(data) }])
  }

  /** Delete a document remotely and notify listeners */
  delete(id: string): void {
    const data = this.documents.get(id)
    if (!data) return
    this.documents.delete(id)
    this.deliver(data, [{ kind: 'REMOVED', id }])
  }

  /** Break every listener, as a dropped connection would */
  failListeners(error: Error): void {
    for (const listener of [...this.listeners]) {
      listener.onError(error)
    }
  }

  private deliver(data: Record<string, unknown>, changes: ChangeEvent[]): void {
    for (const listener of [...this.listeners]) {
      if (matches(data, listener.filter)) {
        listener.onChanges(changes)
      }
    }
  }
}

function matches(
  data: Record<string, unknown>,
  filter: EqualityFilter | undefined,
): boolean {
  return !filter || data[filter.field] === filter.value
}

export class FakeDirectorySource implements DirectorySource {
  readonly communities = new FakeRemoteCollection()
  readonly commands = new FakeRemoteCollection()
  closed = false

  async close(): Promise<void> {
    this.closed = true
  }
}

/** Let queued microtasks and pending I/O callbacks run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
