/**
 * Firestore-backed remote directory.
 *
 * Wraps the firebase-admin SDK behind `RemoteCollection`, so the rest of the
 * gateway only deals with plain JSON documents and ADDED / MODIFIED / REMOVED
 * change events.
 */
import { type App, cert, deleteApp, initializeApp } from 'firebase-admin/app'
import {
  type CollectionReference,
  type DocumentChange,
  DocumentReference,
  type Firestore,
  GeoPoint,
  Timestamp,
  getFirestore,
} from 'firebase-admin/firestore'
import type {
  ChangeEvent,
  ChangeKind,
} from '@root/types/directory.types.js'
import type {
  ChangeBatchHandler,
  DirectorySource,
  EqualityFilter,
  RemoteCollection,
  RemoteDocument,
  Subscription,
  SubscriptionErrorHandler,
} from '@root/types/directory-source.types.js'
import { TransientNetworkError, errorMessage } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

const APP_NAME = 'access-gateway'

export interface FirestoreSourceOptions {
  serviceAccountPath: string
  communitiesCollection: string
  commandsCollection: string
  /** Deadline for one read of a whole collection or a probe */
  requestTimeoutMs: number
}

const CHANGE_KINDS: Record<DocumentChange['type'], ChangeKind> = {
  added: 'ADDED',
  modified: 'MODIFIED',
  removed: 'REMOVED',
}

/**
 * Convert Firestore-specific values into JSON-safe ones. Timestamps become
 * ISO strings and references become their path.
 */
export function toPlainValue(value: unknown): unknown {
  if (value instanceof Timestamp) {
    return value.toDate().toISOString()
  }
  if (value instanceof DocumentReference) {
    return value.path
  }
  if (value instanceof GeoPoint) {
    return { latitude: value.latitude, longitude: value.longitude }
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue)
  }
  if (value !== null && typeof value === 'object') {
    return toPlainDocument(value)
  }
  return value
}

export function toPlainDocument(data: object): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(data)) {
    result[key] = toPlainValue(entry)
  }
  return result
}

export function toChangeEvent(change: DocumentChange): ChangeEvent {
  const kind = CHANGE_KINDS[change.type]
  if (kind === 'REMOVED') {
    return { kind, id: change.doc.id }
  }
  return { kind, id: change.doc.id, document: toPlainDocument(change.doc.data()) }
}

/**
 * Reject with a `TransientNetworkError` when `work` has not settled within
 * `timeoutMs`. The SDK call itself cannot be cancelled and is left to settle.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TransientNetworkError(`${label} timed out after ${timeoutMs}ms`))
    }, timeoutMs)
  })
  return Promise.race([
    work.finally(() => clearTimeout(timeoutId)),
    timeoutPromise,
  ])
}

class FirestoreCollection implements RemoteCollection {
  constructor(
    private readonly collection: CollectionReference,
    private readonly log: FastifyBaseLogger,
    private readonly requestTimeoutMs: number,
  ) {}

  async fetchAll(): Promise<RemoteDocument[]> {
    try {
      const snapshot = await withDeadline(
        this.collection.get(),
        this.requestTimeoutMs,
        `Fetch of ${this.collection.id}`,
      )
      return snapshot.docs.map((doc) => ({
        id: doc.id,
        data: toPlainDocument(doc.data()),
      }))
    } catch (error) {
      throw new TransientNetworkError(
        `Failed to fetch ${this.collection.id}: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  async probe(): Promise<void> {
    try {
      await withDeadline(
        this.collection.limit(1).get(),
        this.requestTimeoutMs,
        `Probe of ${this.collection.id}`,
      )
    } catch (error) {
      throw new TransientNetworkError(
        `Probe of ${this.collection.id} failed: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  subscribe(
    onChanges: ChangeBatchHandler,
    onError: SubscriptionErrorHandler,
    filter?: EqualityFilter,
  ): Subscription {
    const query = filter
      ? this.collection.where(filter.field, '==', filter.value)
      : this.collection

    const unsubscribe = query.onSnapshot(
      (snapshot) => {
        onChanges(snapshot.docChanges().map(toChangeEvent))
      },
      (error) => {
        onError(
          new TransientNetworkError(
            `Listener on ${this.collection.id} failed: ${error.message}`,
            { cause: error },
          ),
        )
      },
    )
    this.log.debug(
      { collection: this.collection.id, filter },
      'Snapshot listener attached',
    )
    return { unsubscribe }
  }

  async remove(id: string): Promise<void> {
    try {
      await this.collection.doc(id).delete()
    } catch (error) {
      throw new TransientNetworkError(
        `Failed to delete ${this.collection.id}/${id}: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }
}

export class FirestoreDirectorySource implements DirectorySource {
  readonly communities: RemoteCollection
  readonly commands: RemoteCollection

  private constructor(
    private readonly app: App,
    db: Firestore,
    options: FirestoreSourceOptions,
    log: FastifyBaseLogger,
  ) {
    this.communities = new FirestoreCollection(
      db.collection(options.communitiesCollection),
      log,
      options.requestTimeoutMs,
    )
    this.commands = new FirestoreCollection(
      db.collection(options.commandsCollection),
      log,
      options.requestTimeoutMs,
    )
  }

  /**
   * Initialize the Firebase app from a service account key file.
   */
  static create(
    baseLog: FastifyBaseLogger,
    options: FirestoreSourceOptions,
  ): FirestoreDirectorySource {
    const log = createServiceLogger(baseLog, 'FIRESTORE')
    const app = initializeApp(
      { credential: cert(options.serviceAccountPath) },
      APP_NAME,
    )
    log.info(
      `Connected to Firestore (${options.communitiesCollection}, ${options.commandsCollection})`,
    )
    return new FirestoreDirectorySource(app, getFirestore(app), options, log)
  }

  async close(): Promise<void> {
    await deleteApp(this.app)
  }
}
