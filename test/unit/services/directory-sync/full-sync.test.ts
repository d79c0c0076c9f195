import { runFullSync } from '@services/directory-sync/full-sync.js'
import { describe, expect, it, vi } from 'vitest'
import { createTestStore } from '../../../helpers/database.js'
import { FakeRemoteCollection } from '../../../mocks/directory-source.js'
import { createMockLogger } from '../../../mocks/logger.js'

describe('runFullSync', () => {
  it('should converge on each remote snapshot in turn', async (t) => {
    const store = await createTestStore(t)
    const logger = createMockLogger()
    const source = new FakeRemoteCollection([
      { id: 'a', data: { name: 'A' } },
      { id: 'b', data: { name: 'B' } },
    ])

    const first = await runFullSync({ logger, store, source })
    expect(first).toMatchObject({ success: true, fetched: 2, removed: 0 })
    expect(await store.listIds()).toEqual(['a', 'b'])

    source.documents.delete('a')
    source.documents.set('b', { name: 'B2' })
    source.documents.set('c', { name: 'C' })

    const second = await runFullSync({ logger, store, source })
    expect(second).toMatchObject({ success: true, fetched: 2, removed: 1 })
    expect(await store.listAll()).toEqual([
      { id: 'b', data: '{"name":"B2"}' },
      { id: 'c', data: '{"name":"C"}' },
    ])
    expect(logger.info).toHaveBeenCalledWith(
      { fetched: 2, removed: 1 },
      'Full sync complete (2 records)',
    )
  })

  it('should leave the store unchanged when the fetch fails', async (t) => {
    const store = await createTestStore(t)
    await store.upsert('a', { name: 'A' })
    await store.upsert('b', { name: 'B' })
    const before = await store.listAll()

    const source = new FakeRemoteCollection()
    source.fetchError = new Error('unavailable')

    const result = await runFullSync({
      logger: createMockLogger(),
      store,
      source,
    })

    expect(result.success).toBe(false)
    expect(result.fetched).toBe(0)
    expect(result.error).toBe('Failed to fetch remote directory: unavailable')
    expect(await store.listAll()).toEqual(before)
  })

  it('should report a failed reconcile without throwing', async () => {
    const store = {
      reconcile: vi.fn().mockRejectedValue(new Error('disk full')),
    }
    const source = new FakeRemoteCollection([{ id: 'a', data: { name: 'A' } }])

    const result = await runFullSync({
      logger: createMockLogger(),
      store,
      source,
    })

    expect(result).toMatchObject({
      success: false,
      fetched: 1,
      removed: 0,
      error: 'Local directory reconcile failed: disk full',
    })
  })
})
