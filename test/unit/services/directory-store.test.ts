import fs from 'node:fs'
import path from 'node:path'
import { DirectoryStore } from '@services/directory-store.service.js'
import { PersistenceError } from '@root/types/errors.js'
import { describe, expect, it } from 'vitest'
import {
  createTempDir,
  createTestStore,
  removeTempDir,
} from '../../helpers/database.js'
import { createMockLogger } from '../../mocks/logger.js'

const transcore = { name: 'Transcore', allowedUsers: ['ABC'] }

describe('DirectoryStore', () => {
  it('should create the database file and its directory', async () => {
    const dir = createTempDir()
    const dbPath = path.join(dir, 'nested', 'directory.db')
    try {
      const store = await DirectoryStore.create(createMockLogger(), dbPath)
      await store.close()
      expect(fs.existsSync(dbPath)).toBe(true)
    } finally {
      removeTempDir(dir)
    }
  })

  it('should run in WAL journal mode', async (t) => {
    const store = await createTestStore(t)
    const result = await store.knex.raw('PRAGMA journal_mode')
    expect(result).toEqual([{ journal_mode: 'wal' }])
  })

  it('should keep data across reopen', async () => {
    const dir = createTempDir()
    const dbPath = path.join(dir, 'directory.db')
    try {
      const first = await DirectoryStore.create(createMockLogger(), dbPath)
      await first.upsert('c1', transcore)
      await first.close()

      const second = await DirectoryStore.create(createMockLogger(), dbPath)
      expect(await second.get('c1')).toEqual({
        id: 'c1',
        data: JSON.stringify(transcore),
      })
      await second.close()
    } finally {
      removeTempDir(dir)
    }
  })

  describe('upsert', () => {
    it('should be idempotent', async (t) => {
      const store = await createTestStore(t)
      await store.upsert('c1', transcore)
      await store.upsert('c1', transcore)

      expect(await store.listAll()).toEqual([
        { id: 'c1', data: JSON.stringify(transcore) },
      ])
    })

    it('should replace existing data', async (t) => {
      const store = await createTestStore(t)
      await store.upsert('c1', transcore)
      await store.upsert('c1', { name: 'Transcore', allowedUsers: [] })

      expect(await store.get('c1')).toEqual({
        id: 'c1',
        data: '{"name":"Transcore","allowedUsers":[]}',
      })
    })
  })

  describe('delete', () => {
    it('should ignore a missing id', async (t) => {
      const store = await createTestStore(t)
      await store.upsert('c1', transcore)

      await store.delete('missing')
      await store.delete('c1')
      await store.delete('c1')

      expect(await store.count()).toBe(0)
    })
  })

  describe('applyChanges', () => {
    it('should apply ADDED, MODIFIED and REMOVED in order', async (t) => {
      const store = await createTestStore(t)
      await store.applyChanges([
        { kind: 'ADDED', id: 'a', document: { name: 'A' } },
        { kind: 'ADDED', id: 'b', document: { name: 'B' } },
        { kind: 'MODIFIED', id: 'a', document: { name: 'A2' } },
        { kind: 'REMOVED', id: 'b' },
      ])

      expect(await store.listAll()).toEqual([{ id: 'a', data: '{"name":"A2"}' }])
    })

    it('should leave the same state when a batch is replayed', async (t) => {
      const store = await createTestStore(t)
      const batch = [
        { kind: 'ADDED' as const, id: 'a', document: { name: 'A' } },
        { kind: 'REMOVED' as const, id: 'z' },
      ]
      await store.applyChanges(batch)
      const once = await store.listAll()
      await store.applyChanges(batch)

      expect(await store.listAll()).toEqual(once)
    })
  })

  describe('reconcile', () => {
    it('should upsert every record and remove ids not present', async (t) => {
      const store = await createTestStore(t)
      await store.upsert('keep', { name: 'old' })
      await store.upsert('gone', { name: 'gone' })

      const result = await store.reconcile([
        { id: 'keep', data: { name: 'new' } },
        { id: 'added', data: { name: 'added' } },
      ])

      expect(result).toEqual({ upserted: 2, removed: ['gone'] })
      expect(await store.listIds()).toEqual(['added', 'keep'])
      expect(await store.get('keep')).toEqual({
        id: 'keep',
        data: '{"name":"new"}',
      })
    })

    it('should empty the store when the remote is empty', async (t) => {
      const store = await createTestStore(t)
      await store.upsert('a', { name: 'A' })

      const result = await store.reconcile([])

      expect(result).toEqual({ upserted: 0, removed: ['a'] })
      expect(await store.count()).toBe(0)
    })
  })

  it('should reject writes after close with a PersistenceError', async () => {
    const dir = createTempDir()
    try {
      const store = await DirectoryStore.create(
        createMockLogger(),
        path.join(dir, 'directory.db'),
      )
      await store.close()

      await expect(store.upsert('a', { name: 'A' })).rejects.toBeInstanceOf(
        PersistenceError,
      )
    } finally {
      removeTempDir(dir)
    }
  })
})
