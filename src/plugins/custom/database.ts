import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { DirectoryStore } from '@services/directory-store.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    store: DirectoryStore
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const store = await DirectoryStore.create(fastify.log, fastify.config.dbPath)
    fastify.decorate('store', store)
    fastify.addHook('onClose', async () => {
      fastify.log.info('Closing local directory store...')
      await store.close()
    })
  },
  {
    name: 'database',
    dependencies: ['config'],
  },
)
