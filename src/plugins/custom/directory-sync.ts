import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { ConnectionState } from '@services/connection-watchdog/connection-state.js'
import { DirectorySyncService } from '@services/directory-sync/directory-sync.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    connectionState: ConnectionState
    directorySync: DirectorySyncService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const state = new ConnectionState(fastify.config.watchdogTimeoutSeconds)
    fastify.decorate('connectionState', state)
    fastify.decorate(
      'directorySync',
      new DirectorySyncService(
        fastify.log,
        fastify.store,
        fastify.directorySource.communities,
        state,
        { queueCapacity: fastify.config.eventQueueCapacity },
      ),
    )
  },
  {
    name: 'directory-sync',
    dependencies: ['config', 'database', 'directory-source'],
  },
)
