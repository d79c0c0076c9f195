import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { ConnectionWatchdog } from '@services/connection-watchdog/connection-watchdog.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    watchdog: ConnectionWatchdog
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const communities = fastify.directorySource.communities

    fastify.decorate(
      'watchdog',
      new ConnectionWatchdog(
        fastify.log,
        {
          state: fastify.connectionState,
          sync: fastify.directorySync,
          probe: () => communities.probe(),
          listeners: config.enableRemoteControl ? [fastify.commandChannel] : [],
        },
        {
          intervalSeconds: config.watchdogIntervalSeconds,
          timeoutSeconds: config.watchdogTimeoutSeconds,
          backoff: {
            baseSeconds: config.reconnectBackoffBaseSeconds,
            maxSeconds: config.reconnectBackoffMaxSeconds,
          },
        },
      ),
    )
  },
  {
    name: 'connection-watchdog',
    dependencies: ['config', 'directory-source', 'directory-sync', 'command-channel'],
  },
)
