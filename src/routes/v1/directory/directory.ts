import {
  type DirectoryStatusResponse,
  DirectoryStatusResponseSchema,
  type FullSyncResponse,
  FullSyncResultSchema,
} from '@schemas/directory/directory.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: DirectoryStatusResponse
  }>(
    '/status',
    {
      schema: {
        response: {
          200: DirectoryStatusResponseSchema,
        },
      },
    },
    async () => {
      const sync = fastify.directorySync.status()
      return {
        community: fastify.config.communityName,
        records: await fastify.store.count(),
        connection: fastify.connectionState.snapshot(),
        subscriptions: {
          communities: sync.subscribed,
          commands: fastify.commandChannel.subscribed,
        },
        pendingEvents: sync.pendingEvents,
        lastSync: sync.lastSync,
        lastSyncAt: sync.lastSyncAt,
      }
    },
  )

  fastify.post<{
    Reply: FullSyncResponse
  }>(
    '/sync',
    {
      schema: {
        response: {
          200: FullSyncResultSchema,
          503: FullSyncResultSchema,
        },
      },
    },
    async (_request, reply) => {
      const result = await fastify.directorySync.fullSync()
      if (!result.success) {
        fastify.log.warn({ error: result.error }, 'Manual sync failed')
      }
      return reply.status(result.success ? 200 : 503).send(result)
    },
  )
}

export default plugin
