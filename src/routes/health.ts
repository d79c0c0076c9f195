import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString()
      let dbStatus: 'ok' | 'failed' = 'ok'

      try {
        await fastify.store.ping()
      } catch (error) {
        fastify.log.error(
          { error },
          'Health check failed: local directory unreachable',
        )
        dbStatus = 'failed'
      }

      const isHealthy = dbStatus === 'ok'
      const statusCode = isHealthy ? 200 : 503

      return reply.status(statusCode).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp,
        checks: {
          database: dbStatus,
          connection: fastify.connectionState.health(),
          reader: fastify.credentialReader.status.status,
        },
      })
    },
  )
}

export default plugin
