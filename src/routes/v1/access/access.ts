import {
  type AccessCheckBody,
  AccessCheckBodySchema,
  type AccessCheckResponse,
  AccessCheckResponseSchema,
} from '@schemas/access/access.schema.js'
import { normalizeTag } from '@services/tag-resolver/normalize.js'
import type { FastifyPluginAsync } from 'fastify'

/**
 * Diagnostic lookup against the local mirror. Never actuates a relay or
 * writes to the access log.
 */
const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Body: AccessCheckBody
    Reply: AccessCheckResponse
  }>(
    '/check',
    {
      schema: {
        body: AccessCheckBodySchema,
        response: {
          200: AccessCheckResponseSchema,
        },
      },
    },
    async (request) => {
      const tag = normalizeTag(request.body.tag)
      const match = await fastify.tagResolver.resolveAcrossSites(
        tag,
        fastify.config.communityName,
        fastify.config.sites,
      )

      if (!match) {
        return {
          tag,
          granted: false,
          site: null,
          address: null,
          owner: null,
          source: null,
        }
      }

      return {
        tag,
        granted: true,
        site: match.site.key,
        address: match.site.address,
        owner: match.username,
        source: match.source,
      }
    },
  )
}

export default plugin
