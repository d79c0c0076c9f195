import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { AccessLogService } from '@services/access-log.service.js'
import { RelayActuatorService } from '@services/relay-actuator.service.js'
import { TagResolverService } from '@services/tag-resolver/tag-resolver.service.js'
import type { GatewayOptions } from '@root/types/app.types.js'

declare module 'fastify' {
  interface FastifyInstance {
    tagResolver: TagResolverService
    relayActuator: RelayActuatorService
    accessLog: AccessLogService
  }
}

/**
 * Everything needed to turn a tag into an opened gate: the resolver over the
 * local mirror, the relay driver and the remote access log.
 */
export default fp<GatewayOptions>(
  async (fastify: FastifyInstance, opts) => {
    const { config } = fastify

    fastify.decorate(
      'tagResolver',
      new TagResolverService(fastify.log, fastify.store, config.tagLength),
    )
    fastify.decorate(
      'relayActuator',
      new RelayActuatorService(
        fastify.log,
        {
          command: config.relayCommand,
          args: config.relayArgs,
          timeoutSeconds: config.actuationTimeoutSeconds,
        },
        opts.relayRunner,
      ),
    )

    const accessLog = new AccessLogService(fastify.log, {
      baseUrl: config.accessLogUrl,
      apiKey: config.accessLogApiKey,
      community: config.communityName,
      timeoutMs: config.accessLogTimeoutMs,
    })
    if (!accessLog.enabled) {
      fastify.log.warn('accessLogUrl is not set, access events will not be reported')
    }
    fastify.decorate('accessLog', accessLog)
  },
  {
    name: 'access',
    dependencies: ['config', 'database'],
  },
)
