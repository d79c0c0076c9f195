import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { CommandChannelService } from '@services/command-channel/command-channel.service.js'
import { getDefaultSite } from '@utils/config.js'

declare module 'fastify' {
  interface FastifyInstance {
    commandChannel: CommandChannelService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    fastify.decorate(
      'commandChannel',
      new CommandChannelService(
        fastify.log,
        {
          commands: fastify.directorySource.commands,
          actuator: fastify.relayActuator,
          accessLog: fastify.accessLog,
        },
        {
          community: config.communityName,
          sites: config.sites,
          defaultSite: getDefaultSite(config),
          holdSeconds: config.relayHoldSeconds,
          pairingHoldSeconds: config.pairingHoldSeconds,
        },
      ),
    )
  },
  {
    name: 'command-channel',
    dependencies: ['config', 'directory-source', 'access'],
  },
)
