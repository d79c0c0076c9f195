import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { AccessReadLoop } from '@services/credential-reader/access-read-loop.js'
import { CredentialReaderService } from '@services/credential-reader/credential-reader.service.js'
import { openSerialReader } from '@services/credential-reader/serial-reader.js'
import { getDefaultSite } from '@utils/config.js'

declare module 'fastify' {
  interface FastifyInstance {
    credentialReader: CredentialReaderService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const loop = new AccessReadLoop(
      fastify.log,
      {
        resolver: fastify.tagResolver,
        actuator: fastify.relayActuator,
        accessLog: fastify.accessLog,
      },
      {
        marker: config.readerMarker,
        tagLength: config.tagLength,
        community: config.communityName,
        sites: config.sites,
        defaultSite: getDefaultSite(config),
        holdSeconds: config.relayHoldSeconds,
      },
    )

    fastify.decorate(
      'credentialReader',
      new CredentialReaderService(fastify.log, loop, () =>
        openSerialReader(
          { path: config.serialPort, baudRate: config.baudRate },
          fastify.log,
        ),
      ),
    )
  },
  {
    name: 'credential-reader',
    dependencies: ['config', 'access'],
  },
)
