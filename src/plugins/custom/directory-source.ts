import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { FirestoreDirectorySource } from '@services/directory-source/firestore-source.js'
import type { GatewayOptions } from '@root/types/app.types.js'
import type { DirectorySource } from '@root/types/directory-source.types.js'

declare module 'fastify' {
  interface FastifyInstance {
    directorySource: DirectorySource
  }
}

export default fp<GatewayOptions>(
  async (fastify: FastifyInstance, opts) => {
    const source =
      opts.directorySource ??
      FirestoreDirectorySource.create(fastify.log, {
        serviceAccountPath: fastify.config.firebaseServiceAccountPath,
        communitiesCollection: fastify.config.communitiesCollection,
        commandsCollection: fastify.config.commandsCollection,
        requestTimeoutMs: fastify.config.remoteRequestTimeoutSeconds * 1000,
      })

    fastify.decorate('directorySource', source)
    fastify.addHook('onClose', async () => {
      await source.close()
    })
  },
  {
    name: 'directory-source',
    dependencies: ['config'],
  },
)
