import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'

/**
 * Startup and shutdown ordering for the gateway's long-running parts.
 *
 * Startup: reconcile the mirror, attach listeners, start supervision, then
 * accept reads. Shutdown runs in reverse; the store and the remote client are
 * closed afterwards by their own onClose hooks.
 */
export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify

    fastify.addHook('onReady', async () => {
      const result = await fastify.directorySync.fullSync()
      if (!result.success) {
        fastify.log.warn(
          'Initial sync failed, serving from the local mirror until the watchdog recovers',
        )
        fastify.connectionState.markStale()
      }

      await fastify.directorySync.subscribe()
      if (config.enableRemoteControl) {
        await fastify.commandChannel.subscribe()
      } else {
        fastify.log.info('Remote control disabled')
      }

      fastify.watchdog.start()

      if (config.enableReader) {
        await fastify.credentialReader.start()
      } else {
        fastify.log.info('Credential reader disabled')
      }
    })

    fastify.addHook('preClose', async () => {
      fastify.log.info('Stopping gateway services...')
      await fastify.credentialReader.stop()
      await fastify.watchdog.stop()
      await fastify.commandChannel.stop()
      await fastify.directorySync.stop()
      // Never leave a relay switched on mid-pulse
      await fastify.relayActuator.drain()
    })
  },
  {
    name: 'gateway-lifecycle',
    dependencies: [
      'config',
      'directory-sync',
      'command-channel',
      'connection-watchdog',
      'credential-reader',
    ],
  },
)
