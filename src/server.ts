import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp from './app.js'
import { createLoggerConfig, validLogLevels } from '@utils/logger.js'

/**
 * Starts the gateway and wires graceful shutdown. Startup failures (invalid
 * configuration, unreadable store) terminate the process.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  try {
    await app.register(fp(serviceApp))
    await app.ready()
  } catch (err) {
    app.log.fatal({ err }, 'Gateway failed to start')
    process.exit(1)
  }

  const configLogLevel = app.config.logLevel
  if (validLogLevels.includes(configLogLevel)) {
    app.log.level = configLogLevel
  }

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: app.config.host,
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

void init()
