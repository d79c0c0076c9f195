import path from 'node:path'
import fastifyAutoload from '@fastify/autoload'
import type { GatewayOptions } from '@root/types/app.types.js'
import type { FastifyInstance } from 'fastify'

/**
 * Assembles the gateway: configuration and compilers first, then the
 * services as custom plugins (ordered by their declared dependencies), then
 * the operator routes.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: GatewayOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(import.meta.dirname, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  fastify.register(fastifyAutoload, {
    dir: path.join(import.meta.dirname, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  fastify.register(fastifyAutoload, {
    dir: path.join(import.meta.dirname, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
