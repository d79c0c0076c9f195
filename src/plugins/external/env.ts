import env from '@fastify/env'
import type { Config, RawConfig } from '@root/types/config.types.js'
import { buildConfig } from '@utils/config.js'
import { resolveEnvPath } from '@utils/data-dir.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const DEFAULT_SITES = JSON.stringify([
  { key: 'harvey', address: 'Harvey House', relayChannel: 2 },
  { key: 'jones', address: 'Jones House', relayChannel: 1 },
])

const DEFAULT_RELAY_ARGS = JSON.stringify([
  '-jar',
  './RelayCommandLineTool.jar',
  '0000000000',
  '4v2',
])

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3010,
    },
    host: {
      type: 'string',
      default: '127.0.0.1',
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    dbPath: {
      type: 'string',
      default: './data/db/directory.db',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    communityName: {
      type: 'string',
      default: 'Transcore',
    },
    sites: {
      type: 'string',
      default: DEFAULT_SITES,
    },
    defaultSite: {
      type: 'string',
      default: 'jones',
    },
    firebaseServiceAccountPath: {
      type: 'string',
      default: './serviceAccountKey.json',
    },
    communitiesCollection: {
      type: 'string',
      default: 'communities',
    },
    commandsCollection: {
      type: 'string',
      default: 'commands',
    },
    remoteRequestTimeoutSeconds: {
      type: 'number',
      default: 30,
    },
    enableRemoteControl: {
      type: 'boolean',
      default: true,
    },
    eventQueueCapacity: {
      type: 'number',
      default: 1000,
    },
    watchdogIntervalSeconds: {
      type: 'number',
      default: 60,
    },
    watchdogTimeoutSeconds: {
      type: 'number',
      default: 300,
    },
    reconnectBackoffBaseSeconds: {
      type: 'number',
      default: 5,
    },
    reconnectBackoffMaxSeconds: {
      type: 'number',
      default: 60,
    },
    enableReader: {
      type: 'boolean',
      default: true,
    },
    serialPort: {
      type: 'string',
      default: '/dev/ttyUSB0',
    },
    baudRate: {
      type: 'number',
      default: 9600,
    },
    tagLength: {
      type: 'number',
      default: 13,
    },
    readerMarker: {
      type: 'string',
      default: '#',
    },
    relayCommand: {
      type: 'string',
      default: 'java',
    },
    relayArgs: {
      type: 'string',
      default: DEFAULT_RELAY_ARGS,
    },
    relayHoldSeconds: {
      type: 'number',
      default: 0.5,
    },
    pairingHoldSeconds: {
      type: 'number',
      default: 10,
    },
    actuationTimeoutSeconds: {
      type: 'number',
      default: 20,
    },
    accessLogUrl: {
      type: 'string',
      default: '',
    },
    accessLogApiKey: {
      type: 'string',
      default: '',
    },
    accessLogTimeoutMs: {
      type: 'number',
      default: 3000,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    /** Environment values as loaded, JSON fields still serialized */
    rawConfig: RawConfig
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'rawConfig',
      schema,
      dotenv: {
        path: resolveEnvPath(),
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const config = buildConfig(fastify.rawConfig)
    fastify.decorate('config', config)

    fastify.log.info(
      {
        community: config.communityName,
        sites: config.sites.map((site) => site.key),
        remoteControl: config.enableRemoteControl,
        reader: config.enableReader,
      },
      'Configuration loaded',
    )
  },
  {
    name: 'config',
  },
)
