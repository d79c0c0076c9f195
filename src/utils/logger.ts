import fs from 'node:fs'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { resolveEnvPath, resolveLogPath } from './data-dir.js'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type GatewayLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

/**
 * Creates an error serializer that keeps message, name, stack and cause
 * (recursively) along with any custom enumerable properties.
 */
export function createErrorSerializer() {
  const serialize = (err: unknown): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status

    if (err instanceof Error) {
      serialized.type = err.name || 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    if ('stack' in err && err.stack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (!['message', 'stack', 'name', 'status', 'type'].includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }
  return serialize
}

/**
 * Serializer for Fastify requests on the operator HTTP surface.
 * Redacts credentials passed in the query string.
 */
export function createRequestSerializer() {
  return (req: FastifyRequest) => ({
    method: req.method,
    url: req.url.replace(/([?&])(apiKey|token)=([^&]+)/gi, '$1$2=[REDACTED]'),
    remoteAddress: req.ip,
  })
}

/**
 * Generates a log filename for the given date and rotation index.
 * Without a date, returns the name of the current log file.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'gateway-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `gateway-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logs, falling back to stdout when the
 * log directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

/**
 * Generates logger configuration from environment variables.
 *
 * Always logs to file. `enableConsoleOutput=false` turns the pretty terminal
 * output off (default on).
 */
export function createLoggerConfig(): GatewayLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const serializers = {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
    err: createErrorSerializer(),
  }

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return { level: 'info', stream: fileStream, serializers }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return {
      level: 'info',
      transport: { target: 'pino-pretty', options: prettyOptions },
      serializers,
    }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers,
  }
}

/**
 * Create a child logger whose messages are prefixed with `[SERVICE] `.
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
