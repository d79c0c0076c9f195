/**
 * Serial credential reader.
 *
 * Opens the reader's serial port and exposes its output as an async sequence
 * of lines. The sequence is not restartable; a closed port ends it.
 */

import { ReadlineParser } from '@serialport/parser-readline'
import type { FastifyBaseLogger } from 'fastify'
import { SerialPort } from 'serialport'

export interface SerialReaderOptions {
  path: string
  baudRate: number
}

export interface CredentialLineSource {
  lines: AsyncIterable<string>
  close(): Promise<void>
}

export async function openSerialReader(
  options: SerialReaderOptions,
  log: FastifyBaseLogger,
): Promise<CredentialLineSource> {
  const port = new SerialPort({
    path: options.path,
    baudRate: options.baudRate,
    autoOpen: false,
    endOnClose: true,
  })

  await new Promise<void>((resolve, reject) => {
    port.open((error) => (error ? reject(error) : resolve()))
  })

  port.on('error', (error) => {
    log.error({ error }, 'Serial port error')
  })

  const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }))
  log.info(`Listening on ${options.path} @ ${options.baudRate} bps`)

  async function* readLines(): AsyncGenerator<string> {
    for await (const chunk of parser) {
      yield String(chunk)
    }
  }

  return {
    lines: readLines(),
    close: () =>
      new Promise<void>((resolve) => {
        // Ending the parser ends the line sequence
        const finish = () => {
          port.unpipe(parser)
          if (!parser.writableEnded) parser.end()
          resolve()
        }
        if (!port.isOpen) {
          finish()
          return
        }
        port.close((error) => {
          if (error) {
            log.warn({ error }, 'Failed to close serial port')
          }
          finish()
        })
      }),
  }
}
