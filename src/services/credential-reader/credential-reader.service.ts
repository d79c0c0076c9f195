/**
 * Owns the reader device for the lifetime of the gateway: opens it, feeds its
 * lines to the access read loop and closes it on shutdown. A reader that
 * cannot be opened leaves the rest of the gateway running.
 */

import { errorMessage } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import type { AccessReadLoop } from './access-read-loop.js'
import type { CredentialLineSource } from './serial-reader.js'

export type ReaderStatus = 'idle' | 'running' | 'failed' | 'stopped'

export class CredentialReaderService {
  private readonly log: FastifyBaseLogger
  private source: CredentialLineSource | null = null
  private running: Promise<void> | null = null
  private currentStatus: ReaderStatus = 'idle'
  private lastError: string | null = null

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly loop: Pick<AccessReadLoop, 'run' | 'stop'>,
    private readonly openSource: () => Promise<CredentialLineSource>,
  ) {
    this.log = createServiceLogger(baseLog, 'READER')
  }

  get status(): { status: ReaderStatus; error: string | null } {
    return { status: this.currentStatus, error: this.lastError }
  }

  /**
   * Open the device and process reads in the background. Resolves once the
   * device is open or has failed to open.
   */
  async start(): Promise<void> {
    if (this.currentStatus !== 'idle') return

    try {
      this.source = await this.openSource()
    } catch (error) {
      this.fail('Failed to open reader', error)
      return
    }

    this.currentStatus = 'running'
    const { lines } = this.source
    this.running = this.loop.run(lines).then(
      () => {
        if (this.currentStatus === 'running') {
          this.currentStatus = 'stopped'
        }
      },
      (error: unknown) => this.fail('Reader loop stopped unexpectedly', error),
    )
  }

  async stop(): Promise<void> {
    if (this.currentStatus === 'running') {
      this.currentStatus = 'stopped'
    }
    this.loop.stop()
    if (this.source) {
      await this.source.close()
      this.source = null
    }
    if (this.running) {
      await this.running
      this.running = null
    }
  }

  private fail(message: string, error: unknown): void {
    this.currentStatus = 'failed'
    this.lastError = errorMessage(error)
    this.log.error({ error }, message)
  }
}
