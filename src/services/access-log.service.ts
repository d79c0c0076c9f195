/**
 * Access Log Service
 *
 * Sends access events to the remote access log. Calls are fire-and-forget:
 * they are bounded by a timeout and every failure is logged and swallowed, so
 * logging can never affect an access decision.
 */

import type { AccessLogger } from '@root/types/access.types.js'
import { AccessLogError, errorMessage } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface AccessLogConfig {
  /** Base URL of the log API; empty disables remote logging */
  baseUrl: string
  apiKey: string
  community: string
  timeoutMs: number
}

export interface AccessLogPayload {
  community: string
  player: string
  action: string
  address?: string
}

/** Player recorded for events without a resolved owner, e.g. remote opens */
export const DEFAULT_PLAYER = 'Cloud'

export class AccessLogService implements AccessLogger {
  private readonly logger: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly config: AccessLogConfig,
  ) {
    this.logger = createServiceLogger(baseLog, 'ACCESS_LOG')
  }

  get enabled(): boolean {
    return this.config.baseUrl.trim() !== ''
  }

  /**
   * Post an access event. Resolves true when the log accepted it; never
   * rejects.
   */
  async log(
    action: string,
    address = '',
    player: string = DEFAULT_PLAYER,
  ): Promise<boolean> {
    if (!this.enabled) {
      this.logger.debug({ action, address, player }, 'Remote access log disabled')
      return false
    }

    const payload: AccessLogPayload = {
      community: this.config.community,
      player,
      action,
    }
    if (address) {
      payload.address = address
    }

    try {
      const response = await fetch(this.endpoint(), {
        method: 'POST',
        headers: {
          'X-API-Key': this.config.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      })

      if (!response.ok) {
        const body = await response.text().catch(() => '')
        throw new AccessLogError(
          `HTTP ${response.status}${body ? ` - ${body}` : ''}`,
          response.status,
        )
      }
      return true
    } catch (error) {
      const failure =
        error instanceof AccessLogError
          ? error
          : new AccessLogError(errorMessage(error), undefined, { cause: error })
      this.logger.warn({ error: failure, action }, 'Failed to send access log')
      return false
    }
  }

  private endpoint(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/log-access`
  }
}
