/**
 * Access Read Loop
 *
 * Consumes raw reader lines, resolves each tag across the configured sites in
 * priority order, pulses the relay of the matching site and reports the
 * attempt to the access log. Denied reads are logged against the default
 * site.
 */

import type { TagResolverService } from '@services/tag-resolver/tag-resolver.service.js'
import type {
  AccessActuator,
  AccessDecision,
  AccessLogger,
} from '@root/types/access.types.js'
import type { SiteConfig } from '@root/types/config.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { type FrameOptions, parseFrame } from './frame.js'

export const UNKNOWN_OWNER = 'Unknown'

export interface AccessReadLoopDeps {
  resolver: Pick<TagResolverService, 'resolveAcrossSites'>
  actuator: AccessActuator
  accessLog: AccessLogger
}

export interface AccessReadLoopOptions extends FrameOptions {
  community: string
  /** In priority order */
  sites: SiteConfig[]
  defaultSite: SiteConfig
  holdSeconds: number
}

export class AccessReadLoop {
  private readonly log: FastifyBaseLogger
  private stopped = false

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly deps: AccessReadLoopDeps,
    private readonly options: AccessReadLoopOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'READER')
  }

  /**
   * Process lines until the sequence ends or `stop()` is called.
   */
  async run(lines: AsyncIterable<string>): Promise<void> {
    for await (const raw of lines) {
      if (this.stopped) break
      await this.handleRead(raw)
    }
    this.log.info('Reader loop finished')
  }

  stop(): void {
    this.stopped = true
  }

  /**
   * Handle one raw line. Returns null for lines that are not tag frames.
   */
  async handleRead(raw: string): Promise<AccessDecision | null> {
    const tag = parseFrame(raw, this.options)
    if (!tag) return null

    const match = await this.deps.resolver.resolveAcrossSites(
      tag,
      this.options.community,
      this.options.sites,
    )

    if (!match) {
      this.log.info({ tag }, `READ '${tag}' denied`)
      void this.deps.accessLog.log(
        `Access denied, invalid tag: ${tag}`,
        this.options.defaultSite.address,
        UNKNOWN_OWNER,
      )
      return { granted: false, tag }
    }

    const owner = match.username ?? UNKNOWN_OWNER
    this.log.info(
      { tag, site: match.site.key, owner },
      `READ '${tag}' accepted (${match.site.address})`,
    )

    const opened = await this.deps.actuator.open(
      match.site,
      this.options.holdSeconds,
    )
    if (!opened) {
      this.log.warn({ site: match.site.key }, 'Relay did not confirm the open')
    }

    void this.deps.accessLog.log(
      `Access granted via tag: ${tag}`,
      match.site.address,
      owner,
    )
    return { granted: true, tag, site: match.site, owner }
  }
}
