import type { SiteConfig } from './config.types.js'

/**
 * Opens an entrance. Must be safe to invoke repeatedly for the same site.
 * Resolves `false` when the hardware reported a failure.
 */
export interface AccessActuator {
  open(site: SiteConfig, durationSeconds: number): Promise<boolean>
}

/** Fire-and-forget access log. Never rejects. */
export interface AccessLogger {
  log(action: string, address?: string, player?: string): Promise<boolean>
}

export interface TagMatch {
  recordId: string
  source: 'allowedUsers' | 'address'
  /** Null when matched by a bare credential string or an entry without a username */
  username: string | null
}

export interface SiteMatch extends TagMatch {
  site: SiteConfig
}

export type AccessDecision =
  | { granted: true; tag: string; site: SiteConfig; owner: string }
  | { granted: false; tag: string }
