import { RelayArgsSchema, SitesSchema } from '@schemas/config/config.schema.js'
import type { Config, RawConfig, SiteConfig } from '@root/types/config.types.js'
import { ConfigError } from '@root/types/errors.js'
import type { z } from 'zod'

function parseJsonField<T>(
  value: string,
  fieldName: string,
  schema: z.ZodType<T>,
): T {
  let parsed: unknown
  try {
    parsed = JSON.parse(value)
  } catch (error) {
    throw new ConfigError(`${fieldName} is not valid JSON`, { cause: error })
  }
  const result = schema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join('; ')
    throw new ConfigError(`Invalid ${fieldName}: ${issues}`)
  }
  return result.data
}

/**
 * Turn the environment-loaded config into the runtime `Config`, parsing the
 * JSON fields and checking cross-field rules. Throws `ConfigError`.
 */
export function buildConfig(raw: RawConfig): Config {
  const sites = parseJsonField(raw.sites, 'sites', SitesSchema)
  const relayArgs = parseJsonField(raw.relayArgs, 'relayArgs', RelayArgsSchema)

  if (!sites.some((site) => site.key === raw.defaultSite)) {
    throw new ConfigError(
      `defaultSite "${raw.defaultSite}" does not name a configured site`,
    )
  }
  if (raw.tagLength < 2) {
    throw new ConfigError('tagLength must be at least 2')
  }
  if (raw.reconnectBackoffMaxSeconds < raw.reconnectBackoffBaseSeconds) {
    throw new ConfigError(
      'reconnectBackoffMaxSeconds must not be lower than reconnectBackoffBaseSeconds',
    )
  }

  return { ...raw, sites, relayArgs }
}

/** The site used when an address is not given */
export function getDefaultSite(config: Config): SiteConfig {
  const site = config.sites.find((entry) => entry.key === config.defaultSite)
  if (!site) {
    throw new ConfigError(`Unknown default site: ${config.defaultSite}`)
  }
  return site
}
