/**
 * Command planning
 *
 * Decides what to do with one remote command record: execute it against a
 * configured site, or discard it.
 */

import { GateCommandSchema } from '@schemas/command/command.schema.js'
import type { CommandPlan, CommandRecord } from '@root/types/command.types.js'
import type { SiteConfig } from '@root/types/config.types.js'

export interface CommandPlanOptions {
  community: string
  sites: SiteConfig[]
  defaultSite: SiteConfig
  holdSeconds: number
  pairingHoldSeconds: number
}

export function planCommand(
  record: CommandRecord,
  options: CommandPlanOptions,
): CommandPlan {
  if (record.community !== options.community) {
    return { action: 'discard', reason: 'other_community' }
  }

  const command = GateCommandSchema.safeParse(record.command)
  if (!command.success) {
    return { action: 'discard', reason: 'unknown_command' }
  }

  const requested = (record.address ?? '').trim()
  let site = options.defaultSite
  if (requested) {
    const match = options.sites.find((candidate) => candidate.address === requested)
    if (!match) {
      return { action: 'discard', reason: 'invalid_address' }
    }
    site = match
  }

  if (command.data === 'pairing_mode') {
    return {
      action: 'execute',
      command: command.data,
      site,
      holdSeconds: options.pairingHoldSeconds,
      logAccess: true,
    }
  }

  return {
    action: 'execute',
    command: command.data,
    site,
    holdSeconds: options.holdSeconds,
    logAccess: false,
  }
}
