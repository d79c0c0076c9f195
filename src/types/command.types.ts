import type { SiteConfig } from './config.types.js'

export type GateCommand = 'open_gate' | 'pairing_mode'

export interface CommandRecord {
  id: string
  community?: string
  command?: string
  address?: string | null
}

export type CommandPlan =
  | {
      action: 'execute'
      command: GateCommand
      site: SiteConfig
      holdSeconds: number
      /** Remote opens are not duplicated into the access log */
      logAccess: boolean
    }
  | {
      action: 'discard'
      reason: 'unknown_command' | 'invalid_address' | 'other_community'
    }

export interface CommandOutcome {
  id: string
  status: 'executed' | 'discarded' | 'skipped'
  command?: GateCommand
  site?: string
  actuated?: boolean
  deleted?: boolean
  reason?: string
}
