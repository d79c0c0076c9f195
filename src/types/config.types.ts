export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

/**
 * A physical entrance served by this gateway.
 * Sites are listed in priority order: when a tag could match more than one
 * site, the first one wins.
 */
export interface SiteConfig {
  /** Short identifier used for relay mapping and config references */
  key: string
  /** Street value matched against `addresses[].street` in community records */
  address: string
  /** Relay channel on the relay board */
  relayChannel: number
}

export interface Config {
  // System Config
  port: number
  host: string
  logLevel: LogLevel
  dbPath: string
  closeGraceDelay: number

  // Community
  communityName: string
  sites: SiteConfig[]
  defaultSite: string

  // Remote directory
  firebaseServiceAccountPath: string
  communitiesCollection: string
  commandsCollection: string
  remoteRequestTimeoutSeconds: number
  enableRemoteControl: boolean
  eventQueueCapacity: number

  // Watchdog
  watchdogIntervalSeconds: number
  watchdogTimeoutSeconds: number
  reconnectBackoffBaseSeconds: number
  reconnectBackoffMaxSeconds: number

  // Reader
  enableReader: boolean
  serialPort: string
  baudRate: number
  tagLength: number
  readerMarker: string

  // Relay
  relayCommand: string
  relayArgs: string[]
  relayHoldSeconds: number
  pairingHoldSeconds: number
  actuationTimeoutSeconds: number

  // Access log
  accessLogUrl: string
  accessLogApiKey: string
  accessLogTimeoutMs: number
}

/** Config as loaded from the environment, before JSON fields are parsed */
export type RawConfig = Omit<Config, 'sites' | 'relayArgs'> & {
  sites: string
  relayArgs: string
}
