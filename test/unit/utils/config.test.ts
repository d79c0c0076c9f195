import type { RawConfig } from '@root/types/config.types.js'
import { ConfigError } from '@root/types/errors.js'
import { buildConfig, getDefaultSite } from '@utils/config.js'
import { describe, expect, it } from 'vitest'

const sites = [
  { key: 'harvey', address: 'Harvey House', relayChannel: 2 },
  { key: 'jones', address: 'Jones House', relayChannel: 1 },
]

function rawConfig(overrides: Partial<RawConfig> = {}): RawConfig {
  return {
    port: 3010,
    host: '127.0.0.1',
    logLevel: 'info',
    dbPath: './data/db/directory.db',
    closeGraceDelay: 10000,
    communityName: 'Transcore',
    sites: JSON.stringify(sites),
    defaultSite: 'jones',
    firebaseServiceAccountPath: './serviceAccountKey.json',
    communitiesCollection: 'communities',
    commandsCollection: 'commands',
    remoteRequestTimeoutSeconds: 30,
    enableRemoteControl: true,
    eventQueueCapacity: 1000,
    watchdogIntervalSeconds: 60,
    watchdogTimeoutSeconds: 300,
    reconnectBackoffBaseSeconds: 5,
    reconnectBackoffMaxSeconds: 60,
    enableReader: false,
    serialPort: '/dev/ttyUSB0',
    baudRate: 9600,
    tagLength: 13,
    readerMarker: '#',
    relayCommand: 'relay-tool',
    relayArgs: '["--board","test"]',
    relayHoldSeconds: 0.5,
    pairingHoldSeconds: 10,
    actuationTimeoutSeconds: 20,
    accessLogUrl: '',
    accessLogApiKey: '',
    accessLogTimeoutMs: 3000,
    ...overrides,
  }
}

describe('buildConfig', () => {
  it('should parse the sites and relay arguments', () => {
    const config = buildConfig(rawConfig())

    expect(config.sites).toEqual(sites)
    expect(config.relayArgs).toEqual(['--board', 'test'])
    expect(getDefaultSite(config)).toEqual(sites[1])
  })

  it('should reject sites that are not JSON', () => {
    expect(() => buildConfig(rawConfig({ sites: '[{' }))).toThrow(
      'sites is not valid JSON',
    )
  })

  it('should reject an empty site list', () => {
    expect(() => buildConfig(rawConfig({ sites: '[]' }))).toThrow(
      'Invalid sites: At least one site must be configured',
    )
  })

  it('should reject duplicate site addresses', () => {
    const duplicated = JSON.stringify([
      sites[0],
      { key: 'annex', address: 'Harvey House', relayChannel: 3 },
    ])
    expect(() => buildConfig(rawConfig({ sites: duplicated }))).toThrow(
      'Invalid sites: Duplicate site address: Harvey House',
    )
  })

  it('should reject a default site that is not configured', () => {
    expect(() => buildConfig(rawConfig({ defaultSite: 'smith' }))).toThrow(
      ConfigError,
    )
  })

  it('should reject relay arguments that are not strings', () => {
    expect(() => buildConfig(rawConfig({ relayArgs: '[1,2]' }))).toThrow(
      ConfigError,
    )
  })

  it('should reject a backoff cap below its base', () => {
    expect(() =>
      buildConfig(
        rawConfig({
          reconnectBackoffBaseSeconds: 30,
          reconnectBackoffMaxSeconds: 10,
        }),
      ),
    ).toThrow(ConfigError)
  })
})
