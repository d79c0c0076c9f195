import type { DirectorySource } from './directory-source.types.js'
import type { RelayCommandRunner } from '@services/relay-actuator.service.js'

/**
 * Options passed through autoload to every plugin. Overrides exist for
 * embedding the gateway without Firestore or a relay board attached.
 */
export interface GatewayOptions {
  directorySource?: DirectorySource
  relayRunner?: RelayCommandRunner
}
