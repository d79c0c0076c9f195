/**
 * Error taxonomy for the gateway core.
 *
 * Each class maps to one recovery policy: transient network failures are
 * retried by the watchdog, data format errors skip a single record,
 * persistence errors abort the current sync pass, and actuation or access
 * log failures are logged without affecting anything else.
 */

export class GatewayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The remote directory could not be reached */
export class TransientNetworkError extends GatewayError {}

/** A stored document could not be parsed or does not have the expected shape */
export class DataFormatError extends GatewayError {
  constructor(
    readonly recordId: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

/** Local store I/O failed */
export class PersistenceError extends GatewayError {}

/** The relay could not be driven */
export class ActuationError extends GatewayError {}

/** The remote access log rejected or did not answer */
export class AccessLogError extends GatewayError {
  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options)
  }
}

/** Invalid gateway configuration; fails startup */
export class ConfigError extends GatewayError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
