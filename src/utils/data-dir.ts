import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const projectRoot = resolve(__dirname, '..', '..')

/**
 * Resolves the gateway data directory.
 *
 * `process.env.dataDir` overrides the default of `{projectRoot}/data`, which is
 * where the local mirror and the log files live on a gateway device.
 */
export function resolveDataDir(): string {
  return process.env.dataDir
    ? resolve(process.env.dataDir)
    : resolve(projectRoot, 'data')
}

/** Directory holding the SQLite mirror */
export function resolveDbPath(): string {
  return resolve(resolveDataDir(), 'db')
}

/** Directory holding rotated log files */
export function resolveLogPath(): string {
  return resolve(resolveDataDir(), 'logs')
}

/** The .env file read at startup */
export function resolveEnvPath(): string {
  return process.env.dataDir
    ? resolve(process.env.dataDir, '.env')
    : resolve(projectRoot, '.env')
}
