/**
 * Print every record of the local directory mirror.
 *
 * Usage: npm run dump -- [path/to/directory.db]
 * Defaults to `dbPath` from the environment, then ./data/db/directory.db.
 */
import fs from 'node:fs'
import { resolve } from 'node:path'
import { DirectoryStore } from '@services/directory-store.service.js'
import { formatDirectoryDump } from '@utils/directory-dump.js'
import { resolveEnvPath } from '@utils/data-dir.js'
import { config } from 'dotenv'
import pino from 'pino'

config({ path: resolveEnvPath() })

async function main(): Promise<number> {
  const dbPath = resolve(
    process.argv[2] ?? process.env.dbPath ?? './data/db/directory.db',
  )
  if (!fs.existsSync(dbPath)) {
    console.error(`Error: database file not found at ${dbPath}`)
    return 1
  }

  const log = pino({ level: 'warn' })
  const store = await DirectoryStore.create(log, dbPath)
  try {
    console.log(formatDirectoryDump(await store.listAll()))
    return 0
  } finally {
    await store.close()
  }
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error('Failed to read local directory:', error)
    process.exitCode = 1
  },
)
