import type { StoredRecord } from '@root/types/directory.types.js'

const SEPARATOR = '='.repeat(80)

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key))
    }
    return sorted
  }
  return value
}

/** Parsed record data, or `{ _raw }` when the stored text is not JSON */
export function decodeRecordData(data: string): unknown {
  try {
    return JSON.parse(data)
  } catch {
    return { _raw: data }
  }
}

/**
 * Human-readable listing of the local mirror: one block per record with its
 * id and key-sorted, indented data, then a total.
 */
export function formatDirectoryDump(records: StoredRecord[]): string {
  if (records.length === 0) {
    return 'No communities found in the local directory.'
  }

  const lines: string[] = []
  for (const record of records) {
    lines.push(SEPARATOR)
    lines.push(`Document ID: ${record.id}`)
    lines.push(JSON.stringify(sortKeys(decodeRecordData(record.data)), null, 2))
  }
  lines.push(SEPARATOR)
  lines.push(`Total documents: ${records.length}`)
  return lines.join('\n')
}
