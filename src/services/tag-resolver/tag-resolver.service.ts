/**
 * Tag Resolver Service
 *
 * Answers "is this credential valid, and for whom" from the local directory
 * mirror. Every query reads a fresh snapshot of the store and never touches
 * the network, so decisions keep working while the remote is unreachable.
 *
 * Store failures and malformed documents are logged and treated as "no match";
 * no method of this service throws.
 */

import type { DirectoryStore } from '@services/directory-store.service.js'
import {
  type CommunityDocument,
  CommunityDocumentSchema,
} from '@schemas/directory/community.schema.js'
import type { SiteMatch, TagMatch } from '@root/types/access.types.js'
import type { SiteConfig } from '@root/types/config.types.js'
import type { StoredRecord } from '@root/types/directory.types.js'
import { DataFormatError } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { matchDocument } from './matching.js'
import { normalizeTag } from './normalize.js'

interface ParsedRecord {
  id: string
  document: CommunityDocument
}

export class TagResolverService {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly store: Pick<DirectoryStore, 'listAll'>,
    private readonly tagLength: number,
  ) {
    this.log = createServiceLogger(baseLog, 'TAG_RESOLVER')
  }

  /**
   * Find the entry matching `tag` in records of `community`, checking
   * `allowedUsers` first and then the people of `address`.
   */
  async lookup(
    tag: string,
    community: string,
    address: string,
  ): Promise<TagMatch | null> {
    const normalized = normalizeTag(tag)
    const records = await this.loadCommunity(community)
    return this.search(records, normalized, address)
  }

  /**
   * Username of the matching entry, or null when the tag is unknown or
   * matched an entry without identity.
   */
  async resolve(
    tag: string,
    community: string,
    address: string,
  ): Promise<string | null> {
    const match = await this.lookup(tag, community, address)
    return match?.username ?? null
  }

  async isValid(
    tag: string,
    community: string,
    address: string,
  ): Promise<boolean> {
    return (await this.lookup(tag, community, address)) !== null
  }

  /**
   * Try each site in priority order against one snapshot; the first site with
   * a match wins.
   */
  async resolveAcrossSites(
    tag: string,
    community: string,
    sites: SiteConfig[],
  ): Promise<SiteMatch | null> {
    const normalized = normalizeTag(tag)
    const records = await this.loadCommunity(community)

    for (const site of sites) {
      const match = this.search(records, normalized, site.address)
      if (match) {
        return { ...match, site }
      }
    }
    return null
  }

  private search(
    records: ParsedRecord[],
    tag: string,
    address: string,
  ): TagMatch | null {
    for (const record of records) {
      const match = matchDocument(record.document, tag, address, this.tagLength)
      if (match) {
        return { recordId: record.id, ...match }
      }
    }
    return null
  }

  /**
   * Snapshot of parsed records belonging to `community`. Records that fail to
   * parse are skipped.
   */
  private async loadCommunity(community: string): Promise<ParsedRecord[]> {
    let rows: StoredRecord[]
    try {
      rows = await this.store.listAll()
    } catch (error) {
      this.log.error({ error }, 'Failed to read local directory')
      return []
    }

    const records: ParsedRecord[] = []
    for (const row of rows) {
      try {
        const document = parseStoredDocument(row)
        if (document.name === community) {
          records.push({ id: row.id, document })
        }
      } catch (error) {
        this.log.warn({ error, id: row.id }, 'Skipping malformed record')
      }
    }
    return records
  }
}

/**
 * Parse a stored row into a community document.
 *
 * @throws DataFormatError when the data is not JSON or not a community document
 */
export function parseStoredDocument(row: StoredRecord): CommunityDocument {
  let raw: unknown
  try {
    raw = JSON.parse(row.data)
  } catch (error) {
    throw new DataFormatError(row.id, `Record ${row.id} is not valid JSON`, {
      cause: error,
    })
  }

  const parsed = CommunityDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    throw new DataFormatError(
      row.id,
      `Record ${row.id} is not a community document: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
    )
  }
  return parsed.data
}
