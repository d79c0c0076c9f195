/**
 * Credential matching against a single community document.
 */

import type {
  CommunityDocument,
  PersonEntry,
} from '@schemas/directory/community.schema.js'
import type { TagMatch } from '@root/types/access.types.js'
import { normalizeTag, significantPrefix } from './normalize.js'

export type DocumentMatch = Omit<TagMatch, 'recordId'>

function personMatches(
  person: PersonEntry,
  tag: string,
  tagLength: number,
): boolean {
  return (
    tag === significantPrefix(person.id, tagLength) ||
    tag === significantPrefix(person.playerId, tagLength)
  )
}

/**
 * Search one document for `tag` (already normalized).
 *
 * 1. `allowedUsers`: bare strings match on their normalized, truncated value
 *    and carry no identity; structured entries match on `id` or `playerId`.
 * 2. Otherwise, `people` of every address whose street equals `address`.
 *
 * The community name is not checked here.
 */
export function matchDocument(
  document: CommunityDocument,
  tag: string,
  address: string,
  tagLength: number,
): DocumentMatch | null {
  if (!tag) return null

  for (const entry of document.allowedUsers ?? []) {
    if (typeof entry === 'string' || typeof entry === 'number') {
      if (tag === significantPrefix(normalizeTag(String(entry)), tagLength)) {
        return { source: 'allowedUsers', username: null }
      }
    } else if (personMatches(entry, tag, tagLength)) {
      return { source: 'allowedUsers', username: entry.username ?? null }
    }
  }

  for (const entry of document.addresses ?? []) {
    if (entry.street !== address) continue
    for (const person of entry.people ?? []) {
      if (personMatches(person, tag, tagLength)) {
        return { source: 'address', username: person.username ?? null }
      }
    }
  }

  return null
}
