/**
 * Tag normalization and truncated comparison.
 *
 * Raw reader frames carry a leading marker byte that is stripped before
 * lookup, so only the first `tagLength - 1` characters of a stored identifier
 * are significant.
 */

export function normalizeTag(tag: string): string {
  return tag.trim().toUpperCase()
}

/**
 * The comparable prefix of a stored identifier. Missing identifiers yield an
 * empty string, which never matches.
 */
export function significantPrefix(
  value: string | number | null | undefined,
  tagLength: number,
): string {
  if (value === null || value === undefined) return ''
  return String(value).toUpperCase().slice(0, Math.max(tagLength - 1, 0))
}
