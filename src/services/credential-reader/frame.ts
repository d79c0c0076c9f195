/**
 * Reader frame parsing.
 *
 * The reader transmits lines such as `#1234567890ABX`: a marker, the
 * significant characters of the tag, and trailing bytes. The tag key is the
 * `tagLength - 1` characters following the marker, uppercased.
 */

export interface FrameOptions {
  marker: string
  tagLength: number
}

/**
 * Extract the tag key from a raw line, or null when the line is empty or does
 * not start with the marker.
 */
export function parseFrame(raw: string, options: FrameOptions): string | null {
  const line = raw.trim()
  if (!line || !line.startsWith(options.marker)) {
    return null
  }
  const start = options.marker.length
  const key = line.slice(start, start + options.tagLength - 1).toUpperCase()
  return key || null
}
