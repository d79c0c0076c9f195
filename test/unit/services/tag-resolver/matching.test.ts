import type { CommunityDocument } from '@schemas/directory/community.schema.js'
import { matchDocument } from '@services/tag-resolver/matching.js'
import {
  normalizeTag,
  significantPrefix,
} from '@services/tag-resolver/normalize.js'
import { describe, expect, it } from 'vitest'

const TAG_LENGTH = 13

describe('normalizeTag', () => {
  it('should trim and uppercase', () => {
    expect(normalizeTag('  abc123\r\n')).toBe('ABC123')
  })
})

describe('significantPrefix', () => {
  it('should keep the first tagLength - 1 characters, uppercased', () => {
    expect(significantPrefix('abcdefghijkl9', TAG_LENGTH)).toBe('ABCDEFGHIJKL')
  })

  it('should stringify numeric identifiers', () => {
    expect(significantPrefix(123456, TAG_LENGTH)).toBe('123456')
  })

  it('should yield an empty string for missing identifiers', () => {
    expect(significantPrefix(null, TAG_LENGTH)).toBe('')
    expect(significantPrefix(undefined, TAG_LENGTH)).toBe('')
  })
})

describe('matchDocument', () => {
  const document: CommunityDocument = {
    name: 'Transcore',
    allowedUsers: [
      ' bare0000000x ',
      { id: 'ABCDEFGHIJKL9', username: 'alice' },
      { playerId: 'PLAYER000001Z', username: 'bob' },
      { id: null, username: 'nobody' },
    ],
    addresses: [
      {
        street: 'Harvey House',
        people: [{ id: 'HARVEY000001Q', username: 'hank' }],
      },
      {
        street: 'Jones House',
        people: [{ id: 'JONES0000001Q', username: 'jane' }],
      },
    ],
  }

  it('should match a bare allowed user without identity', () => {
    expect(matchDocument(document, 'BARE0000000X', 'Jones House', TAG_LENGTH)).toEqual({
      source: 'allowedUsers',
      username: null,
    })
  })

  it('should match a structured allowed user by id', () => {
    expect(matchDocument(document, 'ABCDEFGHIJKL', 'Jones House', TAG_LENGTH)).toEqual({
      source: 'allowedUsers',
      username: 'alice',
    })
  })

  it('should match a structured allowed user by playerId', () => {
    expect(matchDocument(document, 'PLAYER000001', 'Jones House', TAG_LENGTH)).toEqual({
      source: 'allowedUsers',
      username: 'bob',
    })
  })

  it('should only match people of the requested address', () => {
    expect(matchDocument(document, 'HARVEY000001', 'Harvey House', TAG_LENGTH)).toEqual({
      source: 'address',
      username: 'hank',
    })
    expect(matchDocument(document, 'HARVEY000001', 'Jones House', TAG_LENGTH)).toBeNull()
    expect(matchDocument(document, 'JONES0000001', 'Harvey House', TAG_LENGTH)).toBeNull()
  })

  it('should never match an empty tag', () => {
    expect(matchDocument(document, '', 'Jones House', TAG_LENGTH)).toBeNull()
  })

  it('should not match an untruncated tag', () => {
    expect(matchDocument(document, 'ABCDEFGHIJKL9', 'Jones House', TAG_LENGTH)).toBeNull()
  })
})
