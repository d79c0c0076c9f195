import { z } from 'zod'

/** Identifiers are stored as strings but tolerated as numbers */
const IdentifierSchema = z.union([z.string(), z.number()])

/**
 * An array whose entries are validated one by one. Entries that fail
 * `entry` are dropped, so one bad entry leaves the rest usable.
 */
function entriesOf<T extends z.ZodTypeAny>(entry: T) {
  return z.array(z.unknown()).transform((values) =>
    values.flatMap((value): z.output<T>[] => {
      const parsed = entry.safeParse(value)
      return parsed.success ? [parsed.data] : []
    }),
  )
}

export const PersonEntrySchema = z
  .object({
    id: IdentifierSchema.nullish(),
    playerId: IdentifierSchema.nullish(),
    // A bad username should not invalidate the credential itself
    username: z.string().nullish().catch(null),
  })
  .passthrough()

export const AllowedUserEntrySchema = z.union([
  IdentifierSchema,
  PersonEntrySchema,
])

export const AddressEntrySchema = z
  .object({
    street: z.string().nullish(),
    people: entriesOf(PersonEntrySchema).nullish(),
  })
  .passthrough()

export const CommunityDocumentSchema = z
  .object({
    name: z.string().nullish(),
    allowedUsers: entriesOf(AllowedUserEntrySchema).nullish(),
    addresses: entriesOf(AddressEntrySchema).nullish(),
  })
  .passthrough()

export type PersonEntry = z.infer<typeof PersonEntrySchema>
export type AllowedUserEntry = z.infer<typeof AllowedUserEntrySchema>
export type AddressEntry = z.infer<typeof AddressEntrySchema>
export type CommunityDocument = z.infer<typeof CommunityDocumentSchema>
