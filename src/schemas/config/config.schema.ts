import { z } from 'zod'

export const SiteConfigSchema = z.object({
  key: z.string().trim().min(1, 'Site key is required'),
  address: z.string().trim().min(1, 'Site address is required'),
  relayChannel: z.number().int().nonnegative(),
})

export const SitesSchema = z
  .array(SiteConfigSchema)
  .min(1, 'At least one site must be configured')
  .superRefine((sites, ctx) => {
    const keys = new Set<string>()
    const addresses = new Set<string>()
    for (const [index, site] of sites.entries()) {
      if (keys.has(site.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate site key: ${site.key}`,
          path: [index, 'key'],
        })
      }
      if (addresses.has(site.address)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate site address: ${site.address}`,
          path: [index, 'address'],
        })
      }
      keys.add(site.key)
      addresses.add(site.address)
    }
  })

export const RelayArgsSchema = z.array(z.string())
