import { z } from 'zod'

export const AccessCheckBodySchema = z.object({
  tag: z.string().trim().min(1, 'Tag is required'),
})

export const AccessCheckResponseSchema = z.object({
  tag: z.string(),
  granted: z.boolean(),
  site: z.string().nullable(),
  address: z.string().nullable(),
  owner: z.string().nullable(),
  source: z.enum(['allowedUsers', 'address']).nullable(),
})

export type AccessCheckBody = z.infer<typeof AccessCheckBodySchema>
export type AccessCheckResponse = z.infer<typeof AccessCheckResponseSchema>
