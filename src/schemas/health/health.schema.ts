import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  timestamp: z.string().datetime(),
  checks: z.object({
    database: z.enum(['ok', 'failed']),
    connection: z.enum(['healthy', 'stale']),
    reader: z.enum(['idle', 'running', 'failed', 'stopped']),
  }),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
