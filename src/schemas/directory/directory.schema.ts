import { z } from 'zod'

export const FullSyncResultSchema = z.object({
  success: z.boolean(),
  fetched: z.number(),
  removed: z.number(),
  durationMs: z.number(),
  error: z.string().optional(),
})

export const ConnectionSnapshotSchema = z.object({
  health: z.enum(['healthy', 'stale']),
  lastEventTimestamp: z.number(),
  ageSeconds: z.number(),
  consecutiveFailureCount: z.number(),
  currentBackoffSeconds: z.number(),
})

export const DirectoryStatusResponseSchema = z.object({
  community: z.string(),
  records: z.number(),
  connection: ConnectionSnapshotSchema,
  subscriptions: z.object({
    communities: z.boolean(),
    commands: z.boolean(),
  }),
  pendingEvents: z.number(),
  lastSync: FullSyncResultSchema.nullable(),
  lastSyncAt: z.string().nullable(),
})

export type FullSyncResponse = z.infer<typeof FullSyncResultSchema>
export type DirectoryStatusResponse = z.infer<
  typeof DirectoryStatusResponseSchema
>
