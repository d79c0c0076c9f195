import { z } from 'zod'

export const GATE_COMMANDS = ['open_gate', 'pairing_mode'] as const

export const GateCommandSchema = z.enum(GATE_COMMANDS)

/** Shape of a command document as written by the remote UI */
export const CommandDocumentSchema = z
  .object({
    community: z.string().nullish(),
    command: z.string().nullish(),
    address: z.string().nullish(),
  })
  .passthrough()

export type CommandDocument = z.infer<typeof CommandDocumentSchema>
