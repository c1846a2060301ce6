/**
 * Tool commands
 *
 * The ToolDecider's free-form tool calls are resolved into this closed union
 * once, at parse time. Unknown tools and malformed calls are dropped there;
 * everything downstream switches on `tool` exhaustively.
 */

import { z } from 'zod'
import { MEMORY_CATEGORIES, MEMORY_IMPORTANCE } from '../memory/types.js'

const noteDataSchema = z
  .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
  .transform(data =>
    Object.fromEntries(Object.entries(data).map(([key, value]) => [key, String(value)]))
  )

const reasonSchema = z.string().catch('')

export const toolCommandSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('update_user_profile'), data: noteDataSchema, reason: reasonSchema }),
  z.object({ tool: z.literal('update_soul'), data: noteDataSchema, reason: reasonSchema }),
  z.object({ tool: z.literal('update_preferences'), data: noteDataSchema, reason: reasonSchema }),
  z.object({
    tool: z.literal('add_short_term_memory'),
    content: z.string().trim().min(1),
    category: z.enum(MEMORY_CATEGORIES).catch('chat'),
    importance: z.enum(MEMORY_IMPORTANCE).catch('normal'),
    reason: reasonSchema,
  }),
])

export type ToolCommand = z.infer<typeof toolCommandSchema>
export type ToolName = ToolCommand['tool']

/** Keep the calls that resolve to a known command */
export function parseToolCommands(raw: unknown): ToolCommand[] {
  if (!Array.isArray(raw)) return []
  const commands: ToolCommand[] = []
  for (const item of raw) {
    const parsed = toolCommandSchema.safeParse(item)
    if (parsed.success) commands.push(parsed.data)
  }
  return commands
}
