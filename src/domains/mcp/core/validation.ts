import type { z } from 'zod'

export type ArgsResult<T> = { success: true; data: T } | { success: false; message: string }

/**
 * Validate tool arguments, turning zod issues into one readable line
 */
export function parseToolArgs<S extends z.ZodTypeAny>(
  schema: S,
  args: Record<string, unknown> | undefined,
  toolName: string
): ArgsResult<z.output<S>> {
  const result = schema.safeParse(args ?? {})
  if (result.success) {
    return { success: true, data: result.data }
  }

  const details = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
    .join('; ')
  return { success: false, message: `Invalid arguments for ${toolName}: ${details}` }
}
