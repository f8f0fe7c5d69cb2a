import type * as z from "zod"

/**
 * Result of trying to read a text span as a schema's type
 */
export type ParseAttempt<T> = { success: true; data: T } | { success: false; error: unknown }

/**
 * Parse a span as JSON and validate it against the schema. Never throws.
 */
export function attemptParse<T>(text: string, schema: z.ZodType<T>): ParseAttempt<T> {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    return { success: false, error }
  }

  const result = schema.safeParse(json)
  return result.success ? { success: true, data: result.data } : { success: false, error: result.error }
}
