/**
 * interleaved
 *
 * Pulls typed JSON values out of free-form, incrementally produced text (LLM output) while keeping
 * every piece of surrounding commentary in order. Values are described with Zod schemas.
 *
 * @example
 * ```ts
 * import { z, buildItems, streamItems } from 'interleaved'
 *
 * const ToolCall = z.object({ name: z.string(), args: z.record(z.string(), z.unknown()) })
 *
 * // Whole text
 * buildItems('Searching now {"name":"search","args":{"q":"zod"}} then done', { schema: ToolCall })
 * // [text "Searching now ", data { name: "search", ... }, text " then done"]
 *
 * // Streamed text or bytes
 * for await (const item of streamItems(response.body, { schema: ToolCall })) {
 *   if (item.type === 'data') await runTool(item.data)
 * }
 * ```
 */

export { z } from "zod"

// Structural scanning
export * from "./scanner"

// Typed extraction
export * from "./extract"

// Text/data item streams
export * from "./stream"

// Delta-token event streams
export * from "./events"

// Shared types and errors
export { InterleavedError, type InterleavedErrorCode, type StreamItem, type AggregatedItem, type ExtractedItem } from "./types"

// Utilities
export { createLogger, type Logger, type LoggingOptions } from "./utils"
