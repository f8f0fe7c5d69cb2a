/**
 * interleaved/events
 *
 * Aggregator for line-delimited delta-token event streams (server-sent events from chat APIs).
 *
 * @example
 * ```ts
 * import { z, aggregateEvents, anthropicMessagesProtocol } from 'interleaved/events'
 *
 * for await (const item of aggregateEvents(body, { schema, protocol: anthropicMessagesProtocol })) {
 *   if (item.type === 'token') process.stdout.write(item.text)
 * }
 * ```
 */

export * from "@/events"

export { z } from "zod"
