import { EventAggregator, type EventAggregatorOptions } from "@/events/event-aggregator"
import { readLines } from "@/events/lines"
import { InterleavedError, type AggregatedItem } from "@/types"

/**
 * Aggregate an event stream that is already split into lines.
 *
 * Stops after the terminal sentinel; otherwise flushes buffered text when the lines run out.
 */
export async function* aggregateEventLines<T>(
  lines: AsyncIterable<string> | Iterable<string>,
  options: EventAggregatorOptions<T>,
): AsyncGenerator<AggregatedItem<T>, void, undefined> {
  const aggregator = new EventAggregator<T>(options)

  try {
    for await (const line of lines) {
      yield* aggregator.pushLine(line)
      if (aggregator.done) return
    }
  } catch (error) {
    throw InterleavedError.from(error, "source")
  }

  yield* aggregator.finish()
}

/**
 * Aggregate a chunked event stream, e.g. the body of a streaming chat completion response.
 *
 * @example
 * ```ts
 * const items = aggregateEvents(response.body, { schema: ToolCall, protocol: openAIChatProtocol })
 *
 * for await (const item of items) {
 *   if (item.type === "token") process.stdout.write(item.text)
 *   if (item.type === "data") await runTool(item.data)
 * }
 * ```
 */
export function aggregateEvents<T>(
  source: AsyncIterable<string | Uint8Array>,
  options: EventAggregatorOptions<T>,
): AsyncGenerator<AggregatedItem<T>, void, undefined> {
  return aggregateEventLines(readLines(source), options)
}
