import type * as z from "zod"
import { openAIChatProtocol, readPath, type EventProtocol } from "@/events/protocol"
import { extractNode } from "@/extract/extractor"
import { StructureScanner } from "@/scanner/structure-scanner"
import { sliceNode } from "@/scanner/types"
import type { AggregatedItem } from "@/types"
import { resolveLogger, type Logger, type LoggingOptions } from "@/utils/logger"

export interface EventAggregatorOptions<T> extends LoggingOptions {
  /** Schema every data item must satisfy */
  schema: z.ZodType<T>
  /** Wire format of the event stream. Defaults to `openAIChatProtocol`. */
  protocol?: EventProtocol
}

const PARAGRAPH_BREAK = "\n\n"

/**
 * Decodes a delta-token event stream into tokens, text chunks and typed data.
 *
 * Every token is emitted immediately as a `token` item. The token text is accumulated, and
 * whenever a structure in the accumulation fits the schema the text before it is flushed as a
 * `text-chunk`, followed by the `data` item. Buffered text is also flushed at paragraph breaks
 * (outside open structures), when an event carries a finish reason, and at end of stream.
 *
 * @example
 * ```ts
 * const aggregator = new EventAggregator({ schema: ToolCall })
 *
 * for (const line of lines) {
 *   for (const item of aggregator.pushLine(line)) render(item)
 *   if (aggregator.done) break
 * }
 * for (const item of aggregator.finish()) render(item)
 * ```
 */
export class EventAggregator<T> {
  #schema: z.ZodType<T>
  #protocol: EventProtocol
  #logger: Logger
  #dataLines: string[] = []
  #buffer: string = ""
  #done: boolean = false

  constructor(options: EventAggregatorOptions<T>) {
    this.#schema = options.schema
    this.#protocol = options.protocol ?? openAIChatProtocol
    this.#logger = resolveLogger(options)
  }

  /**
   * True once the terminal sentinel was seen or `finish()` was called
   */
  get done(): boolean {
    return this.#done
  }

  /**
   * Token text not yet resolved into text chunks or data
   */
  get buffered(): string {
    return this.#buffer
  }

  /**
   * Process one line of the event stream (without its line terminator)
   */
  pushLine(line: string): AggregatedItem<T>[] {
    if (this.#done) return []

    if (line.length === 0) {
      return this.#dispatch()
    }

    const field = this.#protocol.dataPrefix.trimEnd()
    if (line.startsWith(field)) {
      const value = line.slice(field.length)
      this.#dataLines.push(value.startsWith(" ") ? value.slice(1) : value)
    }
    // Other fields (event:, id:, comments) carry nothing we need

    return []
  }

  /**
   * Signal end of input: dispatches an event left without its blank line and flushes the buffer
   */
  finish(): AggregatedItem<T>[] {
    if (this.#done) return []

    const items = this.#dispatch()
    if (!this.#done) {
      this.#flush(items)
      this.#done = true
    }
    return items
  }

  #dispatch(): AggregatedItem<T>[] {
    if (this.#dataLines.length === 0) return []

    const payload = this.#dataLines.join("\n")
    this.#dataLines = []
    const items: AggregatedItem<T>[] = []

    if (this.#protocol.doneSentinel !== undefined && payload.trim() === this.#protocol.doneSentinel) {
      this.#flush(items)
      this.#done = true
      return items
    }

    let envelope: unknown
    try {
      envelope = JSON.parse(payload)
    } catch (error) {
      this.#logger.debug("Skipping event payload that is not JSON", { payload, error })
      return items
    }

    const token = readPath(envelope, this.#protocol.tokenPath)
    if (typeof token === "string" && token.length > 0) {
      items.push({ type: "token", text: token })
      this.#buffer += token

      const openStart = this.#drainStructures(items)
      this.#drainParagraphs(items, openStart)
    }

    if (this.#protocol.finishPath && typeof readPath(envelope, this.#protocol.finishPath) === "string") {
      this.#flush(items)
    }

    return items
  }

  /**
   * Emit every structure in the buffer that fits the schema, with the text before it.
   * Returns where the outermost still-open structure starts in the drained buffer.
   */
  #drainStructures(items: AggregatedItem<T>[]): number | undefined {
    const buffer = this.#buffer
    const scanner = new StructureScanner({ logger: this.#logger })
    let consumed = 0

    for (const root of scanner.feed(buffer)) {
      for (const item of extractNode(buffer, root, this.#schema)) {
        if (item.kind !== "parsed") continue

        this.#pushChunk(items, buffer.slice(consumed, item.node.start))
        items.push({ type: "data", data: item.value, raw: sliceNode(buffer, item.node) })
        consumed = item.node.end + 1
      }
    }

    this.#buffer = buffer.slice(consumed)

    const openStart = scanner.openStart
    return openStart === undefined ? undefined : openStart - consumed
  }

  #drainParagraphs(items: AggregatedItem<T>[], openStart: number | undefined): void {
    let limit = openStart
    let index = this.#buffer.indexOf(PARAGRAPH_BREAK)

    while (index !== -1 && (limit === undefined || index + PARAGRAPH_BREAK.length <= limit)) {
      this.#pushChunk(items, this.#buffer.slice(0, index))

      const drained = index + PARAGRAPH_BREAK.length
      this.#buffer = this.#buffer.slice(drained)
      if (limit !== undefined) limit -= drained

      index = this.#buffer.indexOf(PARAGRAPH_BREAK)
    }
  }

  #flush(items: AggregatedItem<T>[]): void {
    this.#pushChunk(items, this.#buffer)
    this.#buffer = ""
  }

  #pushChunk(items: AggregatedItem<T>[], text: string): void {
    const chunk = text.trim()
    if (chunk.length > 0) {
      this.#logger.debug("Flushing text chunk", { length: chunk.length })
      items.push({ type: "text-chunk", text: chunk })
    }
  }
}
