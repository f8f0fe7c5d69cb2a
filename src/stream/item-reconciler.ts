import { StructureScanner } from "@/scanner/structure-scanner"
import { pushGap, reconcileRoot, tail, type ReconcileContext } from "@/stream/reconcile"
import type { ItemStreamOptions } from "@/stream/types"
import type { StreamItem } from "@/types"
import { resolveLogger } from "@/utils/logger"

/**
 * Incremental text/data splitter.
 *
 * Feed decoded text as it arrives; items come out as soon as the structure they belong to closes.
 * Only text from the last emitted position onward is retained, so memory stays bounded by the
 * largest open structure plus any pending plain text.
 *
 * @example
 * ```ts
 * const reconciler = new ItemReconciler({ schema: ToolCall })
 *
 * reconciler.push('Let me search {"name": "sea') // [] (structure still open)
 * reconciler.push('rch"} done')                  // [text "Let me search ", data {...}]
 * reconciler.finish()                            // [text " done"]
 * ```
 */
export class ItemReconciler<T> {
  #context: ReconcileContext<T>
  #scanner: StructureScanner
  #buffer: string = ""
  #base: number = 0
  #finished: boolean = false

  constructor(options: ItemStreamOptions<T>) {
    this.#context = {
      schema: options.schema,
      preserveWhitespace: options.preserveWhitespace ?? false,
      logger: resolveLogger(options),
    }
    this.#scanner = new StructureScanner({ logger: this.#context.logger })
  }

  /**
   * Number of characters held back waiting for a structure to close or the input to end
   */
  get pending(): number {
    return this.#buffer.length
  }

  push(text: string): StreamItem<T>[] {
    if (this.#finished) {
      throw new Error("ItemReconciler.push called after finish()")
    }
    if (text.length === 0) return []

    this.#buffer += text
    const items: StreamItem<T>[] = []
    let cursor = this.#base

    for (const root of this.#scanner.feed(text)) {
      cursor = reconcileRoot({ text: this.#buffer, base: this.#base }, cursor, root, this.#context, items)
    }

    // Drop everything already emitted
    this.#buffer = this.#buffer.slice(cursor - this.#base)
    this.#base = cursor

    return items
  }

  /**
   * Signal end of input and emit the remaining text. Structures still open are emitted as text.
   */
  finish(): StreamItem<T>[] {
    if (this.#finished) return []
    this.#finished = true

    const items: StreamItem<T>[] = []
    pushGap(items, tail({ text: this.#buffer, base: this.#base }, this.#base), this.#context.preserveWhitespace)

    if (this.#scanner.depth > 0) {
      this.#context.logger.warn("Input ended inside an unterminated structure", { start: this.#scanner.openStart })
    }

    this.#buffer = ""
    this.#base = this.#scanner.offset
    return items
  }
}
