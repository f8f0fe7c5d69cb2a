import { findStructures } from "@/scanner/structure-scanner"
import { pushGap, reconcileRoot, tail, type TextWindow } from "@/stream/reconcile"
import type { ItemStreamOptions } from "@/stream/types"
import type { StreamItem } from "@/types"
import { resolveLogger } from "@/utils/logger"

/**
 * Split a complete text into ordered text and data items.
 *
 * @example
 * ```ts
 * buildItems('noise {"name":"x"} {"other":1}', { schema: z.object({ name: z.string() }) })
 * // [
 * //   { type: "text", text: "noise " },
 * //   { type: "data", data: { name: "x" }, raw: '{"name":"x"}' },
 * //   { type: "text", text: '{"other":1}' },
 * // ]
 * ```
 */
export function buildItems<T>(text: string, options: ItemStreamOptions<T>): StreamItem<T>[] {
  const context = {
    schema: options.schema,
    preserveWhitespace: options.preserveWhitespace ?? false,
    logger: resolveLogger(options),
  }
  const window: TextWindow = { text, base: 0 }
  const items: StreamItem<T>[] = []

  let cursor = 0
  for (const root of findStructures(text, context)) {
    cursor = reconcileRoot(window, cursor, root, context, items)
  }

  pushGap(items, tail(window, cursor), context.preserveWhitespace)
  return items
}
