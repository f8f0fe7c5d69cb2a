import type * as z from "zod"
import { extractNode } from "@/extract/extractor"
import type { StructureNode } from "@/scanner/types"
import type { StreamItem } from "@/types"
import type { Logger } from "@/utils/logger"

/**
 * Accumulated text that starts at absolute index `base`
 */
export interface TextWindow {
  text: string
  base: number
}

export interface ReconcileContext<T> {
  schema: z.ZodType<T>
  preserveWhitespace: boolean
  logger: Logger
}

const slice = (window: TextWindow, start: number, end?: number): string =>
  window.text.slice(start - window.base, end === undefined ? undefined : end - window.base)

/**
 * Append a gap as a text item unless it is empty (or whitespace only, when not preserving it)
 */
export function pushGap<T>(items: StreamItem<T>[], text: string, preserveWhitespace: boolean): void {
  if (preserveWhitespace ? text.length > 0 : text.trim().length > 0) {
    items.push({ type: "text", text })
  }
}

/**
 * Emit the items for one closed root structure, preceded by the text gap since `cursor`.
 *
 * Unmatched structures become text with their own span. When only part of the root matched,
 * the bytes around the matched pieces are emitted as text as well.
 *
 * @returns the new cursor, one past the root's closing bracket
 */
export function reconcileRoot<T>(
  window: TextWindow,
  cursor: number,
  root: StructureNode,
  context: ReconcileContext<T>,
  items: StreamItem<T>[],
): number {
  pushGap(items, slice(window, cursor, root.start), context.preserveWhitespace)
  cursor = root.start

  for (const item of extractNode(window.text, root, context.schema, window.base)) {
    pushGap(items, slice(window, cursor, item.node.start), context.preserveWhitespace)

    const raw = slice(window, item.node.start, item.node.end + 1)
    if (item.kind === "parsed") {
      items.push({ type: "data", data: item.value, raw })
    } else {
      context.logger.debug("Structure did not match schema, keeping it as text", { start: item.node.start, end: item.node.end })
      items.push({ type: "text", text: raw })
    }

    cursor = item.node.end + 1
  }

  pushGap(items, slice(window, cursor, root.end + 1), context.preserveWhitespace)
  return root.end + 1
}

/**
 * Text from the cursor to the end of the window
 */
export const tail = (window: TextWindow, cursor: number): string => slice(window, cursor)
