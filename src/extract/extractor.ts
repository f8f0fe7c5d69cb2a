import * as z from "zod"
import { attemptParse } from "@/extract/attempt"
import { findStructures } from "@/scanner/structure-scanner"
import { sliceNode, type StructureNode } from "@/scanner/types"
import type { ExtractedItem } from "@/types"
import type { LoggingOptions } from "@/utils/logger"

/**
 * Extract typed values from one structure, parent first.
 *
 * The whole span is tried first; if it fits the schema a single parsed item is returned and the
 * children are not examined. Otherwise each child is tried the same way. When nothing inside the
 * node matched, the node itself comes back as one `unknown` item, so a structure never vanishes.
 *
 * @param text - Text containing the node, starting at absolute index `base`
 */
export function extractNode<T>(text: string, node: StructureNode, schema: z.ZodType<T>, base: number = 0): ExtractedItem<T>[] {
  const attempt = attemptParse(sliceNode(text, node, base), schema)
  if (attempt.success) {
    return [{ kind: "parsed", value: attempt.data, node }]
  }

  const items = node.children.flatMap((child) => extractNode(text, child, schema, base))
  if (!items.some((item) => item.kind === "parsed")) {
    return [{ kind: "unknown", node }]
  }

  return items
}

/**
 * Scan a complete text and extract every root structure in order
 */
export function extractStructures<T>(text: string, schema: z.ZodType<T>, options: LoggingOptions = {}): ExtractedItem<T>[] {
  return findStructures(text, options).flatMap((node) => extractNode(text, node, schema))
}

/**
 * Collect every instance of the schema's type from a text.
 *
 * If the whole text is a JSON array of `T` it is returned as-is. Otherwise each structure is
 * tried as an array of `T`, then as a single `T`, before descending into its children.
 *
 * @example
 * ```ts
 * const Item = z.object({ x: z.number() })
 *
 * extractAll('noise [{"x":7},{"x":8}] more {"x":9}', Item)
 * // [{ x: 7 }, { x: 8 }, { x: 9 }]
 * ```
 */
export function extractAll<T>(text: string, schema: z.ZodType<T>, options: LoggingOptions = {}): T[] {
  const list: z.ZodType<T[]> = z.array(schema)

  const whole = attemptParse(text, list)
  if (whole.success) {
    return whole.data
  }

  return findStructures(text, options).flatMap((node) => collectNode(text, node, schema, list))
}

/**
 * First instance of the schema's type in the text, if any
 */
export function extractFirst<T>(text: string, schema: z.ZodType<T>, options: LoggingOptions = {}): T | undefined {
  return extractAll(text, schema, options)[0]
}

function collectNode<T>(text: string, node: StructureNode, schema: z.ZodType<T>, list: z.ZodType<T[]>): T[] {
  const span = sliceNode(text, node)

  const many = attemptParse(span, list)
  if (many.success) return many.data

  const one = attemptParse(span, schema)
  if (one.success) return [one.data]

  return node.children.flatMap((child) => collectNode(text, child, schema, list))
}
