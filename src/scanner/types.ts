/**
 * Which bracket pair opened a structure
 */
export type StructureKind = "object" | "array"

/**
 * A matched `{...}` or `[...]` span.
 *
 * `start` and `end` are indices into the accumulated text; `end` is the index of the
 * closing bracket (inclusive). Children are the structures nested directly inside,
 * in order of their opening bracket.
 */
export interface StructureNode {
  readonly kind: StructureKind
  readonly start: number
  readonly end: number
  readonly children: readonly StructureNode[]
}

/**
 * A structure that has been opened but not yet closed
 */
export interface ScanFrame {
  kind: StructureKind
  start: number
  children: StructureNode[]
}

/**
 * Slice the text covered by a node. `base` is the absolute index of `text[0]`.
 */
export const sliceNode = (text: string, node: StructureNode, base: number = 0): string =>
  text.slice(node.start - base, node.end + 1 - base)
