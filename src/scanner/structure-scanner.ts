import type { ScanFrame, StructureKind, StructureNode } from "@/scanner/types"
import { resolveLogger, type Logger, type LoggingOptions } from "@/utils/logger"

const OPENERS: Record<string, StructureKind> = {
  "{": "object",
  "[": "array",
}

/**
 * Single-pass bracket scanner that finds top-level JSON objects and arrays inside free text.
 *
 * Brackets inside `"..."` string literals are ignored, including escaped quotes. The scanner
 * keeps its state between calls to `feed`, so a structure may open in one chunk and close any
 * number of chunks later. Coordinates are absolute: the first character of the first chunk is 0.
 *
 * A closer always pops whatever frame is on top, so `{]` closes an object. Structures that never
 * close are never reported.
 *
 * @example
 * ```ts
 * const scanner = new StructureScanner()
 *
 * scanner.feed('Lead {"x": ')    // []
 * scanner.feed('{"y": [1,2,3]}') // [] (nested, the outer object is still open)
 * scanner.feed(', "z": 3}')      // [{ kind: "object", start: 5, end: 33, children: [...] }]
 * ```
 */
export class StructureScanner {
  #stack: ScanFrame[] = []
  #inString: boolean = false
  #escaped: boolean = false
  #offset: number = 0
  #logger: Logger

  constructor(options: LoggingOptions = {}) {
    this.#logger = resolveLogger(options)
  }

  /**
   * Index of the next unseen character
   */
  get offset(): number {
    return this.#offset
  }

  /**
   * Number of structures currently open
   */
  get depth(): number {
    return this.#stack.length
  }

  /**
   * Start of the outermost structure that is still open, if any
   */
  get openStart(): number | undefined {
    return this.#stack[0]?.start
  }

  /**
   * Scan the next chunk and return the root structures that closed within it
   */
  feed(chunk: string): StructureNode[] {
    const roots: StructureNode[] = []

    for (let i = 0; i < chunk.length; i++) {
      const char = chunk.charAt(i)

      if (this.#inString) {
        if (this.#escaped) {
          this.#escaped = false
        } else if (char === "\\") {
          this.#escaped = true
        } else if (char === '"') {
          this.#inString = false
        }
        continue
      }

      if (char === '"') {
        this.#inString = true
        continue
      }

      const kind = OPENERS[char]
      if (kind) {
        this.#stack.push({ kind, start: this.#offset + i, children: [] })
        continue
      }

      if (char === "}" || char === "]") {
        const frame = this.#stack.pop()
        if (!frame) {
          this.#logger.debug("Ignoring closing bracket outside any structure", { index: this.#offset + i, char })
          continue
        }

        const node: StructureNode = { kind: frame.kind, start: frame.start, end: this.#offset + i, children: frame.children }
        const parent = this.#stack[this.#stack.length - 1]

        if (parent) {
          parent.children.push(node)
        } else {
          roots.push(node)
        }
      }
    }

    this.#offset += chunk.length
    return roots
  }
}

/**
 * Find every root structure in a complete text
 */
export function findStructures(text: string, options: LoggingOptions = {}): StructureNode[] {
  return new StructureScanner(options).feed(text)
}
