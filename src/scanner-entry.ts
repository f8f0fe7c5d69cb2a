/**
 * interleaved/scanner
 *
 * Bracket-aware structure scanner without Zod or any extraction logic.
 * Use this entry point when you only need the coordinates of JSON objects and arrays in text.
 *
 * @example
 * ```ts
 * import { StructureScanner, sliceNode } from 'interleaved/scanner'
 *
 * const scanner = new StructureScanner()
 * let text = ''
 *
 * for await (const chunk of chunks) {
 *   text += chunk
 *   for (const node of scanner.feed(chunk)) console.log(sliceNode(text, node))
 * }
 * ```
 */

export * from "@/scanner"
