import { findStructures } from "@/scanner/structure-scanner"
import { sliceNode } from "@/scanner/types"
import type { LoggingOptions } from "@/utils/logger"

/** Fenced blocks, most specific first */
const FENCE_PATTERNS = [/```json\s*\n([\s\S]*?)\n\s*```/, /```json([\s\S]*?)```/, /```\s*\n([\s\S]*?)\n\s*```/, /```([\s\S]*?)```/] as const

/**
 * Body of the first fenced code block, preferring blocks tagged `json`
 */
export function findFencedBlock(text: string): string | undefined {
  for (const pattern of FENCE_PATTERNS) {
    const body = pattern.exec(text)?.[1]
    if (body !== undefined) {
      return body.trim()
    }
  }
  return undefined
}

/**
 * Locate the JSON payload in a model response.
 *
 * Fenced code blocks win; otherwise the first root structure that is valid JSON is returned.
 * Unlike the extractors this does not look at the shape of the value.
 */
export function findJson(text: string, options: LoggingOptions = {}): string | undefined {
  const fenced = findFencedBlock(text)
  if (fenced !== undefined) {
    return fenced
  }

  for (const node of findStructures(text, options)) {
    const span = sliceNode(text, node)
    if (isJson(span)) {
      return span
    }
  }

  return undefined
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text)
    return true
  } catch {
    return false
  }
}
