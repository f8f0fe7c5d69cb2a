import type { StructureNode } from "@/scanner/types"

/**
 * Outcome of attempting typed extraction on one structure
 */
export type ExtractedItem<T> =
  | {
      kind: "parsed"
      value: T
      /** The structure the value was parsed from */
      node: StructureNode
    }
  | {
      kind: "unknown"
      /** Closed JSON structure that did not fit the schema */
      node: StructureNode
    }

/**
 * One entry of an item stream. Text and data items read in order reproduce the input.
 */
export type StreamItem<T> =
  | {
      /** Raw fragment for live display, not yet resolved into text or data */
      type: "token"
      text: string
    }
  | {
      type: "text"
      text: string
    }
  | {
      type: "data"
      data: T
      /** The exact span the data was parsed from */
      raw: string
    }

/**
 * Items produced by the event-protocol aggregator.
 * Text arrives in paragraph- or structure-delimited chunks instead of exact spans.
 */
export type AggregatedItem<T> =
  | {
      type: "token"
      text: string
    }
  | {
      type: "text-chunk"
      text: string
    }
  | {
      type: "data"
      data: T
      raw: string
    }

/**
 * Reason a stream stopped early
 * - `decode`: a chunk was not valid UTF-8
 * - `source`: the upstream byte or event source failed
 */
export type InterleavedErrorCode = "decode" | "source"

/**
 * Error that terminates an item stream.
 *
 * Items yielded before the error stay valid; a consumer should treat this as
 * "stream ended early".
 */
export class InterleavedError extends Error {
  /** The name of the error class */
  override name = "InterleavedError" as const

  /** The original error, if available */
  public override readonly cause: unknown

  public readonly code: InterleavedErrorCode

  constructor(options: { message: string; code: InterleavedErrorCode; cause?: unknown }) {
    super(`Stream terminated: ${options.message}`)
    this.cause = options.cause
    this.code = options.code

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InterleavedError)
    }
  }

  /**
   * Create an InterleavedError from an unknown error value
   */
  static from(err: unknown, code: InterleavedErrorCode): InterleavedError {
    if (err instanceof InterleavedError) {
      return err
    }

    if (err instanceof Error) {
      return new InterleavedError({ message: err.message, code, cause: err })
    }

    // Plain object errors (e.g. error events from an SSE source)
    if (typeof err === "object" && err !== null) {
      const message = "message" in err && typeof err.message === "string" ? err.message : JSON.stringify(err)
      return new InterleavedError({ message, code, cause: err })
    }

    return new InterleavedError({ message: String(err), code, cause: err })
  }
}
