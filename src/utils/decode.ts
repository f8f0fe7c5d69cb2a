import { InterleavedError } from "@/types"

/**
 * Creates a UTF-8 decoder that rejects malformed input instead of inserting replacement characters.
 */
export const createDecoder = (): TextDecoder => new TextDecoder("utf-8", { fatal: true })

/**
 * Decodes one chunk against the running decoder state, so a multi-byte sequence split
 * across two chunks comes out whole. Call without a chunk at end of input to flush.
 *
 * A string chunk ends any pending byte sequence first, so a character cut off by it is an error.
 */
export function decodeChunk(decoder: TextDecoder, chunk?: string | Uint8Array): string {
  try {
    if (typeof chunk === "string") return decoder.decode() + chunk
    return chunk ? decoder.decode(chunk, { stream: true }) : decoder.decode()
  } catch (error) {
    throw new InterleavedError({ message: "input is not valid UTF-8", code: "decode", cause: error })
  }
}
