import { createDecoder, decodeChunk } from "@/utils/decode"

/**
 * Split a chunked text or byte source into lines, accepting `\n` and `\r\n` terminators.
 * A final line without a terminator is still yielded.
 */
export async function* readLines(source: AsyncIterable<string | Uint8Array>): AsyncGenerator<string, void, undefined> {
  const decoder = createDecoder()
  let pending = ""

  for await (const chunk of source) {
    pending += decodeChunk(decoder, chunk)

    let index = pending.indexOf("\n")
    while (index !== -1) {
      yield stripCarriageReturn(pending.slice(0, index))
      pending = pending.slice(index + 1)
      index = pending.indexOf("\n")
    }
  }

  pending += decodeChunk(decoder)
  if (pending.length > 0) {
    yield stripCarriageReturn(pending)
  }
}

const stripCarriageReturn = (line: string): string => (line.endsWith("\r") ? line.slice(0, -1) : line)
