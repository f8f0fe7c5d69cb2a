/**
 * Property path into a JSON envelope, e.g. `["choices", 0, "delta", "content"]`
 */
export type PropertyPath = readonly (string | number)[]

/**
 * Shape of a line-delimited delta-token event stream
 */
export interface EventProtocol {
  /** Prefix of the line carrying the event payload. A trailing space in it is optional on the wire. */
  dataPrefix: string
  /** Payload that ends the stream instead of a JSON envelope. Omit when the protocol has none. */
  doneSentinel?: string
  /** Where the incremental token text lives in the envelope */
  tokenPath: PropertyPath
  /** Where a natural completion reason lives. Any string value there flushes buffered text. */
  finishPath?: PropertyPath
}

/**
 * Chat completions streaming (OpenAI, DeepSeek, Azure and compatible servers)
 */
export const openAIChatProtocol: EventProtocol = {
  dataPrefix: "data: ",
  doneSentinel: "[DONE]",
  tokenPath: ["choices", 0, "delta", "content"],
  finishPath: ["choices", 0, "finish_reason"],
}

/**
 * Messages streaming (`content_block_delta` / `message_delta` events)
 */
export const anthropicMessagesProtocol: EventProtocol = {
  dataPrefix: "data: ",
  tokenPath: ["delta", "text"],
  finishPath: ["delta", "stop_reason"],
}

/**
 * Follow a property path through parsed JSON, returning undefined when any step is missing
 */
export function readPath(value: unknown, path: PropertyPath): unknown {
  let current: unknown = value

  for (const key of path) {
    if (typeof key === "number") {
      if (!Array.isArray(current)) return undefined
      current = current[key]
    } else {
      if (typeof current !== "object" || current === null || !(key in current)) return undefined
      current = Reflect.get(current, key)
    }
  }

  return current
}
