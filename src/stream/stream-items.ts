import { ItemReconciler } from "@/stream/item-reconciler"
import type { ItemStreamOptions } from "@/stream/types"
import { InterleavedError, type StreamItem } from "@/types"
import { createDecoder, decodeChunk } from "@/utils/decode"

/**
 * Chunks of text or raw UTF-8 bytes, e.g. an HTTP response body
 */
export type TextSource = AsyncIterable<string | Uint8Array>

/**
 * Turn an asynchronous text or byte source into a lazy sequence of items.
 *
 * Bytes are decoded against the whole stream, so a character split across two chunks is fine.
 * Invalid UTF-8 ends the sequence with an `InterleavedError` of code `decode`; a failing source
 * ends it with code `source`. Items already yielded stay valid. Breaking out of the loop stops
 * reading from the source.
 *
 * @example
 * ```ts
 * for await (const item of streamItems(response.body, { schema: ToolCall })) {
 *   if (item.type === "data") runTool(item.data)
 *   else process.stdout.write(item.text)
 * }
 * ```
 */
export async function* streamItems<T>(source: TextSource, options: ItemStreamOptions<T>): AsyncGenerator<StreamItem<T>, void, undefined> {
  const reconciler = new ItemReconciler<T>(options)
  const decoder = createDecoder()

  try {
    for await (const chunk of source) {
      yield* reconciler.push(decodeChunk(decoder, chunk))
    }
    yield* reconciler.push(decodeChunk(decoder))
  } catch (error) {
    throw InterleavedError.from(error, "source")
  }

  yield* reconciler.finish()
}

export interface ItemTransformResult<T> {
  /** The TransformStream to pipe text or bytes through */
  stream: TransformStream<string | Uint8Array, StreamItem<T>>
  /** Promise resolving to every item once the input is finished. Stays pending if the readable side is cancelled. */
  items: Promise<StreamItem<T>[]>
  /** Promise resolving to the accumulated decoded text, settled like `items` */
  text: Promise<string>
}

/**
 * Creates a TransformStream that splits streamed text into items, for use with `pipeThrough()`,
 * along with promises for the full item list and the accumulated text.
 *
 * The promises resolve when the input ends and reject when it fails to decode. Cancelling the
 * readable side ends the transform without settling them.
 *
 * @example
 * ```ts
 * const { stream, items } = createItemTransform({ schema: ToolCall })
 *
 * const reader = response.body.pipeThrough(stream).getReader()
 * while (true) {
 *   const { done, value } = await reader.read()
 *   if (done) break
 *   console.log(value)
 * }
 *
 * // Or await everything at once
 * const all = await items
 * ```
 */
export function createItemTransform<T>(options: ItemStreamOptions<T>): ItemTransformResult<T> {
  const reconciler = new ItemReconciler<T>(options)
  const decoder = createDecoder()

  let resolveItems: (value: StreamItem<T>[]) => void
  let rejectItems: (error: unknown) => void
  const itemsPromise = new Promise<StreamItem<T>[]>((resolve, reject) => {
    resolveItems = resolve
    rejectItems = reject
  })

  let resolveText: (value: string) => void
  let rejectText: (error: unknown) => void
  const textPromise = new Promise<string>((resolve, reject) => {
    resolveText = resolve
    rejectText = reject
  })

  // Failures also error the stream, so awaiting these stays optional
  void itemsPromise.catch(() => undefined)
  void textPromise.catch(() => undefined)

  const emitted: StreamItem<T>[] = []
  let accumulatedText = ""

  const push = (controller: TransformStreamDefaultController<StreamItem<T>>, chunk?: string | Uint8Array): void => {
    let decoded: string
    try {
      decoded = decodeChunk(decoder, chunk)
    } catch (error) {
      rejectItems(error)
      rejectText(error)
      throw error
    }

    accumulatedText += decoded
    for (const item of reconciler.push(decoded)) {
      emitted.push(item)
      controller.enqueue(item)
    }
  }

  const stream = new TransformStream<string | Uint8Array, StreamItem<T>>({
    transform(chunk, controller) {
      push(controller, chunk)
    },

    flush(controller) {
      push(controller)
      for (const item of reconciler.finish()) {
        emitted.push(item)
        controller.enqueue(item)
      }

      resolveItems(emitted)
      resolveText(accumulatedText)
    },
  })

  return {
    stream,
    items: itemsPromise,
    text: textPromise,
  }
}
