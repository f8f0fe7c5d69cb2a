import { buildItems } from "@/stream/build-items"
import type { ItemStreamOptions } from "@/stream/types"
import type { StreamItem } from "@/types"

/**
 * A complete response split into text and data, with helpers for the common questions
 */
export class ParsedResponse<T> {
  readonly items: readonly StreamItem<T>[]

  constructor(items: readonly StreamItem<T>[]) {
    this.items = items
  }

  static fromText<T>(text: string, options: ItemStreamOptions<T>): ParsedResponse<T> {
    return new ParsedResponse(buildItems(text, options))
  }

  /**
   * Every data value, in order
   */
  get data(): T[] {
    return this.items.flatMap((item) => (item.type === "data" ? [item.data] : []))
  }

  get first(): T | undefined {
    return this.data[0]
  }

  get hasData(): boolean {
    return this.items.some((item) => item.type === "data")
  }

  get dataCount(): number {
    return this.data.length
  }

  /**
   * Text and data spans joined back together. Tokens are skipped.
   */
  get text(): string {
    return this.items.map((item) => (item.type === "data" ? item.raw : item.type === "text" ? item.text : "")).join("")
  }
}
