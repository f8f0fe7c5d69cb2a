import type * as z from "zod"
import type { LoggingOptions } from "@/utils/logger"

export interface ItemStreamOptions<T> extends LoggingOptions {
  /** Schema every data item must satisfy */
  schema: z.ZodType<T>
  /**
   * Emit whitespace-only gaps between structures as text items too. With this set, joining the
   * text of every item (the `raw` span for data) reproduces the input exactly.
   * Defaults to false.
   */
  preserveWhitespace?: boolean
}
