export { buildItems } from "@/stream/build-items"
export { ItemReconciler } from "@/stream/item-reconciler"
export { streamItems, createItemTransform, type ItemTransformResult, type TextSource } from "@/stream/stream-items"
export { ParsedResponse } from "@/stream/parsed-response"
export type { ItemStreamOptions } from "@/stream/types"
