export { attemptParse, type ParseAttempt } from "@/extract/attempt"
export { extractNode, extractStructures, extractAll, extractFirst } from "@/extract/extractor"
export { findJson, findFencedBlock } from "@/extract/find-json"
