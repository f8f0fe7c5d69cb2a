export { createLogger, resolveLogger, type Logger, type LoggingOptions } from "@/utils/logger"
export { createDecoder, decodeChunk } from "@/utils/decode"
