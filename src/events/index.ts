export { EventAggregator, type EventAggregatorOptions } from "@/events/event-aggregator"
export { aggregateEvents, aggregateEventLines } from "@/events/aggregate-events"
export { readLines } from "@/events/lines"
export { openAIChatProtocol, anthropicMessagesProtocol, readPath, type EventProtocol, type PropertyPath } from "@/events/protocol"
