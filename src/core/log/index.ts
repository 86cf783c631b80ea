// src/core/log/index.ts
export {
  type LogLevel,
  type LogFn,
  type LogSink,
  type RuntimeLogger,
  LOG_LEVELS,
  silentLogger,
  isLogLevel,
  createLogger,
} from "./logger";
export {
  type RuntimeEvent,
  type RuntimeEventTag,
  type EventHook,
  type EventLedger,
  createEventLedger,
  summarizeEvents,
  eventsOfTag,
} from "./events";
