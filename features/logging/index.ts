export {
  ConsoleLogSink,
  MemoryLogSink,
  scopedLog,
  formatEntry,
  formatTime,
  isLogLevel,
} from "./log-sink";

export type { LogSink, Logger, LogLevel, LogEntry } from "./log-sink";
