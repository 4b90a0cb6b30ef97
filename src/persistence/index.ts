export { FileReportSink } from "./file-report-sink.js";
export type { CorruptLine, FileReportSinkConfig, RestoreResult } from "./file-report-sink.js";
export { LogNotifier } from "./log-notifier.js";
export { MemoryReportSink } from "./memory-report-sink.js";
export type { MemoryReportSinkConfig } from "./memory-report-sink.js";
export { MemorySignalStore } from "./memory-signal-store.js";
export type { MemorySignalStoreConfig } from "./memory-signal-store.js";
