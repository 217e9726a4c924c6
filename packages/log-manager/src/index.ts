export {
  AnsiConsoleSink,
  type AnsiConsoleSinkOptions,
  type ConsoleStream,
} from "./adapters/console/ansi-console-sink"
export { type ConsoleStyle, SEVERITY_STYLES, styleFor } from "./adapters/console/styles"
export { CsvRecordWriter } from "./adapters/csv/csv-record-writer"
export { CSV_HEADER, escapeCsvField } from "./adapters/csv/csv-row"
export {
  type JsonLogLine,
  JsonLinesRecordWriter,
  type JsonLinesRecordWriterOptions,
} from "./adapters/json/json-lines-record-writer"
export { ConfigurationError, SerializationError, WriteError } from "./core/errors"
export {
  DEFAULT_LOG_DIRECTORY,
  DEFAULT_LOG_FORMAT,
  DEFAULT_LOGGER_NAME,
  LogManager,
  type LogManagerDeps,
  type LogManagerOptions,
} from "./core/log-manager"
export {
  DEFAULT_PERSISTENCE_POLICY,
  type PersistencePolicy,
  shouldPersist,
} from "./core/persistence-policy"
export {
  type CreateLogManagerOptions,
  createLogManager,
  type LoadLogSettingsOptions,
  type LogSettings,
  loadLogSettings,
} from "./core/settings"
export type { ConsoleEntry, ConsoleSink } from "./ports/console-sink"
export {
  isLogFormat,
  type LogCallOptions,
  type LogFormat,
  type LogRecord,
  logFormats,
} from "./ports/log-record"
export type { RecordWriter } from "./ports/record-writer"
export { compareSeverity, isSeverity, type Severity, SeverityRank, severityNames } from "./ports/severity"
