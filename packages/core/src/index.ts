export type { LogEntry, LogFileInfo, LogSource } from "./logger.js";
export {
  formatLogLine,
  isLogSource,
  LOG_SOURCES,
  listLogFiles,
  readLogFile,
  setupFileLogger,
} from "./logger.js";
