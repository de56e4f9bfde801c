export {
  createGovernanceLogger,
  createSilentLogger,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  GovernanceLoggerImpl,
  shouldLog,
  isLogLevel,
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
} from "./logger.js";
export type { GovernanceLogger, GovernanceLogLevel, GovernanceLogEntry, LogTransport, LogFormatter } from "./logger.js";
