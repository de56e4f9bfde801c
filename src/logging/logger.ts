/**
 * Governance Logging Subsystem
 *
 * Structured, level-filtered logging with pluggable transports and
 * redaction of bearer tokens and client secrets.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type GovernanceLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly GovernanceLogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type GovernanceLogEntry = {
  timestamp: Date;
  level: GovernanceLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
};

export type LogFormatter = (entry: GovernanceLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: GovernanceLogEntry): void;
}

export interface GovernanceLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): GovernanceLogger;
  setLevel(level: GovernanceLogLevel): void;
  getLevel(): GovernanceLogLevel;
  isLevelEnabled(level: GovernanceLogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<GovernanceLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: GovernanceLogLevel, minLevel: GovernanceLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is GovernanceLogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/** Patterns always redacted: bearer tokens and `client_secret=` pairs. */
export const DEFAULT_REDACT_PATTERNS = ["Bearer\\s+[A-Za-z0-9\\-._~+/]+=*", "client_secret=[^&\\s]+"];

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<GovernanceLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stdout.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: GovernanceLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: GovernanceLogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: GovernanceLogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
  }

  write(entry: GovernanceLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/** Keeps entries in memory; used by hosts that render logs themselves and by tests. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: GovernanceLogEntry[] = [];

  write(entry: GovernanceLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: GovernanceLogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class GovernanceLoggerImpl implements GovernanceLogger {
  readonly subsystem: string;
  private readonly level: { current: GovernanceLogLevel };
  private transports: LogTransport[];
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: GovernanceLogLevel;
    transports?: LogTransport[];
    redactPatterns?: string[];
    /** Level cell shared with the parent; takes precedence over `level`. */
    sharedLevel?: { current: GovernanceLogLevel };
  }) {
    this.subsystem = options.subsystem;
    this.level = options.sharedLevel ?? { current: options.level ?? "info" };
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.redactPatterns = (options.redactPatterns ?? DEFAULT_REDACT_PATTERNS).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): GovernanceLogger {
    return new GovernanceLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      sharedLevel: this.level,
      transports: this.transports,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  /** Applies to this logger, its parent chain and every child. */
  setLevel(level: GovernanceLogLevel): void {
    this.level.current = level;
  }

  getLevel(): GovernanceLogLevel {
    return this.level.current;
  }

  isLevelEnabled(level: GovernanceLogLevel): boolean {
    return shouldLog(level, this.level.current);
  }

  private log(level: GovernanceLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level.current)) return;

    const entry: GovernanceLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        // A broken transport must not break the caller; report it once on stderr.
        console.error(`[${this.subsystem}] log transport "${transport.name}" failed: ${String(err)}`);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        result[key] = this.redactObject(Object.fromEntries(Object.entries(value)));
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createGovernanceLogger(
  subsystem: string,
  options?: { level?: GovernanceLogLevel; transports?: LogTransport[]; redactPatterns?: string[] },
): GovernanceLogger {
  return new GovernanceLoggerImpl({
    subsystem: `governance/${subsystem}`,
    level: options?.level ?? "info",
    transports: options?.transports,
    redactPatterns: options?.redactPatterns
      ? [...DEFAULT_REDACT_PATTERNS, ...options.redactPatterns]
      : DEFAULT_REDACT_PATTERNS,
  });
}

/** Logger that drops everything; the default for components built without one. */
export function createSilentLogger(subsystem = "silent"): GovernanceLogger {
  return new GovernanceLoggerImpl({ subsystem, level: "fatal", transports: [] });
}
