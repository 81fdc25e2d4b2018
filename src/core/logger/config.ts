/**
 * Logger settings and the parsers that read them from text (env vars, flags).
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  /** Extra JSON log file alongside the primary output */
  file?: string;
  /** Added to every line as `source` */
  source?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "pretty"];

// Names other logging stacks use for the same levels
const LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  warning: "warn",
  critical: "fatal",
  err: "error",
};

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = { level: "info", format: "pretty" };

export function resolveLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return {
    level: config.level ?? DEFAULT_LOGGER_CONFIG.level,
    format: config.format ?? DEFAULT_LOGGER_CONFIG.format,
    file: config.file,
    source: config.source,
  };
}

export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(l => l === level);
}

/**
 * Case-insensitive; unknown names fall back to the default with a warning.
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return DEFAULT_LOGGER_CONFIG.level;
  const lowered = level.trim().toLowerCase();
  const resolved = LEVEL_ALIASES[lowered] ?? lowered;
  if (isValidLogLevel(resolved)) return resolved;
  console.warn(`Invalid log level "${level}", using default "${DEFAULT_LOGGER_CONFIG.level}"`);
  return DEFAULT_LOGGER_CONFIG.level;
}

export function parseLogFormat(format: string | undefined): LogFormat {
  if (!format) return DEFAULT_LOGGER_CONFIG.format;
  const match = LOG_FORMATS.find(f => f === format.trim().toLowerCase());
  if (match) return match;
  console.warn(`Invalid log format "${format}", using default "${DEFAULT_LOGGER_CONFIG.format}"`);
  return DEFAULT_LOGGER_CONFIG.format;
}
