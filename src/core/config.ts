/**
 * Service configuration
 *
 * Layering, lowest to highest precedence:
 *   defaults ← toolgate.config.json ← TOOLGATE_* environment ← overrides (CLI flags)
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { LogFormat, LogLevel, isValidLogLevel, parseLogFormat, parseLogLevel } from "./logger/config";
import { MAX_TIMER_MS, parseDurationMs } from "./utils/duration";

export const CONFIG_FILE_NAME = "toolgate.config.json";

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  /** Extra JSON log file; omit for stdout only. */
  file?: string;
}

export interface RateLimitConfig {
  enabled: boolean;
  requests: number;
  windowMs: number;
}

export interface ToolPolicyConfig {
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

export interface CacheConfig {
  enabled: boolean;
  ttlMs: number;
  maxSize: number;
}

export interface ToolgateConfig {
  host: string;
  port: number;
  debug: boolean;
  logging: LoggingConfig;
  /** "*" allows any origin. */
  allowedOrigins: string[];
  rateLimit: RateLimitConfig;
  tools: ToolPolicyConfig;
  cache: CacheConfig;
  /** Root directory for file_operations. */
  workspaceRoot: string;
}

export interface ConfigOverrides {
  host?: string;
  port?: number;
  debug?: boolean;
  logging?: Partial<LoggingConfig>;
  allowedOrigins?: string[];
  rateLimit?: Partial<RateLimitConfig>;
  tools?: Partial<ToolPolicyConfig>;
  cache?: Partial<CacheConfig>;
  workspaceRoot?: string;
}

export const DEFAULT_CONFIG: ToolgateConfig = {
  host: "localhost",
  port: 8000,
  debug: false,
  logging: { level: "info", format: "json" },
  allowedOrigins: ["*"],
  rateLimit: { enabled: true, requests: 100, windowMs: 60_000 },
  tools: { timeoutMs: 30_000, retryAttempts: 3, retryDelayMs: 1_000 },
  cache: { enabled: true, ttlMs: 3_600_000, maxSize: 1000 },
  workspaceRoot: "./workspace",
};

const Duration = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const ms = parseDurationMs(value);
  if (ms === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a duration: ${JSON.stringify(value)}` });
    return z.NEVER;
  }
  return ms;
});

const LogLevelField = z
  .string()
  .refine(v => isValidLogLevel(v.toLowerCase()), { message: "unknown log level" })
  .transform(parseLogLevel);

/**
 * Shape of toolgate.config.json. Duration fields take milliseconds or
 * strings such as "30s".
 */
export const ConfigFileSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int(),
    debug: z.boolean(),
    logging: z
      .object({
        level: LogLevelField,
        format: z.enum(["json", "pretty"]),
        file: z.string().min(1),
      })
      .partial()
      .strict(),
    allowedOrigins: z.array(z.string().min(1)),
    rateLimit: z
      .object({ enabled: z.boolean(), requests: z.number().int(), windowMs: Duration })
      .partial()
      .strict(),
    tools: z
      .object({ timeoutMs: Duration, retryAttempts: z.number().int(), retryDelayMs: Duration })
      .partial()
      .strict(),
    cache: z
      .object({ enabled: z.boolean(), ttlMs: Duration, maxSize: z.number().int() })
      .partial()
      .strict(),
    workspaceRoot: z.string().min(1),
  })
  .partial()
  .strict();

export type Env = Record<string, string | undefined>;

function parseBool(value: string): boolean | undefined {
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return undefined;
}

/**
 * Read TOOLGATE_* variables. Unparseable values are reported, not ignored.
 */
export function configFromEnv(env: Env): { overrides: ConfigOverrides; problems: string[] } {
  const problems: string[] = [];
  const read = (name: string): string | undefined => {
    const value = env[`TOOLGATE_${name}`];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  };
  const int = (name: string): number | undefined => {
    const raw = read(name);
    if (raw === undefined) return undefined;
    const n = Number(raw);
    if (!Number.isInteger(n)) {
      problems.push(`TOOLGATE_${name} must be an integer, got "${raw}"`);
      return undefined;
    }
    return n;
  };
  const bool = (name: string): boolean | undefined => {
    const raw = read(name);
    if (raw === undefined) return undefined;
    const b = parseBool(raw);
    if (b === undefined) problems.push(`TOOLGATE_${name} must be a boolean, got "${raw}"`);
    return b;
  };
  const duration = (name: string): number | undefined => {
    const raw = read(name);
    if (raw === undefined) return undefined;
    const ms = parseDurationMs(raw);
    if (ms === undefined) problems.push(`TOOLGATE_${name} must be a duration, got "${raw}"`);
    return ms;
  };

  const level = read("LOG_LEVEL");
  const format = read("LOG_FORMAT");
  const origins = read("ALLOWED_ORIGINS");

  const overrides: ConfigOverrides = {
    host: read("HOST"),
    port: int("PORT"),
    debug: bool("DEBUG"),
    logging: {
      level: level === undefined ? undefined : parseLogLevel(level),
      format: format === undefined ? undefined : parseLogFormat(format),
      file: read("LOG_FILE"),
    },
    allowedOrigins: origins?.split(",").map(o => o.trim()).filter(o => o.length > 0),
    rateLimit: {
      enabled: bool("RATE_LIMIT_ENABLED"),
      requests: int("RATE_LIMIT_REQUESTS"),
      windowMs: duration("RATE_LIMIT_WINDOW"),
    },
    tools: {
      timeoutMs: duration("TOOL_TIMEOUT"),
      retryAttempts: int("TOOL_RETRY_ATTEMPTS"),
      retryDelayMs: duration("TOOL_RETRY_DELAY"),
    },
    cache: {
      enabled: bool("CACHE_ENABLED"),
      ttlMs: duration("CACHE_TTL"),
      maxSize: int("CACHE_MAX_SIZE"),
    },
    workspaceRoot: read("WORKSPACE"),
  };
  return { overrides, problems };
}

const pick = <V>(value: V | undefined, fallback: V): V => (value === undefined ? fallback : value);

export function mergeConfig(base: ToolgateConfig, layer: ConfigOverrides): ToolgateConfig {
  const { logging = {}, rateLimit = {}, tools = {}, cache = {} } = layer;
  return {
    host: pick(layer.host, base.host),
    port: pick(layer.port, base.port),
    debug: pick(layer.debug, base.debug),
    logging: {
      level: pick(logging.level, base.logging.level),
      format: pick(logging.format, base.logging.format),
      file: pick(logging.file, base.logging.file),
    },
    allowedOrigins: pick(layer.allowedOrigins, base.allowedOrigins),
    rateLimit: {
      enabled: pick(rateLimit.enabled, base.rateLimit.enabled),
      requests: pick(rateLimit.requests, base.rateLimit.requests),
      windowMs: pick(rateLimit.windowMs, base.rateLimit.windowMs),
    },
    tools: {
      timeoutMs: pick(tools.timeoutMs, base.tools.timeoutMs),
      retryAttempts: pick(tools.retryAttempts, base.tools.retryAttempts),
      retryDelayMs: pick(tools.retryDelayMs, base.tools.retryDelayMs),
    },
    cache: {
      enabled: pick(cache.enabled, base.cache.enabled),
      ttlMs: pick(cache.ttlMs, base.cache.ttlMs),
      maxSize: pick(cache.maxSize, base.cache.maxSize),
    },
    workspaceRoot: pick(layer.workspaceRoot, base.workspaceRoot),
  };
}

/**
 * Range checks. Returns one message per problem; empty means valid.
 */
export function validateConfig(config: ToolgateConfig): string[] {
  const problems: string[] = [];

  if (config.host.trim() === "") problems.push("host must not be empty");
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    problems.push(`port must be an integer between 0 and 65535, got ${config.port}`);
  }
  if (config.tools.timeoutMs <= 0) problems.push("tools.timeoutMs must be positive");
  if (config.tools.timeoutMs > MAX_TIMER_MS) problems.push(`tools.timeoutMs must be at most ${MAX_TIMER_MS}`);
  if (!Number.isInteger(config.tools.retryAttempts) || config.tools.retryAttempts < 0) {
    problems.push("tools.retryAttempts must be a non-negative integer");
  }
  if (config.tools.retryDelayMs < 0) problems.push("tools.retryDelayMs must not be negative");
  if (config.tools.retryDelayMs > MAX_TIMER_MS) {
    problems.push(`tools.retryDelayMs must be at most ${MAX_TIMER_MS}`);
  }
  if (config.cache.ttlMs < 0) problems.push("cache.ttlMs must not be negative");
  if (!Number.isInteger(config.cache.maxSize) || config.cache.maxSize < 1) {
    problems.push("cache.maxSize must be a positive integer");
  }
  if (!Number.isInteger(config.rateLimit.requests) || config.rateLimit.requests < 1) {
    problems.push("rateLimit.requests must be a positive integer");
  }
  if (config.rateLimit.windowMs <= 0) problems.push("rateLimit.windowMs must be positive");
  if (config.rateLimit.windowMs > MAX_TIMER_MS) {
    problems.push(`rateLimit.windowMs must be at most ${MAX_TIMER_MS}`);
  }
  if (config.allowedOrigins.length === 0) problems.push("allowedOrigins must list at least one origin");

  return problems;
}

function readConfigFile(file: string, problems: string[]): ConfigOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error: unknown) {
    problems.push(`${file}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.errors) {
      problems.push(`${file}: ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
    return {};
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  env?: Env;
  /** Explicit file; must exist. Without it, ./toolgate.config.json is read when present. */
  configPath?: string;
  overrides?: ConfigOverrides;
  cwd?: string;
}

/**
 * @throws ConfigError listing every problem found
 */
export function loadConfig(options: LoadConfigOptions = {}): ToolgateConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const problems: string[] = [];

  let config = DEFAULT_CONFIG;

  if (options.configPath !== undefined) {
    const file = path.resolve(cwd, options.configPath);
    if (fs.existsSync(file)) {
      config = mergeConfig(config, readConfigFile(file, problems));
    } else {
      problems.push(`config file not found: ${file}`);
    }
  } else {
    const file = path.join(cwd, CONFIG_FILE_NAME);
    if (fs.existsSync(file)) config = mergeConfig(config, readConfigFile(file, problems));
  }

  const fromEnv = configFromEnv(env);
  problems.push(...fromEnv.problems);
  config = mergeConfig(config, fromEnv.overrides);

  if (options.overrides) config = mergeConfig(config, options.overrides);

  problems.push(...validateConfig(config));
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return { ...config, workspaceRoot: path.resolve(cwd, config.workspaceRoot) };
}
