/**
 * Shared setup for commands that run tools in-process
 */

import { Application, createApplication } from "../../bootstrap";
import { loadConfig } from "../../core/config";
import { Logger, parseLogLevel } from "../../core/logger";

export interface CommonOptions {
  config?: string;
  logLevel?: string;
}

/**
 * Build an application from configuration. Logging stays silent unless a
 * level is requested, so command output is the only thing on stdout.
 */
export function loadCliApplication(opts: CommonOptions): Application {
  const config = loadConfig({ configPath: opts.config });
  const logger = Logger.create({ level: opts.logLevel ? parseLogLevel(opts.logLevel) : "silent", format: "pretty" });
  return createApplication(config, { logger });
}

export function reportError(error: unknown): void {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
