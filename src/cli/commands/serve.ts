/**
 * toolgate serve
 */

import { Command, InvalidArgumentError } from "commander";
import type { ConfigOverrides } from "../../core/config";
import { parseLogLevel } from "../../core/logger";
import { serve } from "../../index";
import { reportError } from "../utils/context";

export interface ServeOptions {
  host?: string;
  port?: number;
  debug?: boolean;
  config?: string;
  logLevel?: string;
  logFile?: string;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("port must be an integer between 0 and 65535");
  }
  return port;
}

export function serveOverrides(opts: ServeOptions): ConfigOverrides {
  return {
    host: opts.host,
    port: opts.port,
    debug: opts.debug,
    logging: {
      level: opts.logLevel ? parseLogLevel(opts.logLevel) : opts.debug ? "debug" : undefined,
      file: opts.logFile,
    },
  };
}

export function serveCommand(): Command {
  const cmd = new Command("serve");
  cmd
    .description("Start the HTTP and WebSocket server")
    .option("-H, --host <host>", "bind address")
    .option("-p, --port <port>", "listen port", parsePort)
    .option("-d, --debug", "debug logging and detailed internal errors")
    .option("-c, --config <file>", "configuration file")
    .option("--log-level <level>", "log level")
    .option("--log-file <path>", "also write JSON logs to this file")
    .action(async (opts: ServeOptions) => {
      try {
        await serve({ configPath: opts.config, overrides: serveOverrides(opts) });
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
