/**
 * toolgate tools:list
 */

import { Command } from "commander";
import type { ToolSummary } from "../../core/types";
import { formatDuration } from "../../core/logger/formatters";
import { loadCliApplication, reportError } from "../utils/context";
import { printTable } from "../utils/printTable";

export const TOOL_TABLE_HEADERS = ["NAME", "VERSION", "TIMEOUT", "RETRIES", "CACHE", "DESCRIPTION"];

export function toolRows(tools: ToolSummary[]): string[][] {
  return tools.map(t => [
    t.name,
    t.version,
    formatDuration(t.timeoutMs),
    String(t.maxRetries),
    t.cacheable ? "yes" : "no",
    t.description,
  ]);
}

export function toolsListCommand(): Command {
  const cmd = new Command("tools:list");
  cmd
    .description("List registered tools")
    .option("-c, --config <file>", "configuration file")
    .option("--json", "print JSON instead of a table")
    .action(async (opts: { config?: string; json?: boolean }) => {
      try {
        const app = loadCliApplication(opts);
        const tools = app.engine.listTools();
        if (opts.json) {
          console.log(JSON.stringify(tools, null, 2));
        } else {
          printTable(TOOL_TABLE_HEADERS, toolRows(tools));
        }
        await app.dispose();
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
