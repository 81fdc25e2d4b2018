/**
 * toolgate tools:call <name> [json]
 */

import { Command } from "commander";
import { ProtocolError } from "../../core/errors";
import { ExecutionEngine, ToolArgumentsSchema } from "../../core/tool-engine";
import type { InvocationResult, ToolArguments } from "../../core/types";
import { loadCliApplication, reportError } from "../utils/context";

/**
 * @throws ProtocolError when the text is not a JSON object
 */
export function parseArgumentsJson(text: string | undefined): ToolArguments {
  if (text === undefined || text.trim() === "") return {};
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ProtocolError(`Arguments are not valid JSON: ${e instanceof Error ? e.message : String(e)}`, "INVALID_REQUEST");
  }
  const parsed = ToolArgumentsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError("Arguments must be a JSON object", "INVALID_REQUEST");
  }
  return parsed.data;
}

export async function callTool(engine: ExecutionEngine, name: string, json?: string): Promise<InvocationResult> {
  return engine.invoke(name, parseArgumentsJson(json));
}

export function toolsCallCommand(): Command {
  const cmd = new Command("tools:call");
  cmd
    .description("Invoke a tool once and print the result")
    .argument("<name>", "tool name")
    .argument("[json]", "arguments as a JSON object", "{}")
    .option("-c, --config <file>", "configuration file")
    .option("--log-level <level>", "log to stdout at this level")
    .action(async (name: string, json: string, opts: { config?: string; logLevel?: string }) => {
      try {
        const app = loadCliApplication(opts);
        const result = await callTool(app.engine, name, json);
        if (result.ok) {
          console.log(JSON.stringify(result.value, null, 2));
        } else {
          console.error(`${result.error.code}: ${result.error.message}`);
          process.exitCode = 1;
        }
        await app.dispose();
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
