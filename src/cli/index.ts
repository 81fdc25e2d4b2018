#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { serveCommand } from "./commands/serve";
import { toolsCallCommand } from "./commands/toolsCall";
import { toolsDocsCommand } from "./commands/toolsDocs";
import { toolsListCommand } from "./commands/toolsList";

export function createCli(): Command {
  const program = new Command();

  program
    .name("toolgate")
    .description("Toolgate CLI: serve, list and call tools")
    .version("1.0.0");

  program.addCommand(serveCommand());
  program.addCommand(toolsListCommand());
  program.addCommand(toolsCallCommand());
  program.addCommand(toolsDocsCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      console.error(e instanceof Error ? e.message : String(e));
      process.exit(1);
    });
}
