/**
 * toolgate tools:docs
 */

import { Command } from "commander";
import { writeToolCatalog } from "../../docs/toolCatalog";
import { loadCliApplication, reportError } from "../utils/context";

export function toolsDocsCommand(): Command {
  const cmd = new Command("tools:docs");
  cmd
    .description("Generate a Markdown catalog of the registered tools")
    .option("-o, --out <dir>", "output directory", "docs/tools")
    .option("-c, --config <file>", "configuration file")
    .action(async (opts: { out: string; config?: string }) => {
      try {
        const app = loadCliApplication(opts);
        const file = await writeToolCatalog(app.engine.listTools(), opts.out);
        console.log(`Tool documentation written to ${file}`);
        await app.dispose();
      } catch (e) {
        reportError(e);
      }
    });
  return cmd;
}
