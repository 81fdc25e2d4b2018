/**
 * Built-in tools
 * Small utility operations registered at startup
 */

import { promises as fs } from "fs";
import path from "path";
import { ToolRegistry } from "../tool-engine";
import { readEnum, readOptionalNumber, readOptionalString, readString } from "../tool-engine/arguments";
import type { ArgumentValue } from "../types";
import { secureResolvePath } from "../utils/pathSecurity";

export interface BuiltinToolsOptions {
  /** file_operations never reaches outside this directory */
  workspaceRoot: string;
  /** Clock for get_current_time */
  now?: () => Date;
}

export const FILE_OPERATIONS = ["read", "write", "list"] as const;
type FileOperation = (typeof FILE_OPERATIONS)[number];

interface FileOperationResult {
  success: boolean;
  data: string;
  error: string;
  [key: string]: ArgumentValue;
}

async function runFileOperation(
  root: string,
  operation: FileOperation,
  userPath: string,
  content: string
): Promise<FileOperationResult> {
  const target = secureResolvePath(root, userPath);

  switch (operation) {
    case "read":
      return { success: true, data: await fs.readFile(target, "utf8"), error: "" };
    case "write":
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, "utf8");
      return { success: true, data: `File written to ${userPath}`, error: "" };
    case "list": {
      const stat = await fs.stat(target);
      if (!stat.isDirectory()) {
        return { success: false, data: "", error: `${userPath} is not a directory` };
      }
      const names = (await fs.readdir(target)).sort();
      return { success: true, data: JSON.stringify(names), error: "" };
    }
  }
}

/**
 * Register all built-in tools with the registry
 */
export function registerBuiltinTools(registry: ToolRegistry, options: BuiltinToolsOptions): void {
  const now = options.now ?? (() => new Date());
  const root = path.resolve(options.workspaceRoot);

  registry.register(
    {
      name: "echo",
      description: "Returns the given text unchanged",
      tags: ["utility"],
      inputSchema: {
        type: "object",
        properties: {
          text: { type: "string", description: "Text to echo back" },
        },
        required: ["text"],
      },
      outputSchema: { type: "string" },
      maxRetries: 0,
      cacheable: true,
    },
    (args) => readString(args, "text")
  );

  registry.register(
    {
      name: "get_current_time",
      description: "Get the current date and time",
      tags: ["utility", "time"],
      inputSchema: { type: "object", properties: {}, required: [] },
      outputSchema: { type: "string", description: "Current timestamp" },
      cacheable: false,
    },
    () => now().toISOString()
  );

  registry.register(
    {
      name: "search_web",
      description: "Search the web for information",
      tags: ["web", "search"],
      inputSchema: {
        type: "object",
        properties: {
          query: { type: "string", minLength: 1, description: "Search query" },
          max_results: { type: "integer", minimum: 1, maximum: 50, description: "Maximum number of results" },
        },
        required: ["query"],
      },
      outputSchema: {
        type: "array",
        items: { type: "object" },
        description: "Search results",
      },
      timeout: "30s",
    },
    // Placeholder backend: a single synthetic hit per query.
    (args) => {
      const query = readString(args, "query");
      const maxResults = readOptionalNumber(args, "max_results", 5);
      const results: ArgumentValue[] = [
        {
          title: `Search result for: ${query}`,
          url: "https://example.com",
          snippet: `Information about ${query}`,
        },
      ];
      return results.slice(0, maxResults);
    }
  );

  registry.register(
    {
      name: "file_operations",
      description: "Perform file operations (read, write, list) inside the workspace",
      tags: ["file", "system"],
      inputSchema: {
        type: "object",
        properties: {
          operation: { type: "string", enum: [...FILE_OPERATIONS] },
          path: { type: "string", description: "Path relative to the workspace root" },
          content: { type: "string", description: "File content (for write operation)" },
        },
        required: ["operation", "path"],
      },
      outputSchema: {
        type: "object",
        properties: {
          success: { type: "boolean" },
          data: { type: "string" },
          error: { type: "string" },
        },
        required: ["success", "data", "error"],
      },
      timeout: "10s",
      cacheable: false,
    },
    async (args) => {
      const operation = readEnum(args, "operation", FILE_OPERATIONS);
      const userPath = readString(args, "path");
      const content = readOptionalString(args, "content", "");
      try {
        return await runFileOperation(root, operation, userPath, content);
      } catch (error: unknown) {
        // Rejected paths and I/O failures are reported in-band, not retried.
        return { success: false, data: "", error: error instanceof Error ? error.message : String(error) };
      }
    }
  );
}
