/**
 * Built-in Tools Tests
 */

import fs from "fs";
import os from "os";
import path from "path";
import { createApplication } from "../src/bootstrap";
import { DEFAULT_CONFIG } from "../src/core/config";
import { Logger } from "../src/core/logger";
import { ExecutionEngine, ToolRegistry } from "../src/core/tool-engine";
import { registerBuiltinTools } from "../src/core/tools/builtinTools";
import type { InvocationResult, ToolArguments } from "../src/core/types";

const logger = Logger.create({ level: "silent" });

describe("built-in tools", () => {
  let workspace: string;
  let engine: ExecutionEngine;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "toolgate-ws-"));
    const registry = new ToolRegistry();
    registerBuiltinTools(registry, { workspaceRoot: workspace, now: () => new Date("2024-01-02T03:04:05.000Z") });
    engine = new ExecutionEngine({ registry, logger });
  });

  afterEach(() => {
    engine.shutdown();
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  async function value(name: string, args: ToolArguments): Promise<unknown> {
    const result = await engine.invoke(name, args);
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
  }

  async function errorMessage(name: string, args: ToolArguments): Promise<string> {
    const result: InvocationResult = await engine.invoke(name, args);
    if (result.ok) throw new Error("expected failure");
    return result.error.message;
  }

  test("registers the four tools", () => {
    expect(engine.listTools().map(t => t.name)).toEqual(["echo", "get_current_time", "search_web", "file_operations"]);
  });

  test("echo returns its text", async () => {
    await expect(value("echo", { text: "hi" })).resolves.toBe("hi");
  });

  test("get_current_time uses the injected clock", async () => {
    await expect(value("get_current_time", {})).resolves.toBe("2024-01-02T03:04:05.000Z");
  });

  describe("search_web", () => {
    test("returns a synthetic result", async () => {
      await expect(value("search_web", { query: "typescript", max_results: 3 })).resolves.toEqual([
        {
          title: "Search result for: typescript",
          url: "https://example.com",
          snippet: "Information about typescript",
        },
      ]);
    });

    test("validates its bounds", async () => {
      await expect(errorMessage("search_web", { query: "" })).resolves.toBe(
        "Invalid arguments for tool search_web: query must NOT have fewer than 1 characters"
      );
      await expect(errorMessage("search_web", { query: "x", max_results: 0 })).resolves.toBe(
        "Invalid arguments for tool search_web: max_results must be >= 1"
      );
    });
  });

  describe("file_operations", () => {
    test("writes, reads and lists inside the workspace", async () => {
      await expect(value("file_operations", { operation: "write", path: "notes/a.txt", content: "hello" })).resolves.toEqual({
        success: true,
        data: "File written to notes/a.txt",
        error: "",
      });
      expect(fs.readFileSync(path.join(workspace, "notes", "a.txt"), "utf8")).toBe("hello");

      await expect(value("file_operations", { operation: "read", path: "notes/a.txt" })).resolves.toEqual({
        success: true,
        data: "hello",
        error: "",
      });
      await expect(value("file_operations", { operation: "list", path: "." })).resolves.toEqual({
        success: true,
        data: '["notes"]',
        error: "",
      });
      await expect(value("file_operations", { operation: "list", path: "notes/a.txt" })).resolves.toEqual({
        success: false,
        data: "",
        error: "notes/a.txt is not a directory",
      });
    });

    test("reports rejected paths in-band", async () => {
      await expect(value("file_operations", { operation: "read", path: "../secret" })).resolves.toEqual({
        success: false,
        data: "",
        error: "Path rejected: traversal sequences not allowed",
      });
    });

    test("reports I/O failures in-band", async () => {
      const result = await value("file_operations", { operation: "read", path: "missing.txt" });
      expect(result).toMatchObject({ success: false, data: "" });
      expect(JSON.stringify(result)).toContain("ENOENT");
    });

    test("rejects unknown operations before running", async () => {
      await expect(errorMessage("file_operations", { operation: "delete", path: "x" })).resolves.toBe(
        'Invalid arguments for tool file_operations: operation must be one of: "read", "write", "list"'
      );
    });
  });
});

describe("createApplication", () => {
  test("wires configured defaults into the registry and engine", async () => {
    const app = createApplication(
      {
        ...DEFAULT_CONFIG,
        tools: { timeoutMs: 5_000, retryAttempts: 1, retryDelayMs: 10 },
        cache: { enabled: false, ttlMs: 1_000, maxSize: 10 },
      },
      { logger: Logger.create({ level: "silent" }) }
    );

    expect(app.registry.size).toBe(4);
    expect(app.registry.lookup("get_current_time").descriptor.maxRetries).toBe(1);
    expect(app.registry.lookup("search_web").descriptor.timeoutMs).toBe(30_000);
    expect(app.registry.lookup("echo").descriptor.timeoutMs).toBe(5_000);
    expect(app.engine.stats().cache).toBeNull();

    await app.dispose();
    expect(app.engine.isShutdown).toBe(true);
  });

  test("can start without built-in tools", async () => {
    const app = createApplication(DEFAULT_CONFIG, { logger: Logger.create({ level: "silent" }), builtinTools: false });
    expect(app.registry.size).toBe(0);
    expect(app.engine.stats().cache).toEqual({
      size: 0,
      maxSize: 1000,
      hits: 0,
      misses: 0,
      evictions: 0,
      expirations: 0,
    });
    await app.dispose();
  });
});
