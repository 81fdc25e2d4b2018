/**
 * CLI Tests
 */

import { createCli } from "../src/cli";
import { serveOverrides } from "../src/cli/commands/serve";
import { callTool, parseArgumentsJson } from "../src/cli/commands/toolsCall";
import { TOOL_TABLE_HEADERS, toolRows } from "../src/cli/commands/toolsList";
import { formatTable, printTable } from "../src/cli/utils/printTable";
import { ProtocolError } from "../src/core/errors";
import { Logger } from "../src/core/logger";
import { ExecutionEngine, ToolRegistry } from "../src/core/tool-engine";
import type { ToolSummary } from "../src/core/types";

describe("formatTable", () => {
  test("pads columns and draws a separator", () => {
    expect(
      formatTable(
        ["A", "BB"],
        [
          ["x", "y"],
          ["long", "z"],
        ]
      )
    ).toEqual(["A    │ BB", "─────┼───", "x    │ y", "long │ z"]);
  });

  test("ignores ANSI colour codes when measuring", () => {
    expect(formatTable(["N"], [["\u001b[32mok\u001b[0m"]])).toEqual(["N", "──", "\u001b[32mok\u001b[0m"]);
  });

  test("reports an empty table", () => {
    expect(formatTable(["A"], [])).toEqual(["No data to display"]);
  });

  test("printTable writes one line at a time", () => {
    const lines: string[] = [];
    printTable(["A"], [["1"]], line => lines.push(line));
    expect(lines).toEqual(["A", "─", "1"]);
  });
});

describe("tools:list", () => {
  const summary: ToolSummary = {
    name: "echo",
    description: "Echo text back",
    version: "1.0.0",
    tags: [],
    inputSchema: { type: "object" },
    outputSchema: {},
    timeoutMs: 30_000,
    maxRetries: 0,
    cacheable: true,
  };

  test("renders one row per tool", () => {
    expect(toolRows([summary, { ...summary, name: "slow", timeoutMs: 500, maxRetries: 2, cacheable: false }])).toEqual([
      ["echo", "1.0.0", "30.00s", "0", "yes", "Echo text back"],
      ["slow", "1.0.0", "500ms", "2", "no", "Echo text back"],
    ]);
    expect(TOOL_TABLE_HEADERS).toHaveLength(6);
  });
});

describe("tools:call", () => {
  test("parseArgumentsJson accepts objects and blanks", () => {
    expect(parseArgumentsJson(undefined)).toEqual({});
    expect(parseArgumentsJson("   ")).toEqual({});
    expect(parseArgumentsJson('{"text":"hi","n":[1,{"a":null}]}')).toEqual({ text: "hi", n: [1, { a: null }] });
  });

  test("parseArgumentsJson rejects non-objects", () => {
    expect(() => parseArgumentsJson("[1,2]")).toThrow(ProtocolError);
    expect(() => parseArgumentsJson("[1,2]")).toThrow("Arguments must be a JSON object");
    expect(() => parseArgumentsJson("42")).toThrow("Arguments must be a JSON object");
  });

  test("parseArgumentsJson rejects malformed JSON", () => {
    expect(() => parseArgumentsJson("{bad")).toThrow(/^Arguments are not valid JSON: /);
  });

  test("callTool invokes through the engine", async () => {
    const registry = new ToolRegistry();
    registry.register(
      {
        name: "echo",
        description: "Echo text back",
        inputSchema: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
      },
      (args) => (typeof args.text === "string" ? args.text : "")
    );
    const engine = new ExecutionEngine({ registry, logger: Logger.create({ level: "silent" }) });

    const result = await callTool(engine, "echo", '{"text":"cli"}');
    expect(result).toMatchObject({ ok: true, value: "cli" });
    engine.shutdown();
  });
});

describe("serve", () => {
  test("flags become config overrides", () => {
    expect(serveOverrides({ host: "0.0.0.0", port: 9000 })).toEqual({
      host: "0.0.0.0",
      port: 9000,
      debug: undefined,
      logging: { level: undefined, file: undefined },
    });
  });

  test("--debug implies debug logging unless a level is given", () => {
    expect(serveOverrides({ debug: true }).logging).toEqual({ level: "debug", file: undefined });
    expect(serveOverrides({ debug: true, logLevel: "WARN" }).logging).toEqual({ level: "warn", file: undefined });
  });
});

test("createCli registers every command", () => {
  const program = createCli();
  expect(program.name()).toBe("toolgate");
  expect(program.commands.map(c => c.name())).toEqual(["serve", "tools:list", "tools:call", "tools:docs"]);
});
