/**
 * HTTP API Tests
 *
 * Each suite runs the real server on an ephemeral port.
 */

import { DEFAULT_CONFIG, ToolgateConfig } from "../src/core/config";
import { EventBus } from "../src/core/eventBus";
import { Logger } from "../src/core/logger";
import { ExecutionEngine, ResultCache, ToolRegistry } from "../src/core/tool-engine";
import type { ArgumentValue } from "../src/core/types";
import { RunningServer, startServer } from "../src/server";

const logger = Logger.create({ level: "silent" });

type ServerConfig = Pick<ToolgateConfig, "host" | "port" | "debug" | "allowedOrigins" | "rateLimit">;

const baseConfig: ServerConfig = {
  host: "127.0.0.1",
  port: 0,
  debug: false,
  allowedOrigins: ["*"],
  rateLimit: { ...DEFAULT_CONFIG.rateLimit, enabled: false },
};

interface Harness {
  running: RunningServer;
  engine: ExecutionEngine;
  eventBus: EventBus;
}

async function startHarness(config: Partial<ServerConfig> = {}): Promise<Harness> {
  const eventBus = new EventBus();
  const registry = new ToolRegistry({ eventBus });
  registry.register(
    {
      name: "echo",
      description: "Echo text back",
      inputSchema: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
      maxRetries: 0,
    },
    (args) => (typeof args.text === "string" ? args.text : "")
  );
  registry.register(
    { name: "hang", description: "waits until cancelled", inputSchema: { type: "object" }, maxRetries: 0 },
    (args, ctx) =>
      new Promise<ArgumentValue>((resolve) => {
        ctx.signal.addEventListener("abort", () => resolve("aborted"));
      })
  );
  const engine = new ExecutionEngine({
    registry,
    eventBus,
    logger,
    cache: new ResultCache({ maxSize: 10, defaultTtlMs: 60_000 }),
  });
  const running = await startServer({ engine, eventBus, logger, config: { ...baseConfig, ...config } });
  return { running, engine, eventBus };
}

async function stopHarness(harness: Harness): Promise<void> {
  harness.engine.shutdown();
  await harness.running.close();
}

function post(url: string, body: unknown, method = "POST"): Promise<Response> {
  return fetch(url, {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  let harness: Harness;
  let base: string;

  beforeAll(async () => {
    harness = await startHarness();
    base = harness.running.url;
  });

  afterAll(async () => {
    await stopHarness(harness);
  });

  beforeEach(() => {
    harness.engine.clearCache();
  });

  test("binds an ephemeral port", () => {
    expect(harness.running.port).toBeGreaterThan(0);
    expect(base).toBe(`http://127.0.0.1:${harness.running.port}`);
  });

  test("GET / describes the service", async () => {
    const res = await fetch(`${base}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ name: "toolgate", version: "1.0.0", status: "running" });
  });

  test("GET /health reports engine state", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "healthy",
      activeConnections: 0,
      registeredTools: 2,
      inFlight: 0,
      cache: { size: 0, maxSize: 10 },
    });
  });

  describe("tools", () => {
    test("GET /tools lists registered tools", async () => {
      const body = await (await fetch(`${base}/tools`)).json();
      expect(body).toMatchObject({ tools: [{ name: "echo" }, { name: "hang" }] });
    });

    test("GET /tools/:name describes one tool", async () => {
      const res = await fetch(`${base}/tools/echo`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ name: "echo", maxRetries: 0, cacheable: true, timeoutMs: 30_000 });
    });

    test("GET /tools/:name of an unknown tool is 404", async () => {
      const res = await fetch(`${base}/tools/nope`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        ok: false,
        error: {
          kind: "NotFoundError",
          code: "NOT_FOUND",
          message: "Tool not found: nope",
          details: { toolName: "nope" },
        },
      });
    });

    test("POST /tools/invoke runs the tool and caches the result", async () => {
      const first = await post(`${base}/tools/invoke`, { name: "echo", arguments: { text: "hi" }, requestId: "req-1" });
      expect(first.status).toBe(200);
      expect(await first.json()).toMatchObject({
        ok: true,
        requestId: "req-1",
        toolName: "echo",
        value: "hi",
        fromCache: false,
      });

      const second = await post(`${base}/tools/invoke`, { name: "echo", arguments: { text: "hi" } });
      expect(await second.json()).toMatchObject({ ok: true, value: "hi", fromCache: true });
    });

    test("POST /tools/invoke with bad arguments is 400", async () => {
      const res = await post(`${base}/tools/invoke`, { name: "echo", arguments: {} });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        ok: false,
        error: { code: "INVALID_ARGUMENTS", message: "Invalid arguments for tool echo: text is required" },
      });
    });

    test("POST /tools/invoke of an unknown tool is 404", async () => {
      const res = await post(`${base}/tools/invoke`, { name: "missing_tool" });
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ ok: false, error: { code: "NOT_FOUND" } });
    });

    test("POST /tools/invoke rejects unknown body fields", async () => {
      const res = await post(`${base}/tools/invoke`, { name: "echo", extra: 1 });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        ok: false,
        error: {
          kind: "ProtocolError",
          code: "INVALID_REQUEST",
          message: "Request validation failed",
          details: { issues: [{ path: "", message: "Unrecognized key(s) in object: 'extra'" }] },
        },
      });
    });

    test("malformed JSON is a 400", async () => {
      const res = await fetch(`${base}/tools/invoke`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ ok: false, error: { kind: "ProtocolError", code: "INVALID_REQUEST" } });
    });

    test("a client that disconnects cancels its invocation", async () => {
      const started = new Promise<void>((resolve) => {
        harness.eventBus.on("ToolInvocationEvent", (evt) => {
          if (evt.payload.toolName === "hang") resolve();
        });
      });
      const failed = new Promise<string>((resolve) => {
        harness.eventBus.on("ToolErrorEvent", (evt) => {
          if (evt.payload.toolName === "hang") resolve(evt.payload.error.code);
        });
      });

      const controller = new AbortController();
      const request = fetch(`${base}/tools/invoke`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ name: "hang" }),
        signal: controller.signal,
      }).catch((error: unknown) => error);

      await started;
      controller.abort();

      await expect(failed).resolves.toBe("CANCELLED");
      const outcome = await request;
      expect(typeof outcome === "object" && outcome !== null && "name" in outcome ? outcome.name : undefined).toBe(
        "AbortError"
      );
    });
  });

  describe("cache management", () => {
    test("DELETE /tools/:name/cache drops one tool's entries", async () => {
      await post(`${base}/tools/invoke`, { name: "echo", arguments: { text: "a" } });
      await post(`${base}/tools/invoke`, { name: "echo", arguments: { text: "b" } });

      const one = await post(`${base}/tools/echo/cache`, { arguments: { text: "a" } }, "DELETE");
      expect(await one.json()).toEqual({ ok: true, removed: 1 });

      const rest = await fetch(`${base}/tools/echo/cache`, { method: "DELETE" });
      expect(await rest.json()).toEqual({ ok: true, removed: 1 });
    });

    test("DELETE /tools/:name/cache of an unknown tool is 404", async () => {
      const res = await fetch(`${base}/tools/nope/cache`, { method: "DELETE" });
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ ok: false, error: { code: "NOT_FOUND", message: "Tool not found: nope" } });
    });

    test("DELETE /tools/cache clears everything", async () => {
      await post(`${base}/tools/invoke`, { name: "echo", arguments: { text: "a" } });
      const res = await fetch(`${base}/tools/cache`, { method: "DELETE" });
      expect(await res.json()).toEqual({ ok: true, removed: 1 });
      expect(harness.engine.stats().cache?.size).toBe(0);
    });
  });

  describe("POST /rpc", () => {
    test("tools/call returns the result envelope", async () => {
      const res = await post(`${base}/rpc`, {
        id: 1,
        method: "tools/call",
        params: { name: "echo", arguments: { text: "rpc" } },
      });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ id: 1, result: { value: "rpc", fromCache: false } });
    });

    test("unknown methods are 404 with the request id", async () => {
      const res = await post(`${base}/rpc`, { id: "x", method: "nope" });
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ id: "x", error: { code: "METHOD_NOT_FOUND", message: "Method not found: nope" } });
    });

    test("a client that disconnects cancels its tools/call", async () => {
      const started = new Promise<void>((resolve) => {
        harness.eventBus.on("ToolInvocationEvent", (evt) => {
          if (evt.payload.requestId === "rpc-hang") resolve();
        });
      });
      const failed = new Promise<string>((resolve) => {
        harness.eventBus.on("ToolErrorEvent", (evt) => {
          if (evt.payload.requestId === "rpc-hang") resolve(evt.payload.error.code);
        });
      });

      const controller = new AbortController();
      const request = fetch(`${base}/rpc`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ id: 7, method: "tools/call", params: { name: "hang", requestId: "rpc-hang" } }),
        signal: controller.signal,
      }).catch((error: unknown) => error);

      await started;
      controller.abort();

      await expect(failed).resolves.toBe("CANCELLED");
      await request;
    });

    test("an invalid envelope is 400", async () => {
      const res = await post(`${base}/rpc`, { method: "tools/list" });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ id: "unknown", error: { code: "INVALID_REQUEST", message: "Invalid request" } });
    });
  });

  describe("GET /events/history", () => {
    test("filters by type and limit", async () => {
      await post(`${base}/tools/invoke`, { name: "echo", arguments: { text: "e1" } });
      await post(`${base}/tools/invoke`, { name: "echo", arguments: { text: "e2" } });

      const res = await fetch(`${base}/events/history?type=ToolResultEvent&limit=1`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        events: [{ type: "ToolResultEvent", payload: { toolName: "echo", value: "e2" } }],
      });
    });

    test("rejects an unknown event type", async () => {
      const res = await fetch(`${base}/events/history?type=Bogus`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        ok: false,
        error: {
          kind: "ProtocolError",
          code: "INVALID_REQUEST",
          message: "Unknown event type: Bogus",
          details: { type: "Bogus" },
        },
      });
    });

    test("rejects an out-of-range limit", async () => {
      const res = await fetch(`${base}/events/history?limit=0`);
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ ok: false, error: { message: "Query validation failed" } });
    });
  });

  test("unknown routes are 404", async () => {
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      ok: false,
      error: {
        kind: "ProtocolError",
        code: "METHOD_NOT_FOUND",
        message: "Route GET /nope not found",
        details: { method: "GET", path: "/nope" },
      },
    });
  });
});

describe("HTTP rate limiting", () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await startHarness({ rateLimit: { enabled: true, requests: 2, windowMs: 60_000 } });
  });

  afterEach(async () => {
    await stopHarness(harness);
  });

  test("answers 429 once the window is used up", async () => {
    const first = await fetch(`${harness.running.url}/health`);
    expect(first.headers.get("x-ratelimit-limit")).toBe("2");
    expect(first.headers.get("x-ratelimit-remaining")).toBe("1");
    await fetch(`${harness.running.url}/health`);

    const blocked = await fetch(`${harness.running.url}/health`);
    expect(blocked.status).toBe(429);
    expect(blocked.headers.get("x-ratelimit-remaining")).toBe("0");
    expect(await blocked.json()).toMatchObject({
      ok: false,
      error: { kind: "ProtocolError", code: "RATE_LIMITED", message: "Rate limit exceeded. Please try again later." },
    });
  });
});

describe("HTTP CORS", () => {
  let harness: Harness;

  beforeAll(async () => {
    harness = await startHarness({ allowedOrigins: ["http://allowed.test"] });
  });

  afterAll(async () => {
    await stopHarness(harness);
  });

  test("allows listed origins only", async () => {
    const allowed = await fetch(`${harness.running.url}/health`, { headers: { Origin: "http://allowed.test" } });
    expect(allowed.headers.get("access-control-allow-origin")).toBe("http://allowed.test");

    const denied = await fetch(`${harness.running.url}/health`, { headers: { Origin: "http://other.test" } });
    expect(denied.status).toBe(200);
    expect(denied.headers.get("access-control-allow-origin")).toBeNull();
  });
});
