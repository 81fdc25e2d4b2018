import { Router } from "express";
import { NotFoundError, toErrorPayload } from "../../core/errors";
import type { ExecutionEngine } from "../../core/tool-engine";
import { validateBody } from "../middleware/validation";
import { statusForInvocation } from "../protocol";
import { CacheInvalidateSchema, ToolInvokeSchema } from "./schemas";

export function toolsRoutes(engine: ExecutionEngine) {
  const r = Router();

  r.get("/", (req, res) => {
    res.json({ tools: engine.listTools() });
  });

  r.post(
    "/invoke",
    validateBody(ToolInvokeSchema, async (body, req, res) => {
      const controller = new AbortController();
      // A client that goes away before the response cancels the invocation.
      const onClose = () => {
        if (!res.writableEnded) controller.abort();
      };
      res.on("close", onClose);

      const result = await engine.invoke(body.name, body.arguments, body.requestId, {
        signal: controller.signal,
      });
      res.off("close", onClose);
      res.status(statusForInvocation(result)).json(result);
    })
  );

  r.delete("/cache", (req, res) => {
    const before = engine.stats().cache?.size ?? 0;
    engine.clearCache();
    res.json({ ok: true, removed: before });
  });

  r.get("/:name", (req, res) => {
    const tool = engine.listTools().find(t => t.name === req.params.name);
    if (!tool) {
      res.status(404).json({ ok: false, error: toErrorPayload(new NotFoundError(req.params.name)) });
      return;
    }
    res.json(tool);
  });

  r.delete(
    "/:name/cache",
    validateBody(CacheInvalidateSchema, (body, req, res) => {
      const removed = engine.invalidate(req.params.name, body.arguments);
      res.json({ ok: true, removed });
    })
  );

  return r;
}
