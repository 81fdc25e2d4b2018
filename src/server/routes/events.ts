import { Router } from "express";
import { ProtocolError, toErrorPayload } from "../../core/errors";
import { EventBus, isEventType } from "../../core/eventBus";
import { zodIssues } from "../protocol";
import { EventHistoryQuerySchema } from "./schemas";

export function eventRoutes(eventBus: EventBus) {
  const r = Router();

  r.get("/history", (req, res) => {
    const query = EventHistoryQuerySchema.safeParse(req.query);
    if (!query.success) {
      const error = new ProtocolError("Query validation failed", "INVALID_REQUEST", {
        issues: zodIssues(query.error),
      });
      res.status(error.statusCode).json({ ok: false, error: toErrorPayload(error) });
      return;
    }

    const { since, limit, type } = query.data;
    const eventType = type === undefined || isEventType(type) ? type : null;
    if (eventType === null) {
      const error = new ProtocolError(`Unknown event type: ${type}`, "INVALID_REQUEST", { type });
      res.status(error.statusCode).json({ ok: false, error: toErrorPayload(error) });
      return;
    }

    res.json({ events: eventBus.getHistory({ since, limit, type: eventType }) });
  });

  return r;
}
