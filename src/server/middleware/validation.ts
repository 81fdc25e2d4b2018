/**
 * Zod request validation for Express routes
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { ZodType, ZodTypeDef } from "zod";
import { ProtocolError, toErrorPayload } from "../../core/errors";
import { zodIssues } from "../protocol";

export type ValidatedHandler<T> = (body: T, req: Request, res: Response) => Promise<void> | void;

/**
 * Parse the JSON body with `schema` and hand the typed result to `handler`.
 * Rejects with 400 INVALID_REQUEST and the list of issues. Errors thrown by
 * the handler go to the Express error middleware.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: ValidatedHandler<T>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const error = new ProtocolError("Request validation failed", "INVALID_REQUEST", {
        issues: zodIssues(result.error),
      });
      res.status(error.statusCode).json({ ok: false, error: toErrorPayload(error) });
      return;
    }

    Promise.resolve()
      .then(() => handler(result.data, req, res))
      .catch(next);
  };
}
