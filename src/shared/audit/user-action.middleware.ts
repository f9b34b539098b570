import { NextFunction, Request, Response } from "express";
import { createLogger } from "../logging/logger";

const MUTATION_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

const log = createLogger("audit");

function requestPath(req: Request): string {
  const original = req.originalUrl || "";
  const q = original.indexOf("?");
  return q >= 0 ? original.slice(0, q) : original;
}

/** Logs one audit line per mutating request once the response is sent. */
export const auditMutatingUserAction = (req: Request, res: Response, next: NextFunction): void => {
  const method = req.method.toUpperCase();
  const auth = req.auth;
  if (!MUTATION_METHODS.has(method) || !auth) {
    next();
    return;
  }

  const startedAt = Date.now();
  const path = requestPath(req);

  res.once("finish", () => {
    log.info("USER_ACTION_API_MUTATION", {
      userId: auth.sub,
      method,
      path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startedAt,
      ip: req.ip ?? null,
    });
  });

  next();
};
