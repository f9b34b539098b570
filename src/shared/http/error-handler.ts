import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { createLogger } from "../logging/logger";
import { ApiError } from "./api-error";

const log = createLogger("http");

export const notFoundHandler = (_req: Request, res: Response): void => {
  res.status(404).json({ error: "Not found" });
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: "Validation failed",
      issues: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
    return;
  }

  log.error("Unhandled request error", err, { method: req.method, path: req.originalUrl });
  res.status(500).json({ error: "Internal server error" });
};
