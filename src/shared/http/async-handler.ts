import type { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forwards a rejected controller promise to the express error handler. */
export const asyncHandler =
  (route: AsyncRoute): RequestHandler =>
  (req: Request, res: Response, next: NextFunction): void => {
    route(req, res).catch(next);
  };
