import { NextFunction, Request, Response } from "express";
import { storage } from "../db/storage";
import { ApiError } from "../http/api-error";
import { tokenService, AccessTokenPayload } from "./token.service";

declare global {
  namespace Express {
    interface Request {
      auth?: AccessTokenPayload;
    }
  }
}

export const requireAuth = (req: Request, _res: Response, next: NextFunction): void => {
  void (async () => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith("Bearer ")) {
      throw new ApiError(401, "Missing bearer token");
    }

    let payload: AccessTokenPayload;
    try {
      payload = tokenService.verifyAccessToken(header.slice("Bearer ".length));
    } catch {
      throw new ApiError(401, "Invalid bearer token");
    }

    const user = await storage.users.findById(payload.sub);
    if (!user) {
      throw new ApiError(401, "Session is no longer valid");
    }

    req.auth = { sub: user.id, email: user.email };
    next();
  })().catch(next);
};

/** The authenticated user's id; only call behind `requireAuth`. */
export const authUserId = (req: Request): string => {
  if (!req.auth) {
    throw new ApiError(401, "Missing auth context");
  }
  return req.auth.sub;
};
