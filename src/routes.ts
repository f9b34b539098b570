import { Router } from "express";
import { authRouter } from "./modules/auth/auth.routes";
import { seasonRouter } from "./modules/seasons/season.routes";
import { statisticsRouter } from "./modules/statistics/statistics.routes";
import { yieldRouter } from "./modules/yield/yield.routes";
import { requireAuth } from "./shared/auth/auth.middleware";
import { auditMutatingUserAction } from "./shared/audit/user-action.middleware";

export const apiRouter = Router();

apiRouter.get("/health", (_req, res) => {
  res.json({ ok: true, service: "mua-vu-api" });
});

apiRouter.use("/auth", authRouter);

const mountProtected = (path: string, router: Router): void => {
  apiRouter.use(path, requireAuth, auditMutatingUserAction, router);
};

mountProtected("/seasons", seasonRouter);
mountProtected("/yield", yieldRouter);
mountProtected("/statistics", statisticsRouter);
