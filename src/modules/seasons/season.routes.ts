import { Router } from "express";
import { asyncHandler } from "../../shared/http/async-handler";
import { SeasonController } from "./season.controller";

export const seasonRouter = Router();

seasonRouter.get("/", asyncHandler(SeasonController.list));
seasonRouter.post("/", asyncHandler(SeasonController.create));
seasonRouter.post("/recompute-yields", asyncHandler(SeasonController.recomputeYields));
seasonRouter.get("/:seasonId", asyncHandler(SeasonController.get));
seasonRouter.get("/:seasonId/decision-support", asyncHandler(SeasonController.decisionSupport));
seasonRouter.patch("/:seasonId", asyncHandler(SeasonController.update));
seasonRouter.delete("/:seasonId", asyncHandler(SeasonController.remove));
