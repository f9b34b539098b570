import { Router } from "express";
import { asyncHandler } from "../../shared/http/async-handler";
import { YieldController } from "./yield.controller";

export const yieldRouter = Router();

yieldRouter.post("/predict", asyncHandler(YieldController.predict));
