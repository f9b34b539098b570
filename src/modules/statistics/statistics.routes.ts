import { Router } from "express";
import { asyncHandler } from "../../shared/http/async-handler";
import { StatisticsController } from "./statistics.controller";

export const statisticsRouter = Router();

statisticsRouter.get("/", asyncHandler(StatisticsController.summary));
