import { Request, Response } from "express";
import { authUserId } from "../../shared/auth/auth.middleware";
import { StatisticsService } from "./statistics.service";

export class StatisticsController {
  static async summary(req: Request, res: Response): Promise<void> {
    const data = await StatisticsService.forUser(authUserId(req));
    res.json({ data });
  }
}
