import { Request, Response } from "express";
import { predictYieldSchema } from "./yield.dto";
import { YieldService } from "./yield.service";

export class YieldController {
  static async predict(req: Request, res: Response): Promise<void> {
    const record = predictYieldSchema.parse(req.body);
    res.json({ data: YieldService.assess(record) });
  }
}
