import { Request, Response } from "express";
import { z } from "zod";
import { authUserId } from "../../shared/auth/auth.middleware";
import { createSeasonSchema, updateSeasonSchema } from "./season.dto";
import { SeasonService } from "./season.service";

const seasonIdSchema = z.object({ seasonId: z.string().min(1).max(128) });

export class SeasonController {
  static async list(req: Request, res: Response): Promise<void> {
    const data = await SeasonService.list(authUserId(req));
    res.json({ data });
  }

  static async get(req: Request, res: Response): Promise<void> {
    const { seasonId } = seasonIdSchema.parse(req.params);
    const data = await SeasonService.get(authUserId(req), seasonId);
    res.json({ data });
  }

  static async create(req: Request, res: Response): Promise<void> {
    const payload = createSeasonSchema.parse(req.body);
    const data = await SeasonService.create(authUserId(req), payload);
    res.status(201).json({ data });
  }

  static async update(req: Request, res: Response): Promise<void> {
    const { seasonId } = seasonIdSchema.parse(req.params);
    const payload = updateSeasonSchema.parse(req.body);
    const data = await SeasonService.update(authUserId(req), seasonId, payload);
    res.json({ data });
  }

  static async remove(req: Request, res: Response): Promise<void> {
    const { seasonId } = seasonIdSchema.parse(req.params);
    await SeasonService.remove(authUserId(req), seasonId);
    res.status(204).send();
  }

  static async decisionSupport(req: Request, res: Response): Promise<void> {
    const { seasonId } = seasonIdSchema.parse(req.params);
    const data = await SeasonService.decisionSupport(authUserId(req), seasonId);
    res.json({ data });
  }

  static async recomputeYields(req: Request, res: Response): Promise<void> {
    const data = await SeasonService.recomputeYields(authUserId(req));
    res.json({ data });
  }
}
