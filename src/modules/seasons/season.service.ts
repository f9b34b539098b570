import { storage } from "../../shared/db/storage";
import { ApiError } from "../../shared/http/api-error";
import { createLogger } from "../../shared/logging/logger";
import type { SeasonPatch, SeasonRecord } from "../../shared/storage/storage.types";
import { estimateYield } from "../yield/yield-estimator";
import { YieldService, type SeasonAssessment } from "../yield/yield.service";
import type { CreateSeasonInput, UpdateSeasonInput } from "./season.dto";

const log = createLogger("seasons");

export const AUTO_COMPUTED = "auto-computed";

// Fields the yield estimate is derived from.
const YIELD_INPUTS = ["crop", "area", "sowDate", "harvestDate", "fertilizer", "province"] as const;

function assertDateOrder(sowDate: string | null, harvestDate: string | null): void {
  // ISO dates compare correctly as strings.
  if (sowDate && harvestDate && harvestDate < sowDate) {
    throw new ApiError(400, "Harvest date must not be before sow date");
  }
}

/** Newest sowing first; undated seasons last, newest entry first. */
function compareSeasons(a: SeasonRecord, b: SeasonRecord): number {
  if (a.sowDate !== b.sowDate) {
    if (!a.sowDate) return 1;
    if (!b.sowDate) return -1;
    return a.sowDate < b.sowDate ? 1 : -1;
  }
  if (a.createdAt === b.createdAt) return 0;
  return a.createdAt < b.createdAt ? 1 : -1;
}

export type RecomputeResult = {
  updated: number;
  skipped: number;
};

export class SeasonService {
  static async list(userId: string): Promise<SeasonRecord[]> {
    const seasons = await storage.seasons.list(userId);
    return seasons.sort(compareSeasons);
  }

  static async get(userId: string, seasonId: string): Promise<SeasonRecord> {
    const season = await storage.seasons.get(userId, seasonId);
    if (!season) {
      throw new ApiError(404, "Season not found");
    }
    return season;
  }

  static async create(userId: string, input: CreateSeasonInput): Promise<SeasonRecord> {
    const sowDate = input.sowDate ?? null;
    const harvestDate = input.harvestDate ?? null;
    assertDateOrder(sowDate, harvestDate);

    const actualYield = input.actualYield ?? null;

    return storage.seasons.create({
      userId,
      crop: input.crop,
      area: input.area,
      sowDate,
      harvestDate,
      fertilizer: input.fertilizer ?? "",
      province: input.province ?? "",
      notes: input.notes ?? null,
      actualYield,
      yieldComputedAt: null,
      yieldSource: actualYield === null ? null : "manual",
    });
  }

  static async update(userId: string, seasonId: string, input: UpdateSeasonInput): Promise<SeasonRecord> {
    const existing = await this.get(userId, seasonId);

    assertDateOrder(
      input.sowDate === undefined ? existing.sowDate : input.sowDate,
      input.harvestDate === undefined ? existing.harvestDate : input.harvestDate,
    );

    const patch: SeasonPatch = {};
    if (input.crop !== undefined) patch.crop = input.crop;
    if (input.area !== undefined) patch.area = input.area;
    if (input.sowDate !== undefined) patch.sowDate = input.sowDate;
    if (input.harvestDate !== undefined) patch.harvestDate = input.harvestDate;
    if (input.fertilizer !== undefined) patch.fertilizer = input.fertilizer;
    if (input.province !== undefined) patch.province = input.province;
    if (input.notes !== undefined) patch.notes = input.notes;
    if (input.actualYield !== undefined) {
      patch.actualYield = input.actualYield;
      patch.yieldSource = input.actualYield === null ? null : "manual";
      patch.yieldComputedAt = null;
    } else if (existing.yieldSource === AUTO_COMPUTED && YIELD_INPUTS.some((key) => input[key] !== undefined)) {
      // The stored estimate no longer matches the record; recompute-yields fills it in again.
      patch.actualYield = null;
      patch.yieldSource = null;
      patch.yieldComputedAt = null;
    }

    const season = await storage.seasons.update(userId, seasonId, patch);
    if (!season) {
      throw new ApiError(404, "Season not found");
    }
    return season;
  }

  static async remove(userId: string, seasonId: string): Promise<void> {
    const removed = await storage.seasons.remove(userId, seasonId);
    if (!removed) {
      throw new ApiError(404, "Season not found");
    }
  }

  static async decisionSupport(userId: string, seasonId: string): Promise<SeasonAssessment> {
    const season = await this.get(userId, seasonId);
    return YieldService.assess(season);
  }

  /**
   * Writes an estimated yield into every season that has no manually
   * entered one. Records are updated one at a time.
   */
  static async recomputeYields(userId: string): Promise<RecomputeResult> {
    const seasons = await storage.seasons.list(userId);
    const result: RecomputeResult = { updated: 0, skipped: 0 };

    for (const season of seasons) {
      if (season.yieldSource === "manual") {
        result.skipped++;
        continue;
      }

      const predictedYield = estimateYield(season);
      if (predictedYield === null) {
        result.skipped++;
        continue;
      }

      const saved = await storage.seasons.update(userId, season.id, {
        actualYield: predictedYield,
        yieldComputedAt: new Date().toISOString(),
        yieldSource: AUTO_COMPUTED,
      });
      // Deleted since the list was read.
      if (!saved) {
        result.skipped++;
        continue;
      }
      result.updated++;
    }

    log.info("Recomputed season yields", { userId, ...result });
    return result;
  }
}
