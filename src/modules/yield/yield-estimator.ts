import { createLogger } from "../../shared/logging/logger";
import { roundTo } from "../../shared/utils/number";
import { matchKeywordFactor, normalizeCropName, parseArea, resolveGrowthDays } from "./yield.parse";
import {
  BASE_YIELD_T_PER_HA,
  DEFAULT_BASE_YIELD_T_PER_HA,
  FERTILIZER_FACTORS,
  GROWTH_FACTOR_STEPS,
  REGION_FACTORS,
  SHORT_SEASON_GROWTH_FACTOR,
} from "./yield.tables";
import type { SeasonRecordInput, YieldEstimate } from "./yield.types";

const log = createLogger("yield-estimator");

export function baseYieldFor(crop: unknown): number {
  return BASE_YIELD_T_PER_HA.get(normalizeCropName(crop)) ?? DEFAULT_BASE_YIELD_T_PER_HA;
}

export function growthFactorFor(days: number): number {
  return GROWTH_FACTOR_STEPS.find((step) => days >= step.minDays)?.factor ?? SHORT_SEASON_GROWTH_FACTOR;
}

export function fertilizerFactorFor(fertilizer: unknown): number {
  return matchKeywordFactor(fertilizer, FERTILIZER_FACTORS);
}

export function regionFactorFor(province: unknown): number {
  return matchKeywordFactor(province, REGION_FACTORS);
}

/**
 * Estimated total harvest in tonnes, rounded to 2 decimals.
 *
 * base(crop) x growth(days) x fertilizer x region gives t/ha, scaled by
 * area. Bad inputs are defaulted; anything that still fails is logged and
 * reported as `null`.
 */
export function estimateYield(record: SeasonRecordInput): YieldEstimate {
  try {
    const area = parseArea(record.area);
    const growthDays = resolveGrowthDays(record.sowDate, record.harvestDate);

    for (const issue of [area.issue, growthDays.issue]) {
      if (issue) log.debug("Defaulted season input", { issue });
    }

    const perHa =
      baseYieldFor(record.crop) *
      growthFactorFor(growthDays.value) *
      fertilizerFactorFor(record.fertilizer) *
      regionFactorFor(record.province);

    const total = roundTo(perHa * area.value, 2);
    if (!Number.isFinite(total)) {
      log.error("Yield estimate is not a finite number", undefined, { perHa, area: area.value });
      return null;
    }

    return total;
  } catch (err) {
    log.error("Yield estimation failed", err);
    return null;
  }
}
