import { createLogger } from "../../shared/logging/logger";
import { formatMoney, roundTo } from "../../shared/utils/number";
import { normalizeCropName, normalizeText, parseArea } from "./yield.parse";
import {
  COST_PER_HA,
  CROP_RECOMMENDATIONS,
  DEFAULT_COST_PER_HA,
  DEFAULT_PRICE_PER_KG,
  GENERAL_RECOMMENDATIONS,
  GROWTH_TIMELINE,
  MISSING_FERTILIZER_WARNING,
  NO_FERTILIZER_KEYWORD,
  PRICE_PER_KG,
  YIELD_TIERS,
} from "./yield.tables";
import type {
  DecisionSupportReport,
  FinancialEstimate,
  SeasonRecordInput,
  YieldCategory,
  YieldEstimate,
} from "./yield.types";

const log = createLogger("decision-support");

const KG_PER_TONNE = 1000;

export function classifyYield(yieldPerHa: number): YieldCategory {
  const tier = YIELD_TIERS.find((t) => yieldPerHa >= t.minYieldPerHa) ?? YIELD_TIERS[YIELD_TIERS.length - 1];
  return { label: tier.label, color: tier.color, background: tier.background };
}

export function recommendationsFor(crop: unknown): string[] {
  return [...(CROP_RECOMMENDATIONS.get(normalizeCropName(crop)) ?? GENERAL_RECOMMENDATIONS)];
}

// Only rule so far: no fertilizer on record.
export function warningsFor(record: SeasonRecordInput): string[] {
  const fertilizer = normalizeText(record.fertilizer);
  if (!fertilizer || fertilizer.includes(NO_FERTILIZER_KEYWORD)) {
    return [MISSING_FERTILIZER_WARNING];
  }
  return [];
}

export function estimateFinancials(crop: unknown, area: number, predictedYield: number): FinancialEstimate {
  const cropKey = normalizeCropName(crop);
  const pricePerKg = PRICE_PER_KG.get(cropKey) ?? DEFAULT_PRICE_PER_KG;
  const costPerHa = COST_PER_HA.get(cropKey) ?? DEFAULT_COST_PER_HA;

  const revenue = predictedYield * KG_PER_TONNE * pricePerKg;
  const cost = costPerHa * area;
  const profit = revenue - cost;
  const profitMargin = revenue > 0 ? roundTo((profit / revenue) * 100, 1) : 0;

  return {
    pricePerKg: formatMoney(pricePerKg),
    estimatedRevenue: formatMoney(revenue),
    estimatedCost: formatMoney(cost),
    estimatedProfit: formatMoney(profit),
    profitMargin,
  };
}

export function generateDecisionSupport(
  record: SeasonRecordInput,
  predictedYield: YieldEstimate,
): DecisionSupportReport | null {
  if (predictedYield === null || !Number.isFinite(predictedYield)) {
    log.warn("Decision support skipped: no yield estimate", { predictedYield });
    return null;
  }

  try {
    const area = parseArea(record.area).value;
    const yieldPerHa = area > 0 ? predictedYield / area : 0;

    return {
      yieldPerHa: roundTo(yieldPerHa, 2),
      yieldCategory: classifyYield(yieldPerHa),
      recommendations: recommendationsFor(record.crop),
      generalRecommendations: [...GENERAL_RECOMMENDATIONS],
      warnings: warningsFor(record),
      financial: estimateFinancials(record.crop, area, predictedYield),
      timeline: GROWTH_TIMELINE.map((stage) => ({ ...stage, tasks: [...stage.tasks] })),
    };
  } catch (err) {
    log.error("Decision support generation failed", err);
    return null;
  }
}
