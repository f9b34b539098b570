/**
 * A season record as the yield engine reads it. Values come from stored
 * records or request bodies, so `area` may still be a numeric string.
 */
export type SeasonRecordInput = {
  crop?: string | null;
  area?: number | string | null;
  sowDate?: string | null;
  harvestDate?: string | null;
  fertilizer?: string | null;
  province?: string | null;
};

/** Tonnes for the whole season, or null when no estimate could be made. */
export type YieldEstimate = number | null;

/** A coerced input value, with a note when a default was substituted. */
export type ParseResult<T> = {
  value: T;
  issue?: string;
};

export type YieldTierLabel = "Very High" | "High" | "Medium" | "Low";

export type YieldTier = {
  minYieldPerHa: number;
  label: YieldTierLabel;
  color: string;
  background: string;
};

export type YieldCategory = Omit<YieldTier, "minYieldPerHa">;

export type GrowthStage = {
  stage: "Sowing" | "Growth" | "Flowering" | "Harvest";
  name: string;
  progress: number;
  tasks: readonly string[];
};

export type FinancialEstimate = {
  pricePerKg: string;
  estimatedRevenue: string;
  estimatedCost: string;
  estimatedProfit: string;
  profitMargin: number;
};

export type DecisionSupportReport = {
  yieldPerHa: number;
  yieldCategory: YieldCategory;
  recommendations: string[];
  generalRecommendations: string[];
  warnings: string[];
  financial: FinancialEstimate;
  timeline: GrowthStage[];
};
