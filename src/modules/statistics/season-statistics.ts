import type { SeasonRecord } from "../../shared/storage/storage.types";
import { roundTo } from "../../shared/utils/number";
import { normalizeCropName, normalizeText } from "../yield/yield.parse";

const UNKNOWN_LABEL = "Không xác định";

type Totals = {
  seasonCount: number;
  totalArea: number;
  totalYield: number;
  averageYieldPerHa: number;
};

export type SeasonGroup = Totals & {
  key: string;
  label: string;
};

export type SeasonStatistics = Totals & {
  byCrop: SeasonGroup[];
  byProvince: SeasonGroup[];
};

type Accumulator = {
  seasonCount: number;
  totalArea: number;
  totalYield: number;
  yieldArea: number;
};

const emptyAccumulator = (): Accumulator => ({ seasonCount: 0, totalArea: 0, totalYield: 0, yieldArea: 0 });

function add(acc: Accumulator, season: SeasonRecord): void {
  acc.seasonCount++;
  acc.totalArea += season.area;
  if (season.actualYield !== null) {
    acc.totalYield += season.actualYield;
    acc.yieldArea += season.area;
  }
}

function toTotals(acc: Accumulator): Totals {
  return {
    seasonCount: acc.seasonCount,
    totalArea: roundTo(acc.totalArea, 2),
    totalYield: roundTo(acc.totalYield, 2),
    averageYieldPerHa: acc.yieldArea > 0 ? roundTo(acc.totalYield / acc.yieldArea, 2) : 0,
  };
}

function groupBy(
  seasons: SeasonRecord[],
  keyOf: (season: SeasonRecord) => string,
  labelOf: (season: SeasonRecord) => string,
): SeasonGroup[] {
  const groups = new Map<string, { label: string; acc: Accumulator }>();

  for (const season of seasons) {
    const key = keyOf(season);
    let group = groups.get(key);
    if (!group) {
      group = { label: labelOf(season) || UNKNOWN_LABEL, acc: emptyAccumulator() };
      groups.set(key, group);
    }
    add(group.acc, season);
  }

  return [...groups.entries()]
    .map(([key, { label, acc }]) => ({ key, label, ...toTotals(acc) }))
    .sort((a, b) => b.seasonCount - a.seasonCount || a.key.localeCompare(b.key, "vi"));
}

/** Folds stored seasons into overall, per-crop and per-province totals. */
export function summarizeSeasons(seasons: SeasonRecord[]): SeasonStatistics {
  const overall = emptyAccumulator();
  for (const season of seasons) add(overall, season);

  return {
    ...toTotals(overall),
    byCrop: groupBy(
      seasons,
      (s) => normalizeCropName(s.crop),
      (s) => s.crop.trim(),
    ),
    byProvince: groupBy(
      seasons,
      (s) => normalizeText(s.province),
      (s) => s.province.trim(),
    ),
  };
}
