import {
  CROP_ALIASES,
  DEFAULT_GROWTH_DAYS,
  MAX_GROWTH_DAYS,
  MIN_GROWTH_DAYS,
  type KeywordFactor,
  NEUTRAL_FACTOR,
} from "./yield.tables";
import type { ParseResult } from "./yield.types";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
// Plain decimal numerals only; `Number` would also take "0x10" or "0b11".
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function toDecimal(value: string): number {
  const trimmed = value.trim();
  return DECIMAL.test(trimmed) ? Number(trimmed) : Number.NaN;
}

export function normalizeText(value: unknown): string {
  if (typeof value !== "string") return "";
  return value.normalize("NFC").trim().toLowerCase();
}

export function normalizeCropName(value: unknown): string {
  const name = normalizeText(value);
  return CROP_ALIASES.get(name) ?? name;
}

/**
 * Hectares. Missing, non-numeric, non-finite or negative input falls back
 * to 1; zero is kept so callers can see an empty plot.
 */
export function parseArea(value: unknown): ParseResult<number> {
  if (value === undefined || value === null || (typeof value === "string" && value.trim() === "")) {
    return { value: 1, issue: "area missing, using 1 ha" };
  }

  const n = typeof value === "number" ? value : typeof value === "string" ? toDecimal(value) : Number.NaN;
  if (!Number.isFinite(n) || n < 0) {
    return { value: 1, issue: `area ${JSON.stringify(value)} is not a valid number of hectares, using 1 ha` };
  }

  return { value: n };
}

/** Strict calendar date in `YYYY-MM-DD`; 2024-02-30 is rejected. */
export function parseIsoDate(value: unknown): Date | null {
  if (typeof value !== "string") return null;
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Days between sowing and harvest, clamped to [60, 180]. A harvest before
 * sowing is clamped as well rather than rejected.
 */
export function resolveGrowthDays(sowDate: unknown, harvestDate: unknown): ParseResult<number> {
  const sow = parseIsoDate(sowDate);
  const harvest = parseIsoDate(harvestDate);
  if (!sow || !harvest) {
    return { value: DEFAULT_GROWTH_DAYS, issue: `sow/harvest dates unavailable, using ${DEFAULT_GROWTH_DAYS} days` };
  }

  const raw = Math.round((harvest.getTime() - sow.getTime()) / DAY_MS);
  const clamped = Math.min(MAX_GROWTH_DAYS, Math.max(MIN_GROWTH_DAYS, raw));
  if (clamped !== raw) {
    return { value: clamped, issue: `growth duration ${raw} days clamped to ${clamped}` };
  }
  return { value: raw };
}

export function matchKeywordFactor(text: unknown, table: readonly KeywordFactor[]): number {
  const normalized = normalizeText(text);
  if (!normalized) return NEUTRAL_FACTOR;
  return table.find((entry) => normalized.includes(entry.keyword))?.factor ?? NEUTRAL_FACTOR;
}
