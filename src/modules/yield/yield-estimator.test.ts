import assert from "node:assert/strict";
import test from "node:test";
import {
  estimateYield,
  fertilizerFactorFor,
  growthFactorFor,
  regionFactorFor,
} from "./yield-estimator";
import { parseArea, parseIsoDate, resolveGrowthDays } from "./yield.parse";
import type { SeasonRecordInput } from "./yield.types";

test("estimates the An Giang rice season at 16.45 t", () => {
  const record: SeasonRecordInput = {
    crop: "lúa",
    area: 2,
    sowDate: "2024-01-01",
    harvestDate: "2024-04-10",
    fertilizer: "NPK",
    province: "An Giang",
  };

  assert.deepEqual(resolveGrowthDays(record.sowDate, record.harvestDate), { value: 100 });
  assert.equal(growthFactorFor(100), 1.0);
  assert.equal(fertilizerFactorFor(record.fertilizer), 1.15);
  assert.equal(regionFactorFor(record.province), 1.3);
  assert.equal(estimateYield(record), 16.45);
});

test("every known crop with default dates and no fertilizer uses base x 0.9 x 0.8", () => {
  const expected: Record<string, number> = {
    "lúa": 3.96,
    "ngô": 3.46,
    "cà phê": 1.58,
    "cao su": 1.3,
    "mía": 43.2,
    "sắn": 14.4,
    "khoai lang": 8.64,
    "đậu tương": 1.15,
    "lạc": 1.66,
    "hồ tiêu": 2.02,
    "điều": 0.86,
  };

  for (const [crop, value] of Object.entries(expected)) {
    assert.equal(estimateYield({ crop, area: 1, fertilizer: "không" }), value, crop);
  }
});

test("omitted fertilizer and province are neutral", () => {
  assert.equal(estimateYield({ crop: "lúa", area: 1 }), 4.95);
});

test("crop names are matched case- and whitespace-insensitively, with English aliases", () => {
  assert.equal(estimateYield({ crop: "  LÚA ", area: 1 }), 4.95);
  assert.equal(estimateYield({ crop: "Rice", area: 1 }), 4.95);
  assert.equal(estimateYield({ crop: "Sugarcane", area: 1 }), 54);
});

test("unknown crops use a base of 4.0 t/ha", () => {
  assert.equal(estimateYield({ crop: "dragonfruit", area: 1 }), 3.6);
});

test("yield scales linearly with area", () => {
  const records: SeasonRecordInput[] = [
    { crop: "lúa", fertilizer: "NPK", province: "Đồng Tháp" },
    { crop: "cà phê", fertilizer: "hữu cơ", province: "Đắk Lắk", sowDate: "2024-01-01", harvestDate: "2024-06-01" },
    { crop: "dragonfruit" },
  ];

  for (const record of records) {
    const single = estimateYield({ ...record, area: 1.5 });
    const double = estimateYield({ ...record, area: 3 });
    assert.ok(single !== null && double !== null);
    assert.ok(Math.abs(double - 2 * single) <= 0.016, `${record.crop}: ${double} vs 2 x ${single}`);
  }
});

test("non-numeric area behaves like a missing area", () => {
  const base: SeasonRecordInput = { crop: "lúa", fertilizer: "NPK" };
  const omitted = estimateYield(base);

  assert.equal(estimateYield({ ...base, area: "abc" }), omitted);
  assert.equal(estimateYield({ ...base, area: null }), omitted);
  assert.equal(estimateYield({ ...base, area: -3 }), omitted);
  assert.equal(estimateYield({ ...base, area: "0x10" }), omitted);
  assert.equal(estimateYield({ ...base, area: "0b11" }), omitted);
  assert.equal(estimateYield({ ...base, area: "0o7" }), omitted);
  assert.notEqual(omitted, null);
});

test("numeric strings are accepted as area", () => {
  assert.equal(estimateYield({ crop: "lúa", area: "3" }), 14.85);
});

test("parseArea reports the substituted default", () => {
  assert.deepEqual(parseArea("2.5"), { value: 2.5 });
  assert.deepEqual(parseArea(0), { value: 0 });
  assert.deepEqual(parseArea(" 1.5e1 "), { value: 15 });
  assert.deepEqual(parseArea(".5"), { value: 0.5 });
  assert.equal(parseArea("0x10").value, 1);
  assert.equal(parseArea("abc").value, 1);
  assert.equal(parseArea("abc").issue, 'area "abc" is not a valid number of hectares, using 1 ha');
  assert.equal(parseArea(undefined).issue, "area missing, using 1 ha");
});

test("growth duration is clamped to 60 and 180 days", () => {
  assert.deepEqual(resolveGrowthDays("2024-01-01", "2024-01-11"), {
    value: 60,
    issue: "growth duration 10 days clamped to 60",
  });
  assert.deepEqual(resolveGrowthDays("2024-01-01", "2025-02-04"), {
    value: 180,
    issue: "growth duration 400 days clamped to 180",
  });

  assert.equal(estimateYield({ crop: "lúa", area: 1, sowDate: "2024-01-01", harvestDate: "2024-01-11" }), 3.85);
  assert.equal(estimateYield({ crop: "lúa", area: 1, sowDate: "2024-01-01", harvestDate: "2025-02-04" }), 6.6);
});

test("a harvest before sowing is clamped to 60 days, not rejected (known quirk)", () => {
  assert.deepEqual(resolveGrowthDays("2024-04-10", "2024-01-01"), {
    value: 60,
    issue: "growth duration -100 days clamped to 60",
  });
  assert.equal(estimateYield({ crop: "lúa", area: 1, sowDate: "2024-04-10", harvestDate: "2024-01-01" }), 3.85);
});

test("missing or invalid dates default to 90 days", () => {
  assert.equal(resolveGrowthDays(undefined, "2024-04-10").value, 90);
  assert.equal(resolveGrowthDays("2024-02-30", "2024-06-01").value, 90);
  assert.equal(resolveGrowthDays("01/02/2024", "2024-06-01").value, 90);
  assert.equal(parseIsoDate("2024-02-29")?.toISOString(), "2024-02-29T00:00:00.000Z");
  assert.equal(parseIsoDate("2023-02-29"), null);
});

test("growth factor is a step function", () => {
  const cases: [number, number][] = [
    [60, 0.7],
    [79, 0.7],
    [80, 0.9],
    [99, 0.9],
    [100, 1.0],
    [119, 1.0],
    [120, 1.1],
    [149, 1.1],
    [150, 1.2],
    [180, 1.2],
  ];

  for (const [days, factor] of cases) {
    assert.equal(growthFactorFor(days), factor, `${days} days`);
  }
});

test("fertilizer keywords are scanned in order: organic, inorganic, NPK, manure, none", () => {
  assert.equal(fertilizerFactorFor("NPK + phân hữu cơ"), 1.2);
  assert.equal(fertilizerFactorFor("phân vô cơ NPK"), 1.1);
  assert.equal(fertilizerFactorFor("NPK 16-16-8"), 1.15);
  assert.equal(fertilizerFactorFor("Phân chuồng hoai"), 1.18);
  assert.equal(fertilizerFactorFor("Không bón"), 0.8);
  assert.equal(fertilizerFactorFor("urê"), 1.0);
  assert.equal(fertilizerFactorFor(""), 1.0);
  assert.equal(fertilizerFactorFor(undefined), 1.0);
});

test("province keywords match by substring, first entry wins", () => {
  assert.equal(regionFactorFor("Tỉnh An Giang"), 1.3);
  assert.equal(regionFactorFor("ĐỒNG THÁP"), 1.25);
  assert.equal(regionFactorFor("Ninh Thuận"), 0.85);
  assert.equal(regionFactorFor("Hà Nội"), 1.0);
});

test("the record is left untouched", () => {
  const record: SeasonRecordInput = Object.freeze({ crop: "ngô", area: "2", fertilizer: "NPK" });
  assert.equal(estimateYield(record), 9.94);
  assert.deepEqual(record, { crop: "ngô", area: "2", fertilizer: "NPK" });
});

test("returns null instead of throwing when a field cannot be read", () => {
  const record: SeasonRecordInput = {
    get crop(): string {
      throw new Error("boom");
    },
  };

  assert.equal(estimateYield(record), null);
});
