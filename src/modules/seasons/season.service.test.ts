import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test, { mock } from "node:test";

process.env.JWT_ACCESS_SECRET = "test_access_secret_min_16_chars";
process.env.STORAGE_BACKEND = "file";
process.env.DATA_DIR = fs.mkdtempSync(path.join(os.tmpdir(), "mua-vu-season-service-"));

test("recompute counts a season removed mid-run as skipped", async () => {
  const { storage } = await import("../../shared/db/storage");
  const { SeasonService } = await import("./season.service");

  await SeasonService.create("user-a", { crop: "lúa", area: 2, fertilizer: "NPK" });
  const update = mock.method(storage.seasons, "update", async () => null);

  try {
    assert.deepEqual(await SeasonService.recomputeYields("user-a"), { updated: 0, skipped: 1 });
    assert.equal(update.mock.callCount(), 1);
  } finally {
    update.mock.restore();
  }

  const [season] = await storage.seasons.list("user-a");
  assert.equal(season?.actualYield, null);
});
