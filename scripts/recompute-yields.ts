import { SeasonService } from "../src/modules/seasons/season.service";
import { storage } from "../src/shared/db/storage";
import { logger } from "../src/shared/logging/logger";

async function main(): Promise<void> {
  const users = await storage.users.list();
  let updated = 0;
  let skipped = 0;

  // One user at a time keeps writes to the shared store serialized.
  for (const user of users) {
    const result = await SeasonService.recomputeYields(user.id);
    updated += result.updated;
    skipped += result.skipped;
  }

  logger.info("Yield recompute finished", { users: users.length, updated, skipped });
}

main().catch((err: unknown) => {
  logger.error("Yield recompute failed", err);
  process.exit(1);
});
