import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { createFileStorage } from "./file-storage";
import { DuplicateEmailError, type NewSeason } from "./storage.types";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "mua-vu-storage-"));
}

function newSeason(userId: string, crop: string): NewSeason {
  return {
    userId,
    crop,
    area: 1,
    sowDate: "2024-01-01",
    harvestDate: null,
    fertilizer: "NPK",
    province: "Long An",
    notes: null,
    actualYield: null,
    yieldComputedAt: null,
    yieldSource: null,
  };
}

test("users are found by email regardless of case and survive a reload", async () => {
  const dir = tempDir();
  const storage = createFileStorage(dir);

  const user = await storage.users.create({
    email: "grower@example.com",
    passwordHash: "hash",
    displayName: "Grower",
  });

  assert.equal((await storage.users.findByEmail(" Grower@Example.com "))?.id, user.id);
  assert.equal((await storage.users.findById(user.id))?.email, "grower@example.com");
  assert.equal(await storage.users.findById("missing"), null);

  const reloaded = createFileStorage(dir);
  assert.deepEqual(await reloaded.users.list(), [user]);
});

test("concurrent creates with the same email keep exactly one user", async () => {
  const dir = tempDir();
  const storage = createFileStorage(dir);
  const emails = ["grower@example.com", "GROWER@example.com", " grower@example.com"];

  const results = await Promise.allSettled(
    emails.map((email) => storage.users.create({ email, passwordHash: "hash", displayName: "Grower" })),
  );

  assert.deepEqual(
    results.map((r) => r.status),
    ["fulfilled", "rejected", "rejected"],
  );
  for (const r of results) {
    if (r.status === "rejected") assert.ok(r.reason instanceof DuplicateEmailError);
  }
  const users = await createFileStorage(dir).users.list();
  assert.equal(users.length, 1);
  assert.equal(users[0]?.email, "grower@example.com");
});

test("seasons are scoped to their owner", async () => {
  const storage = createFileStorage(tempDir());

  const mine = await storage.seasons.create(newSeason("user-a", "lúa"));
  await storage.seasons.create(newSeason("user-b", "ngô"));

  assert.deepEqual(
    (await storage.seasons.list("user-a")).map((s) => s.crop),
    ["lúa"],
  );
  assert.equal(await storage.seasons.get("user-b", mine.id), null);
  assert.equal(await storage.seasons.update("user-b", mine.id, { crop: "mía" }), null);
  assert.equal(await storage.seasons.remove("user-b", mine.id), false);
  assert.equal((await storage.seasons.get("user-a", mine.id))?.crop, "lúa");
});

test("update merges the patch and remove deletes the record", async () => {
  const dir = tempDir();
  const storage = createFileStorage(dir);
  const season = await storage.seasons.create(newSeason("user-a", "lúa"));

  const updated = await storage.seasons.update("user-a", season.id, { actualYield: 4.95, yieldSource: "auto-computed" });
  assert.ok(updated);
  assert.equal(updated.actualYield, 4.95);
  assert.equal(updated.yieldSource, "auto-computed");
  assert.equal(updated.crop, "lúa");
  assert.equal(updated.createdAt, season.createdAt);

  assert.equal(await storage.seasons.remove("user-a", season.id), true);
  assert.deepEqual(await createFileStorage(dir).seasons.list("user-a"), []);
});

test("concurrent writes are serialized and none is lost", async () => {
  const dir = tempDir();
  const storage = createFileStorage(dir);

  await Promise.all(Array.from({ length: 10 }, (_, i) => storage.seasons.create(newSeason("user-a", `crop-${i}`))));

  assert.equal((await storage.seasons.list("user-a")).length, 10);
  const onDisk: unknown = JSON.parse(fs.readFileSync(path.join(dir, "seasons.json"), "utf8"));
  assert.ok(Array.isArray(onDisk));
  assert.equal(onDisk.length, 10);
});

test("a corrupt data file is reported instead of being overwritten", async () => {
  const dir = tempDir();
  fs.writeFileSync(path.join(dir, "users.json"), JSON.stringify([{ id: "x" }]));
  const storage = createFileStorage(dir);

  await assert.rejects(storage.users.list());
  assert.equal(fs.readFileSync(path.join(dir, "users.json"), "utf8"), JSON.stringify([{ id: "x" }]));
});
