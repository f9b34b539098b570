import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { createLogger } from "../logging/logger";
import {
  DuplicateEmailError,
  type NewSeason,
  type NewUser,
  type SeasonPatch,
  type SeasonRecord,
  type SeasonRepository,
  type Storage,
  type UserRecord,
  type UserRepository,
  storedSeasonSchema,
  storedUserSchema,
} from "./storage.types";

const log = createLogger("file-storage");

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * One JSON array per file. Mutations run one after another on a single
 * promise chain and land on disk through a temp file + rename.
 */
class JsonFileCollection<T extends { id: string }> {
  private cache: T[] | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly parse: (raw: unknown) => T[],
  ) {}

  async all(): Promise<T[]> {
    await this.queue;
    return [...(await this.load())];
  }

  mutate<R>(fn: (items: T[]) => R): Promise<R> {
    const run = this.queue.then(async () => {
      const items = [...(await this.load())];
      const result = fn(items);
      await this.persist(items);
      this.cache = items;
      return result;
    });

    // The caller sees the failure through `run`; the chain itself keeps going.
    this.queue = run.catch((err: unknown) => {
      log.warn("Mutation rejected", {
        file: this.filePath,
        error: err instanceof Error ? err.message : String(err),
      });
    });
    return run;
  }

  private async load(): Promise<T[]> {
    if (this.cache) return this.cache;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.cache = [];
        return this.cache;
      }
      throw err;
    }

    this.cache = this.parse(JSON.parse(raw));
    return this.cache;
  }

  private async persist(items: T[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, `${JSON.stringify(items, null, 2)}\n`, "utf8");
    await fs.rename(tmp, this.filePath);
  }
}

class FileUserRepository implements UserRepository {
  constructor(private readonly collection: JsonFileCollection<UserRecord>) {}

  async findByEmail(email: string): Promise<UserRecord | null> {
    const needle = email.trim().toLowerCase();
    const users = await this.collection.all();
    return users.find((u) => u.email.toLowerCase() === needle) ?? null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const users = await this.collection.all();
    return users.find((u) => u.id === id) ?? null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    const email = input.email.trim().toLowerCase();
    const user: UserRecord = { ...input, email, id: crypto.randomUUID(), createdAt: new Date().toISOString() };
    // Checked inside the write queue so two registrations cannot both pass.
    await this.collection.mutate((items) => {
      if (items.some((u) => u.email.toLowerCase() === email)) {
        throw new DuplicateEmailError(email);
      }
      items.push(user);
    });
    return user;
  }

  async list(): Promise<UserRecord[]> {
    return this.collection.all();
  }
}

class FileSeasonRepository implements SeasonRepository {
  constructor(private readonly collection: JsonFileCollection<SeasonRecord>) {}

  async list(userId: string): Promise<SeasonRecord[]> {
    const seasons = await this.collection.all();
    return seasons.filter((s) => s.userId === userId);
  }

  async get(userId: string, seasonId: string): Promise<SeasonRecord | null> {
    const seasons = await this.collection.all();
    return seasons.find((s) => s.id === seasonId && s.userId === userId) ?? null;
  }

  async create(input: NewSeason): Promise<SeasonRecord> {
    const now = new Date().toISOString();
    const season: SeasonRecord = { ...input, id: crypto.randomUUID(), createdAt: now, updatedAt: now };
    await this.collection.mutate((items) => {
      items.push(season);
    });
    return season;
  }

  update(userId: string, seasonId: string, patch: SeasonPatch): Promise<SeasonRecord | null> {
    return this.collection.mutate((items) => {
      const index = items.findIndex((s) => s.id === seasonId && s.userId === userId);
      if (index < 0) return null;

      const updated: SeasonRecord = { ...items[index], ...patch, updatedAt: new Date().toISOString() };
      items[index] = updated;
      return updated;
    });
  }

  remove(userId: string, seasonId: string): Promise<boolean> {
    return this.collection.mutate((items) => {
      const index = items.findIndex((s) => s.id === seasonId && s.userId === userId);
      if (index < 0) return false;
      items.splice(index, 1);
      return true;
    });
  }
}

export const createFileStorage = (dataDir: string): Storage => {
  const root = path.resolve(dataDir);
  log.info("Using flat-file storage", { dataDir: root });

  return {
    users: new FileUserRepository(
      new JsonFileCollection(path.join(root, "users.json"), (raw) => z.array(storedUserSchema).parse(raw)),
    ),
    seasons: new FileSeasonRepository(
      new JsonFileCollection(path.join(root, "seasons.json"), (raw) => z.array(storedSeasonSchema).parse(raw)),
    ),
  };
};
