import * as admin from "firebase-admin";
import { createLogger } from "../logging/logger";
import { withRetry } from "./retry";
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

const log = createLogger("firestore-storage");

const USERS = "users";
const SEASONS = "seasons";

export type FirestoreStorageOptions = {
  credentialsPath?: string;
  projectId?: string;
  retryAttempts: number;
};

type Retry = <T>(label: string, fn: () => Promise<T>) => Promise<T>;

function toUser(doc: admin.firestore.DocumentSnapshot): UserRecord {
  return storedUserSchema.parse({ ...doc.data(), id: doc.id });
}

function toSeason(doc: admin.firestore.DocumentSnapshot): SeasonRecord {
  return storedSeasonSchema.parse({ ...doc.data(), id: doc.id });
}

class FirestoreUserRepository implements UserRepository {
  constructor(
    private readonly db: admin.firestore.Firestore,
    private readonly retry: Retry,
  ) {}

  async findByEmail(email: string): Promise<UserRecord | null> {
    const snapshot = await this.retry("users.findByEmail", () =>
      this.db.collection(USERS).where("email", "==", email.trim().toLowerCase()).limit(1).get(),
    );
    const [doc] = snapshot.docs;
    return doc ? toUser(doc) : null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const doc = await this.retry("users.findById", () => this.db.collection(USERS).doc(id).get());
    return doc.exists ? toUser(doc) : null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    const users = this.db.collection(USERS);
    const ref = users.doc();
    const email = input.email.trim().toLowerCase();
    const user: UserRecord = { ...input, email, id: ref.id, createdAt: new Date().toISOString() };
    const { id: _id, ...data } = user;

    // The email query is read inside the transaction, so a concurrent insert forces a retry.
    await this.retry("users.create", () =>
      this.db.runTransaction(async (tx) => {
        const taken = await tx.get(users.where("email", "==", email).limit(1));
        if (!taken.empty) {
          throw new DuplicateEmailError(email);
        }
        tx.create(ref, data);
      }),
    );
    return user;
  }

  async list(): Promise<UserRecord[]> {
    const snapshot = await this.retry("users.list", () => this.db.collection(USERS).get());
    return snapshot.docs.map(toUser);
  }
}

class FirestoreSeasonRepository implements SeasonRepository {
  constructor(
    private readonly db: admin.firestore.Firestore,
    private readonly retry: Retry,
  ) {}

  async list(userId: string): Promise<SeasonRecord[]> {
    const snapshot = await this.retry("seasons.list", () =>
      this.db.collection(SEASONS).where("userId", "==", userId).get(),
    );
    return snapshot.docs.map(toSeason);
  }

  async get(userId: string, seasonId: string): Promise<SeasonRecord | null> {
    const doc = await this.retry("seasons.get", () => this.db.collection(SEASONS).doc(seasonId).get());
    if (!doc.exists) return null;

    const season = toSeason(doc);
    return season.userId === userId ? season : null;
  }

  async create(input: NewSeason): Promise<SeasonRecord> {
    const ref = this.db.collection(SEASONS).doc();
    const now = new Date().toISOString();
    const season: SeasonRecord = { ...input, id: ref.id, createdAt: now, updatedAt: now };
    const { id: _id, ...data } = season;
    await this.retry("seasons.create", () => ref.set(data));
    return season;
  }

  async update(userId: string, seasonId: string, patch: SeasonPatch): Promise<SeasonRecord | null> {
    const existing = await this.get(userId, seasonId);
    if (!existing) return null;

    const updated: SeasonRecord = { ...existing, ...patch, updatedAt: new Date().toISOString() };
    const { id: _id, ...data } = updated;
    await this.retry("seasons.update", () => this.db.collection(SEASONS).doc(seasonId).set(data));
    return updated;
  }

  async remove(userId: string, seasonId: string): Promise<boolean> {
    const existing = await this.get(userId, seasonId);
    if (!existing) return false;

    await this.retry("seasons.remove", () => this.db.collection(SEASONS).doc(seasonId).delete());
    return true;
  }
}

function initFirebase(options: FirestoreStorageOptions): admin.app.App {
  if (admin.apps.length > 0) {
    return admin.app();
  }

  const credential = options.credentialsPath
    ? admin.credential.cert(options.credentialsPath)
    : admin.credential.applicationDefault();

  return admin.initializeApp({ credential, projectId: options.projectId });
}

export const createFirestoreStorage = (options: FirestoreStorageOptions): Storage => {
  const app = initFirebase(options);
  const db = app.firestore();
  log.info("Using Firestore storage", { projectId: options.projectId ?? app.options.projectId ?? null });

  const retry: Retry = (label, fn) => withRetry(fn, {
      attempts: options.retryAttempts,
      label,
      logger: log,
      shouldRetry: (err) => !(err instanceof DuplicateEmailError),
    });

  return {
    users: new FirestoreUserRepository(db, retry),
    seasons: new FirestoreSeasonRepository(db, retry),
  };
};
