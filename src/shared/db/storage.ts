import { env } from "../../config/env";
import { createFileStorage } from "../storage/file-storage";
import { createFirestoreStorage } from "../storage/firestore-storage";
import type { Storage } from "../storage/storage.types";

export const storage: Storage =
  env.STORAGE_BACKEND === "firestore"
    ? createFirestoreStorage({
        credentialsPath: env.FIREBASE_CREDENTIALS_PATH,
        projectId: env.FIREBASE_PROJECT_ID,
        retryAttempts: env.STORAGE_RETRY_ATTEMPTS,
      })
    : createFileStorage(env.DATA_DIR);
