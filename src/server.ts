import { createApp } from "./app";
import { env } from "./config/env";
import { logger } from "./shared/logging/logger";

const app = createApp();

const server = app.listen(env.PORT, () => {
  logger.info("API listening", { port: env.PORT, storage: env.STORAGE_BACKEND, nodeEnv: env.NODE_ENV });
});

const shutdown = (signal: string): void => {
  logger.info("Shutting down", { signal });
  server.close((err) => {
    if (err) {
      logger.error("Server close failed", err);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
