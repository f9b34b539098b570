import cors from "cors";
import express from "express";
import helmet from "helmet";
import { apiRouter } from "./routes";
import { errorHandler, notFoundHandler } from "./shared/http/error-handler";

export const createApp = () => {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.use("/api/v1", apiRouter);
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
