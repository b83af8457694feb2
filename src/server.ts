import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { AppConfig } from "./configs/environment";
import { errorMiddleware, notFoundHandler } from "./middlewares/error.middleware";
import { detailedColoredLogger } from "./middlewares/logger.middleware";
import { createRateLimiter } from "./middlewares/validation.middleware";
import { createRoutes } from "./routes";
import { CatalogStore } from "./services/catalogStore.service";
import { RequestLog } from "./services/requestLog.service";

export interface ServerDependencies {
  config: AppConfig;
  catalog: CatalogStore;
  requestLog: RequestLog;
}

export const createServer = ({ config, catalog, requestLog }: ServerDependencies) => {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin.includes("*") ? "*" : config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(createRateLimiter(config));
  if (config.nodeEnv !== "test") {
    app.use(detailedColoredLogger);
  }

  app.use(
    "/",
    createRoutes({ catalog, requestLog, adminPassword: config.admin.password })
  );

  app.use(notFoundHandler);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
};
