import express, { Express } from "express";
import cors from "cors";
import { config, RequestLogMode } from "../config/env";
import { errorHandler, notFound } from "../middleware/errorHandler";
import { loggerFor } from "../middleware/logger";

export interface AppOptions {
  requestLog?: RequestLogMode;
}

/** cors, JSON bodies and request logging, then the service's own routes. */
export const createBaseApp = (
  options: AppOptions,
  mount: (app: Express) => void,
): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  const logger = loggerFor(options.requestLog ?? config.requestLog);
  if (logger) app.use(logger);

  mount(app);

  app.use(notFound);
  app.use(errorHandler);

  return app;
};
