//  this catches async errors so uncaught promise rejects call the error handler
import "express-async-errors";

import express from "express";
import type { Logger } from "pino";
import { pinoHttp } from "pino-http";
import cors from "cors";
import * as Sentry from "@sentry/node";

import { createHandler as createApiHandler } from "./api/v1/index.js";
import type { RoundService } from "../round/service.js";

export interface HttpApiConfig {
  logger: Logger;
  port: number;
  buildTag: string | null;
  hostname: string;
  databaseSchemaName: string | null;
  roundService: RoundService;
  enableSentry: boolean;
}

interface HttpApi {
  start: () => Promise<void>;
  app: express.Application;
}

export const createHttpApi = (config: HttpApiConfig): HttpApi => {
  const app = express();

  app.set("trust proxy", true);
  app.use(cors());
  app.use(express.json());
  app.use(pinoHttp({ logger: config.logger }));

  const api = createApiHandler(config);

  if (config.enableSentry) {
    app.use(
      Sentry.Handlers.requestHandler({
        // default is "cookies", "data", "headers", "method", "query_string", "url"
        request: [
          "cookies",
          "data",
          "headers",
          "method",
          "query_string",
          "url",
          "body",
        ],
      })
    );
  }

  app.use((_req, res, next) => {
    if (config.buildTag !== null) {
      res.setHeader("x-build-tag", config.buildTag);
    }
    res.setHeader("x-machine-hostname", config.hostname);
    next();
  });

  app.use("/api/v1", api);

  if (config.enableSentry) {
    app.use(Sentry.Handlers.errorHandler());
  }

  return {
    app,
    start() {
      return new Promise<void>((resolve) => {
        app.listen(config.port, () => {
          config.logger.info(`http api listening on port ${config.port}`);
          resolve();
        });
      });
    },
  };
};
