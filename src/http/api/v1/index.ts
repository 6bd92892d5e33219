import express, {
  type NextFunction,
  type Request,
  type Response,
} from "express";
import * as Sentry from "@sentry/node";
import { ZodError } from "zod";

import ClientError from "../clientError.js";
import { createHandler as createRoundsHandler } from "./rounds.js";
import { createHandler as createStatusHandler } from "./status.js";
import type { HttpApiConfig } from "../../app.js";

export const createHandler = (config: HttpApiConfig): express.Router => {
  const router = express.Router();

  router.use(createRoundsHandler(config));
  router.use(createStatusHandler(config));

  // handle uncaught errors
  router.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction) => {
      // return client errors
      if (err instanceof ClientError) {
        res.status(err.status);
        res.send({ error: err.message });
        return;
      }

      if (err instanceof ZodError) {
        res.status(400);
        res.send({ error: "Invalid request", issues: err.issues });
        return;
      }

      config.logger.error({ msg: "Unexpected exception", err });

      Sentry.captureException(err);

      res.statusCode = 500;
      res.send({
        error: "Internal server error",
      });
    }
  );

  return router;
};
