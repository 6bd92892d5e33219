import { pino } from "pino";
import * as Sentry from "@sentry/node";

import { getConfig } from "./config.js";
import { Database } from "./database/index.js";
import { createDialect } from "./database/dialect.js";
import { RoundService } from "./round/service.js";
import { createHttpApi } from "./http/app.js";

async function main(): Promise<void> {
  const config = getConfig();

  if (config.sentryDsn !== null) {
    Sentry.init({
      environment: config.deploymentEnvironment,
      dsn: config.sentryDsn,
      tracesSampleRate: 1.0,
    });
  }

  const baseLogger = pino({
    level: config.logLevel,
    formatters: {
      level(level) {
        // represent severity as strings so that DataDog can recognize it
        return { level };
      },
    },
  }).child({
    service: `qf-round-${config.deploymentEnvironment}`,
  });

  baseLogger.info({
    msg: "starting",
    buildTag: config.buildTag,
    deploymentEnvironment: config.deploymentEnvironment,
    databaseSchemaName: config.databaseSchemaName,
  });

  const db = new Database({
    dialect: createDialect({
      url: config.databaseUrl,
      logger: baseLogger.child({ subsystem: "Database" }),
    }),
    logger: baseLogger.child({ subsystem: "Database" }),
    schemaName: config.databaseSchemaName,
  });

  if (config.dropDb) {
    await db.dropTables();
  }

  await db.migrate();

  const roundService = new RoundService({
    db,
    logger: baseLogger.child({ subsystem: "RoundService" }),
  });

  const httpApi = createHttpApi({
    logger: baseLogger.child({ subsystem: "HttpApi" }),
    port: config.apiHttpPort,
    buildTag: config.buildTag,
    hostname: config.hostname,
    databaseSchemaName: config.databaseSchemaName,
    roundService,
    enableSentry: config.sentryDsn !== null,
  });

  await httpApi.start();
}

await main();
