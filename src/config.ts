import "dotenv/config";
import { parseArgs } from "node:util";
import { z } from "zod";
import os from "node:os";

export type Config = {
  buildTag: string | null;
  apiHttpPort: number;
  logLevel: "trace" | "debug" | "info" | "warn" | "error";
  sentryDsn: string | null;
  databaseUrl: string;
  databaseSchemaName: string | null;
  hostname: string;
  deploymentEnvironment: "local" | "development" | "staging" | "production";
  dropDb: boolean;
};

export function getConfig(): Config {
  const buildTag = z
    .union([z.string(), z.null()])
    .default(null)
    .parse(process.env.BUILD_TAG);

  const apiHttpPort = z.coerce.number().default(4000).parse(process.env.PORT);

  const deploymentEnvironment = z
    .union([
      z.literal("local"),
      z.literal("development"),
      z.literal("staging"),
      z.literal("production"),
    ])
    .default("local")
    .parse(process.env.DEPLOYMENT_ENVIRONMENT);

  const { values: args } = parseArgs({
    options: {
      "drop-db": {
        type: "boolean",
      },
      "log-level": {
        type: "string",
      },
    },
  });

  const logLevel = z
    .union([
      z.literal("trace"),
      z.literal("debug"),
      z.literal("info"),
      z.literal("warn"),
      z.literal("error"),
    ])
    .default("info")
    .parse(args["log-level"] ?? process.env.LOG_LEVEL);

  const sentryDsn = z
    .union([z.string(), z.null()])
    .default(null)
    .parse(process.env.SENTRY_DSN);

  // postgres://... or sqlite:<path>
  const databaseUrl = z
    .string()
    .refine(
      (value) =>
        value.startsWith("sqlite:") || z.string().url().safeParse(value).success,
      "DATABASE_URL must be a postgres URL or sqlite:<path>"
    )
    .parse(process.env.DATABASE_URL);

  // sqlite has no schemas
  const databaseSchemaName = databaseUrl.startsWith("sqlite:")
    ? null
    : z
        .string()
        .regex(/^[a-z_][a-z0-9_]*$/)
        .default("qf_round")
        .parse(process.env.DATABASE_SCHEMA);

  const dropDb = z.boolean().default(false).parse(args["drop-db"]);

  return {
    buildTag,
    apiHttpPort,
    logLevel,
    sentryDsn,
    databaseUrl,
    databaseSchemaName,
    hostname: os.hostname(),
    deploymentEnvironment,
    dropDb,
  };
}
