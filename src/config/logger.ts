// config/logger.ts — Pino structured logger (JSON in prod, pretty in dev, silent under test).
// Reads NODE_ENV and LOG_LEVEL on its own so importing the library never runs the strict env schema.

import pino, { type Logger } from "pino";
import { z } from "zod/v4";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const nodeEnv = process.env.NODE_ENV ?? "development";
const isDev = nodeEnv === "development";
const defaultLevel = nodeEnv === "test" ? "silent" : isDev ? "debug" : "info";

// An unknown LOG_LEVEL falls back to the default rather than failing the import
const level = z.enum(LOG_LEVELS).safeParse(process.env.LOG_LEVEL);

export const logger: Logger = pino({
  level: level.success ? level.data : defaultLevel,
  ...(isDev && {
    transport: {
      target: "pino-pretty",
      options: { colorize: true },
    },
  }),
});

export type { Logger };
