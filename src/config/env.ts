// config/env.ts — Zod-validated environment variables for the ingestion script.
// Data source options read here are validated again by the configuration resolver.

import { config } from "dotenv";
import { z } from "zod/v4";

config();

// Extensions read as text; everything else is treated as binary.
const DEFAULT_TEXT_EXTENSIONS =
  "htm,html,html.twig,twig.html,twig,js,less,markdown,md,mkd,mkdn,coffee,css,erb,haml," +
  "handlebars,hb,ms,mustache,php,rb,sass,scss,slim,txt,xhtml,xml";

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // Site directory holding content/, layouts/ and includes/
  SOURCE_ROOT: z.string().optional(),

  // Comma-separated lists
  TEXT_EXTENSIONS: z.string().default(DEFAULT_TEXT_EXTENSIONS),
  INCLUDE: z.string().default(""),
  EXCLUDE: z.string().default(""),

  ATTRIBUTE_SYNTAX: z.string().default("yaml"),

  INGEST_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Build raw data source params from the environment. `source_root` is passed
 * through as-is (possibly empty) so the resolver reports the problem.
 */
export function getDataSourceParams(source: Env = env): Record<string, unknown> {
  return {
    source_root: source.SOURCE_ROOT ?? "",
    include: splitList(source.INCLUDE),
    exclude: splitList(source.EXCLUDE),
    text_extensions: splitList(source.TEXT_EXTENSIONS),
    attribute_syntax: source.ATTRIBUTE_SYNTAX,
    concurrency: source.INGEST_CONCURRENCY,
  };
}
