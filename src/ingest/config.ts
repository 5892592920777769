// ingest/config.ts — Configuration resolver: validates and normalizes data source params.
// Pure: never touches the filesystem, so a bad config fails before any read.

import { z } from "zod/v4";

import { ConfigurationError } from "./errors.js";

export const ATTRIBUTE_SYNTAXES = ["yaml", "json"] as const;
export type AttributeSyntax = (typeof ATTRIBUTE_SYNTAXES)[number];

const DEFAULT_CONCURRENCY = 4;

/** Strip leading dots and lower-case, so "MD", ".md" and "md" compare equal. */
export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, "").toLowerCase();
}

const pathListSchema = z.array(z.string().min(1)).default([]);

export const dataSourceParamsSchema = z.object({
  source_root: z.string().trim().min(1, "source_root is required"),
  include: pathListSchema,
  exclude: pathListSchema,
  text_extensions: z
    .array(z.string())
    .transform((list) => list.map(normalizeExtension).filter((ext) => ext.length > 0))
    .pipe(z.array(z.string()).min(1, "text_extensions must not be empty")),
  attribute_syntax: z.enum(ATTRIBUTE_SYNTAXES).default("yaml"),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
});

/** A path fragment matched as a substring, or a `/.../flags` pattern. */
export type ExcludeRule = string | RegExp;

// "/pattern/flags"; stateful flags (g, y) are not accepted
const REGEX_ENTRY = /^\/(.+)\/([imsu]*)$/;

/** Compile exclude entries; plain entries become forward-slash paths without outer slashes. */
function toExcludeRules(entries: readonly string[]): ExcludeRule[] {
  const rules: ExcludeRule[] = [];
  for (const entry of entries) {
    const regex = REGEX_ENTRY.exec(entry);
    if (regex) {
      const [, pattern = "", flags = ""] = regex;
      try {
        rules.push(new RegExp(pattern, flags));
      } catch (err) {
        throw new ConfigurationError(
          `Invalid data source configuration: exclude: bad pattern ${entry}`,
          { cause: err },
        );
      }
      continue;
    }
    const path = entry.replace(/\\/g, "/").replace(/^\/+|\/+$/g, "");
    if (path.length > 0) rules.push(path);
  }
  return rules;
}

export interface DataSourceConfig {
  readonly sourceRoot: string;
  readonly include: readonly string[];
  readonly exclude: readonly ExcludeRule[];
  readonly textExtensions: ReadonlySet<string>;
  readonly attributeSyntax: AttributeSyntax;
  readonly concurrency: number;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/** Validate raw params. Throws ConfigurationError listing every invalid option. */
export function resolveDataSourceConfig(params: unknown): DataSourceConfig {
  const result = dataSourceParamsSchema.safeParse(params ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid data source configuration: ${describeIssues(result.error)}`,
      { cause: result.error },
    );
  }

  const data = result.data;
  return Object.freeze({
    sourceRoot: data.source_root.replace(/[\\/]+$/, "") || "/",
    include: Object.freeze([...data.include]),
    exclude: Object.freeze(toExcludeRules(data.exclude)),
    textExtensions: new Set(data.text_extensions),
    attributeSyntax: data.attribute_syntax,
    concurrency: data.concurrency,
  });
}
