// ingest/errors.ts — Error taxonomy for an ingestion run. Every class carries a stable code.

export type IngestErrorCode = "CONFIG_ERROR" | "ATTRIBUTE_PARSE_ERROR" | "FILE_ACCESS_ERROR";

interface IngestErrorOptions {
  /** File or directory the failure relates to */
  filePath?: string;
  cause?: unknown;
}

/** Base class for all ingestion errors. */
export class IngestError extends Error {
  readonly code: IngestErrorCode;
  readonly filePath?: string;

  constructor(code: IngestErrorCode, message: string, options: IngestErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.filePath = options.filePath;
  }
}

/** Invalid or missing data source parameter. Raised before any file is touched. */
export class ConfigurationError extends IngestError {
  constructor(message: string, options?: IngestErrorOptions) {
    super("CONFIG_ERROR", message, options);
  }
}

/** Malformed sidecar or frontmatter document. */
export class AttributeParseError extends IngestError {
  declare readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super("ATTRIBUTE_PARSE_ERROR", `Invalid attributes in "${filePath}": ${message}`, {
      filePath,
      cause,
    });
  }
}

/** Unexpected filesystem failure (permissions, I/O, missing content root). */
export class FileAccessError extends IngestError {
  constructor(filePath: string, message: string, cause?: unknown) {
    super("FILE_ACCESS_ERROR", `${message}: ${filePath}`, { filePath, cause });
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
