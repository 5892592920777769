// ingest/filename.ts — Date-prefixed filename convention ("2020-05-01-hello-world").

import type { AttributeMap } from "./attributes.js";

// Anchored at both ends: "notes-2020-05-01-x" is not a dated name.
const DATE_FILENAME_REGEX = /^(\d{4})-(\d{2})-(\d{2})-(.+)$/;

export interface DateFilename {
  year: string;
  month: string;
  day: string;
  /** Remainder after the date prefix, e.g. "hello-world" */
  titlePath: string;
}

/** Match a filename (extension already removed) against the date-prefix convention. */
export function parseDateFilename(filename: string): DateFilename | null {
  const match = DATE_FILENAME_REGEX.exec(filename);
  if (!match) return null;
  const [, year, month, day, titlePath] = match;
  if (!year || !month || !day || !titlePath) return null;
  return { year, month, day, titlePath };
}

/**
 * Add `title_path`, and `title`/`date` where not already present, for dated filenames.
 * Explicit attributes always win over the filename-derived defaults; a null value counts as unset.
 */
export function applyFilenameConvention(attributes: AttributeMap, filename: string): void {
  const parsed = parseDateFilename(filename);
  if (!parsed) return;

  attributes.title_path = parsed.titlePath;
  if (attributes.title === undefined || attributes.title === null) {
    attributes.title = parsed.titlePath.split("-").join(" ");
  }
  if (attributes.date === undefined || attributes.date === null) {
    attributes.date = `${parsed.year}-${parsed.month}-${parsed.day}`;
  }
}
