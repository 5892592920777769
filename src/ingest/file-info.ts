// ingest/file-info.ts — Filename/extension resolution and the binary classifier.
// Multi-part text extensions ("html.twig") win over the last dotted segment.

import { posix } from "node:path";

export interface FileInfo {
  /** Basename without its extension */
  filename: string;
  /** Lower-cased extension without the leading dot ("" when there is none) */
  extension: string;
  /** True when the extension is not a configured text extension */
  isBinary: boolean;
}

/**
 * Resolve filename, extension and binary-ness for a path.
 * Names starting with a dot and holding no other dot (".htaccess") have no extension.
 */
export function getFileInfo(path: string, textExtensions: ReadonlySet<string>): FileInfo {
  const base = posix.basename(path.replace(/\\/g, "/"));
  const lowerBase = base.toLowerCase();

  // Longest configured extension the name ends with, as long as something remains before it
  let extension = "";
  for (const candidate of textExtensions) {
    if (
      candidate.length > extension.length &&
      lowerBase.endsWith(`.${candidate}`) &&
      lowerBase.length > candidate.length + 1
    ) {
      extension = candidate;
    }
  }

  if (extension) {
    return {
      filename: base.slice(0, base.length - extension.length - 1),
      extension,
      isBinary: false,
    };
  }

  const dot = base.lastIndexOf(".");
  if (dot <= 0) {
    return { filename: base, extension: "", isBinary: true };
  }

  return {
    filename: base.slice(0, dot),
    extension: lowerBase.slice(dot + 1),
    isBinary: true,
  };
}

