// ingest/walker.ts — Enumerates candidate files under the content, layouts and includes roots.
// Ids are forward-slash paths relative to the directory that was scanned.

import { basename, isAbsolute, join, resolve } from "node:path";

import type { DataSourceConfig, ExcludeRule } from "./config.js";
import { FileAccessError } from "./errors.js";
import type { FileSystemPort } from "./filesystem.js";

export const SIDECAR_SUFFIX = ".meta";

export interface WalkEntry {
  /** Relative path with forward slashes */
  id: string;
  /** Absolute path on the filesystem */
  absPath: string;
  /** Directory part of `id` ("" at the top level) */
  relativeDir: string;
}

interface ScanOptions {
  /** Extra filename filter; return true to skip the file */
  skipFile?: (name: string) => boolean;
}

/** Dot-files and dot-directories (.git, .DS_Store...) are skipped unless explicitly included. */
function isHidden(name: string): boolean {
  return name.startsWith(".");
}

function dirOf(id: string): string {
  const slash = id.lastIndexOf("/");
  return slash === -1 ? "" : id.slice(0, slash);
}

function byId(a: WalkEntry, b: WalkEntry): number {
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Check an id against exclude rules. Plain entries match anywhere in the id
 * ("posts/2020" drops "posts/2020-05-01-x.md"); patterns are tested against the whole id.
 */
export function matchesExclude(id: string, excludes: readonly ExcludeRule[]): boolean {
  return excludes.some((rule) => (typeof rule === "string" ? id.includes(rule) : rule.test(id)));
}

async function scanDirectory(
  fs: FileSystemPort,
  root: string,
  options: ScanOptions,
): Promise<WalkEntry[]> {
  const entries: WalkEntry[] = [];

  async function visit(dir: string, prefix: string): Promise<void> {
    for (const child of await fs.readDir(dir)) {
      if (isHidden(child.name)) continue;
      const id = prefix ? `${prefix}/${child.name}` : child.name;
      const absPath = join(dir, child.name);
      if (child.kind === "directory") {
        await visit(absPath, id);
      } else if (child.kind === "file" && !options.skipFile?.(child.name)) {
        entries.push({ id, absPath, relativeDir: prefix });
      }
    }
  }

  await visit(root, "");
  return entries.sort(byId);
}

/**
 * Walk a root directory recursively. A missing optional root yields [];
 * a missing required root is a FileAccessError.
 */
export async function walkRoot(
  fs: FileSystemPort,
  root: string,
  required: boolean,
  options: ScanOptions = {},
): Promise<WalkEntry[]> {
  const info = await fs.stat(root);
  if (info?.kind !== "directory") {
    if (required) throw new FileAccessError(root, "Directory not found");
    return [];
  }
  return scanDirectory(fs, root, options);
}

export interface ContentWalkResult {
  entries: WalkEntry[];
  /** Include entries that were neither a file nor a directory */
  skippedIncludes: string[];
}

/**
 * Walk `<source_root>/content`, merging `include` directories and files and dropping
 * `exclude` matches. Sidecar files are never returned as entries.
 */
export async function walkContent(
  fs: FileSystemPort,
  config: DataSourceConfig,
): Promise<ContentWalkResult> {
  const contentRoot = join(config.sourceRoot, "content");
  const skipFile = (name: string) => name.endsWith(SIDECAR_SUFFIX);

  const scanned = await walkRoot(fs, contentRoot, true, { skipFile });
  const explicit: WalkEntry[] = [];
  const skippedIncludes: string[] = [];

  for (const include of config.include) {
    const path = isAbsolute(include) ? include : resolve(contentRoot, include);
    const info = await fs.stat(path);
    if (info?.kind === "directory") {
      scanned.push(...(await scanDirectory(fs, path, { skipFile })));
    } else if (info?.kind === "file") {
      const id = basename(path);
      explicit.push({ id, absPath: path, relativeDir: "" });
    } else {
      skippedIncludes.push(include);
    }
  }

  const kept = scanned.filter((entry) => !matchesExclude(entry.id, config.exclude));
  return { entries: [...kept, ...explicit], skippedIncludes };
}
