// ingest/filesystem.ts — Filesystem port used by the walker and the data source, plus the Node adapter.
// Tests swap in an in-memory implementation of the same interface.

import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";

import { FileAccessError, errorMessage } from "./errors.js";

export type EntryKind = "file" | "directory" | "other";

export interface DirEntry {
  name: string;
  kind: EntryKind;
}

export interface FileStat {
  kind: EntryKind;
  mtime: Date;
}

export interface FileSystemPort {
  /** Stat a path, following symlinks. Resolves null when nothing exists there. */
  stat(path: string): Promise<FileStat | null>;
  /** Direct children of a directory. */
  readDir(path: string): Promise<DirEntry[]>;
  /** Whole file as UTF-8 text. */
  readText(path: string): Promise<string>;
}

function isMissing(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

function kindOf(entry: { isFile(): boolean; isDirectory(): boolean }): EntryKind {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  return "other";
}

/** FileSystemPort backed by node:fs/promises. Failures surface as FileAccessError. */
export class NodeFileSystem implements FileSystemPort {
  async stat(path: string): Promise<FileStat | null> {
    try {
      const stats = await stat(path);
      return { kind: kindOf(stats), mtime: stats.mtime };
    } catch (err) {
      if (isMissing(err)) return null;
      throw new FileAccessError(path, `Cannot stat (${errorMessage(err)})`, err);
    }
  }

  async readDir(path: string): Promise<DirEntry[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(path, { withFileTypes: true });
    } catch (err) {
      throw new FileAccessError(path, `Cannot read directory (${errorMessage(err)})`, err);
    }

    const result: DirEntry[] = [];
    for (const entry of entries) {
      if (entry.isSymbolicLink()) {
        // Links to files are followed; links to directories are never descended into
        // and dangling links are dropped
        const target = await this.stat(join(path, entry.name));
        if (target) {
          result.push({ name: entry.name, kind: target.kind === "file" ? "file" : "other" });
        }
        continue;
      }
      result.push({ name: entry.name, kind: kindOf(entry) });
    }
    return result;
  }

  async readText(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (err) {
      throw new FileAccessError(path, `Cannot read file (${errorMessage(err)})`, err);
    }
  }
}
