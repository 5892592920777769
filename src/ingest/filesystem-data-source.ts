// ingest/filesystem-data-source.ts — Data source facade: configure, process the three roots, read collections.
// Per-file work runs with p-limit concurrency; insertion is serialized in walk order so results are deterministic.

import { join } from "node:path";

import pLimit from "p-limit";

import { type Logger, logger as rootLogger } from "../config/logger.js";
import { type AttributeMap, AttributeParser } from "./attributes.js";
import { applyCategories } from "./categories.js";
import { ItemCollection } from "./collection.js";
import { type DataSourceConfig, resolveDataSourceConfig } from "./config.js";
import { FileAccessError } from "./errors.js";
import { getFileInfo } from "./file-info.js";
import { applyFilenameConvention } from "./filename.js";
import { type FileSystemPort, NodeFileSystem } from "./filesystem.js";
import { Item, type ItemRole } from "./item.js";
import { SIDECAR_SUFFIX, type WalkEntry, walkContent, walkRoot } from "./walker.js";

export interface DataSourceDeps {
  fs?: FileSystemPort;
  logger?: Logger;
}

export interface IngestResult {
  items: ReadonlyMap<string, Item>;
  layouts: ReadonlyMap<string, Item>;
  includes: ReadonlyMap<string, Item>;
}

interface Collections {
  items: ItemCollection;
  layouts: ItemCollection;
  includes: ItemCollection;
}

function toForwardSlashes(path: string): string {
  return path.replace(/\\/g, "/");
}

/**
 * Reads `<source_root>/content`, `layouts` and `includes` into three id-keyed collections.
 *
 * Usage is configure() → process() → getItems()/getLayouts()/getIncludes(). Each process()
 * call builds fresh collections; if it throws, the accessors stay unavailable.
 */
export class FilesystemDataSource {
  private readonly fs: FileSystemPort;
  private readonly log: Logger;
  private config: DataSourceConfig | null = null;
  private parser: AttributeParser | null = null;
  private collections: Collections | null = null;

  constructor(
    private readonly params: unknown,
    deps: DataSourceDeps = {},
  ) {
    this.fs = deps.fs ?? new NodeFileSystem();
    this.log = deps.logger ?? rootLogger;
  }

  /** Validate params. Throws ConfigurationError; performs no filesystem access. */
  configure(): DataSourceConfig {
    const config = resolveDataSourceConfig(this.params);
    this.config = config;
    this.parser = new AttributeParser(config.attributeSyntax);
    this.collections = null;
    return config;
  }

  async process(): Promise<void> {
    const { config, parser } = this;
    if (!config || !parser) {
      throw new Error("FilesystemDataSource.configure() must be called before process()");
    }
    this.collections = null;

    const collections: Collections = {
      items: new ItemCollection("content", this.log),
      layouts: new ItemCollection("layout", this.log),
      includes: new ItemCollection("include", this.log),
    };

    const content = await walkContent(this.fs, config);
    for (const skipped of content.skippedIncludes) {
      this.log.debug({ path: skipped }, "Include path is neither a file nor a directory, skipping");
    }
    await this.processEntries(content.entries, "content", collections.items, config, parser);

    const layouts = await walkRoot(this.fs, join(config.sourceRoot, "layouts"), false);
    await this.processEntries(layouts, "layout", collections.layouts, config, parser);

    const includes = await walkRoot(this.fs, join(config.sourceRoot, "includes"), false);
    await this.processEntries(includes, "include", collections.includes, config, parser);

    this.log.info(
      {
        sourceRoot: config.sourceRoot,
        items: collections.items.size,
        layouts: collections.layouts.size,
        includes: collections.includes.size,
      },
      "Filesystem data source processed",
    );
    this.collections = collections;
  }

  getItems(): ReadonlyMap<string, Item> {
    return this.completed().items.toMap();
  }

  getLayouts(): ReadonlyMap<string, Item> {
    return this.completed().layouts.toMap();
  }

  getIncludes(): ReadonlyMap<string, Item> {
    return this.completed().includes.toMap();
  }

  private completed(): Collections {
    if (!this.collections) {
      throw new Error("FilesystemDataSource.process() has not completed");
    }
    return this.collections;
  }

  private async processEntries(
    entries: WalkEntry[],
    role: ItemRole,
    collection: ItemCollection,
    config: DataSourceConfig,
    parser: AttributeParser,
  ): Promise<void> {
    const limit = pLimit(config.concurrency);
    const items = await Promise.all(
      entries.map((entry) => limit(() => this.buildItem(entry, role, config, parser))),
    );
    for (const item of items) {
      collection.add(item);
    }
  }

  private async buildItem(
    entry: WalkEntry,
    role: ItemRole,
    config: DataSourceConfig,
    parser: AttributeParser,
  ): Promise<Item> {
    const info = getFileInfo(entry.id, config.textExtensions);
    const stat = await this.fs.stat(entry.absPath);
    if (stat?.kind !== "file") {
      throw new FileAccessError(entry.absPath, "File disappeared during ingestion");
    }

    const raw = info.isBinary ? "" : await this.fs.readText(entry.absPath);
    let body = raw;
    let attributes: AttributeMap = {};

    if (role !== "include" && !info.isBinary) {
      const sidecar = role === "content" ? await this.readSidecar(entry) : null;
      if (sidecar !== null) {
        attributes = parser.parseDocument(sidecar.text, sidecar.path);
      } else {
        const frontmatter = parser.parseFrontmatter(raw, entry.absPath);
        attributes = frontmatter.attributes;
        body = frontmatter.body;
      }
    }

    attributes.mtime = stat.mtime.toISOString();
    attributes.filename = info.filename;
    attributes.extension = info.extension;

    applyFilenameConvention(attributes, info.filename);
    if (role === "content") {
      applyCategories(attributes, entry.relativeDir);
    }

    return new Item({
      id: entry.id,
      role,
      isBinary: info.isBinary,
      raw,
      body,
      sourcePath: info.isBinary ? toForwardSlashes(entry.absPath) : undefined,
      attributes,
    });
  }

  /** Sidecar metadata lives beside the file as `<name>.meta`. */
  private async readSidecar(entry: WalkEntry): Promise<{ path: string; text: string } | null> {
    const path = `${entry.absPath}${SIDECAR_SUFFIX}`;
    const info = await this.fs.stat(path);
    if (info?.kind !== "file") return null;
    return { path, text: await this.fs.readText(path) };
  }
}

/** One-shot ingestion run: configure, process and return the three collections. */
export async function ingest(params: unknown, deps: DataSourceDeps = {}): Promise<IngestResult> {
  const source = new FilesystemDataSource(params, deps);
  source.configure();
  await source.process();
  return {
    items: source.getItems(),
    layouts: source.getLayouts(),
    includes: source.getIncludes(),
  };
}
