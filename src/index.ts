// index.ts — Public API of the ingestion package.

export type { AttributeMap, AttributeValue, FrontmatterResult } from "./ingest/attributes.js";
export { AttributeParser } from "./ingest/attributes.js";
export { deriveCategories } from "./ingest/categories.js";
export { ItemCollection } from "./ingest/collection.js";
export type { AttributeSyntax, DataSourceConfig, ExcludeRule } from "./ingest/config.js";
export { resolveDataSourceConfig } from "./ingest/config.js";
export {
  AttributeParseError,
  ConfigurationError,
  FileAccessError,
  IngestError,
} from "./ingest/errors.js";
export type { FileInfo } from "./ingest/file-info.js";
export { getFileInfo } from "./ingest/file-info.js";
export type { DateFilename } from "./ingest/filename.js";
export { parseDateFilename } from "./ingest/filename.js";
export type { DataSourceDeps, IngestResult } from "./ingest/filesystem-data-source.js";
export { FilesystemDataSource, ingest } from "./ingest/filesystem-data-source.js";
export type { DirEntry, EntryKind, FileStat, FileSystemPort } from "./ingest/filesystem.js";
export { NodeFileSystem } from "./ingest/filesystem.js";
export type { ContentSnapshot, ItemRole, PathSnapshot } from "./ingest/item.js";
export { Item } from "./ingest/item.js";
