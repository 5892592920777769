// ingest/item.ts — Item: one ingested file with its content/path snapshots and attributes.
// Items are frozen once built; the rendering stage receives them by reference.

import type { AttributeMap, AttributeValue } from "./attributes.js";

export type ItemRole = "content" | "layout" | "include";

/** `raw` is the file text as read; `body` drops a consumed frontmatter block. */
export type ContentSnapshot = "raw" | "body";

/** `relative` is the id-relative path; `source` the absolute path of a binary file. */
export type PathSnapshot = "relative" | "source";

export interface ItemInit {
  id: string;
  role: ItemRole;
  isBinary: boolean;
  raw: string;
  body?: string;
  sourcePath?: string;
  attributes: AttributeMap;
}

function deepFreeze(value: AttributeValue): void {
  if (value === null || typeof value !== "object") return;
  const children: AttributeValue[] = Array.isArray(value) ? value : Object.values(value);
  for (const child of children) deepFreeze(child);
  Object.freeze(value);
}

export class Item {
  readonly id: string;
  readonly role: ItemRole;
  readonly isBinary: boolean;
  readonly attributes: Readonly<AttributeMap>;
  private readonly contents: ReadonlyMap<ContentSnapshot, string>;
  private readonly paths: ReadonlyMap<PathSnapshot, string>;

  constructor(init: ItemInit) {
    this.id = init.id;
    this.role = init.role;
    this.isBinary = init.isBinary;
    deepFreeze(init.attributes);
    this.attributes = init.attributes;

    const raw = init.isBinary ? "" : init.raw;
    this.contents = new Map<ContentSnapshot, string>([
      ["raw", raw],
      ["body", init.isBinary ? "" : (init.body ?? raw)],
    ]);

    const paths = new Map<PathSnapshot, string>([["relative", init.id]]);
    if (init.isBinary && init.sourcePath) paths.set("source", init.sourcePath);
    this.paths = paths;

    Object.freeze(this);
  }

  /** Effective body: the frontmatter-stripped text when frontmatter was consumed. */
  get content(): string {
    return this.getContent("body");
  }

  getContent(snapshot: ContentSnapshot = "body"): string {
    return this.contents.get(snapshot) ?? "";
  }

  /** Path for a snapshot, or undefined (text items have no `source` path). */
  getPath(snapshot: PathSnapshot = "relative"): string | undefined {
    return this.paths.get(snapshot);
  }
}
