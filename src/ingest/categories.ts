// ingest/categories.ts — Categories from a content item's directory under "posts/".

import type { AttributeMap } from "./attributes.js";

const POSTS_PREFIX = "posts/";

/**
 * Categories for a relative directory ("posts/tech/js" -> ["tech", "js"]).
 * Items directly under posts/ get []; anything outside posts/ gets null.
 */
export function deriveCategories(relativeDir: string): string[] | null {
  const dir = relativeDir.endsWith("/") ? relativeDir : `${relativeDir}/`;
  if (!dir.startsWith(POSTS_PREFIX)) return null;

  return dir
    .slice(POSTS_PREFIX.length)
    .split("/")
    .filter((segment) => segment.length > 0);
}

/** Set `categories` unless the key is already present, even with a null value. */
export function applyCategories(attributes: AttributeMap, relativeDir: string): void {
  if (Object.hasOwn(attributes, "categories")) return;
  const categories = deriveCategories(relativeDir);
  if (categories !== null) {
    attributes.categories = categories;
  }
}
