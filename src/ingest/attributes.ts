// ingest/attributes.ts — Attribute values and the parser for sidecar files and frontmatter blocks.
// Both sources are parsed in the configured syntax (YAML or JSON) and validated into AttributeMap.

import { parse as parseYaml } from "yaml";
import { z } from "zod/v4";

import type { AttributeSyntax } from "./config.js";
import { AttributeParseError, errorMessage } from "./errors.js";

// --- Types ---

export type AttributeValue = string | number | boolean | null | AttributeValue[] | AttributeMap;

/** String-keyed attribute map; key order follows the source document. */
export interface AttributeMap {
  [key: string]: AttributeValue;
}

export const attributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(attributeValueSchema),
    attributeMapSchema,
  ]),
);

export const attributeMapSchema: z.ZodType<AttributeMap> = z.lazy(() =>
  z.record(z.string(), attributeValueSchema),
);

export interface FrontmatterResult {
  attributes: AttributeMap;
  /** Content with the frontmatter block removed (unchanged when there is none) */
  body: string;
  /** Whether a frontmatter block was found and consumed */
  found: boolean;
}

// --- Frontmatter ---

// Opening "---" on the first line, closing "---" on its own line. The lazy optional
// group lets an empty block ("---\n---") close on the very next line.
const FRONTMATTER_REGEX = /^\uFEFF?---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)??---[ \t]*(?:\r?\n|$)/;

// --- Parser ---

/** Path of the first `__proto__` key (or re-prototyped object), which a rebuilt map would lose. */
function findPrototypeKey(value: unknown, path: string[]): string[] | null {
  if (value === null || typeof value !== "object") return null;
  if (Array.isArray(value)) {
    for (const [index, child] of value.entries()) {
      const found = findPrototypeKey(child, [...path, String(index)]);
      if (found) return found;
    }
    return null;
  }
  if (Object.getPrototypeOf(value) !== Object.prototype) return [...path, "__proto__"];
  for (const [key, child] of Object.entries(value)) {
    if (key === "__proto__") return [...path, key];
    const found = findPrototypeKey(child, [...path, key]);
    if (found) return found;
  }
  return null;
}

export class AttributeParser {
  constructor(readonly syntax: AttributeSyntax) {}

  /**
   * Parse a whole document (a sidecar file or a frontmatter block) into an attribute map.
   * Blank documents give `{}`. Throws AttributeParseError naming `filePath` otherwise.
   */
  parseDocument(source: string, filePath: string): AttributeMap {
    if (source.trim().length === 0) return {};

    let parsed: unknown;
    try {
      parsed = this.syntax === "json" ? JSON.parse(source) : parseYaml(source);
    } catch (err) {
      throw new AttributeParseError(filePath, errorMessage(err), err);
    }

    // A YAML document holding only comments parses to null
    if (parsed === null || parsed === undefined) return {};

    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new AttributeParseError(filePath, `expected a ${this.syntax} mapping at the top level`);
    }

    const reserved = findPrototypeKey(parsed, []);
    if (reserved) {
      throw new AttributeParseError(filePath, `key "__proto__" is not allowed at "${reserved.join(".")}"`);
    }

    const result = attributeMapSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
      throw new AttributeParseError(filePath, `unsupported value${where}`, result.error);
    }
    return result.data;
  }

  /** Split a leading frontmatter block off `content` and parse it. */
  parseFrontmatter(content: string, filePath: string): FrontmatterResult {
    const match = FRONTMATTER_REGEX.exec(content);
    if (!match) {
      return { attributes: {}, body: content, found: false };
    }

    return {
      attributes: this.parseDocument(match[1] ?? "", filePath),
      body: content.slice(match[0].length),
      found: true,
    };
  }
}
