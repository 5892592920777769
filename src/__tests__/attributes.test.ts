// Tests for the attribute parser (sidecar documents and frontmatter blocks).

import { describe, expect, it } from "vitest";

import { AttributeParser } from "../ingest/attributes.js";
import { AttributeParseError } from "../ingest/errors.js";

const yaml = new AttributeParser("yaml");
const json = new AttributeParser("json");

describe("AttributeParser.parseDocument", () => {
  it("parses a YAML mapping keeping nested values and key order", () => {
    const attributes = yaml.parseDocument(
      "title: Hello\ntags: [a, b]\nauthor:\n  name: Ana\n  posts: 3\ndraft: false\n",
      "/site/content/index.html.meta",
    );
    expect(attributes).toEqual({
      title: "Hello",
      tags: ["a", "b"],
      author: { name: "Ana", posts: 3 },
      draft: false,
    });
    expect(Object.keys(attributes)).toEqual(["title", "tags", "author", "draft"]);
  });

  it("keeps YAML dates as strings", () => {
    expect(yaml.parseDocument("date: 2021-02-03", "x.meta")).toEqual({ date: "2021-02-03" });
  });

  it("parses JSON documents", () => {
    expect(json.parseDocument('{"title": "Hi", "layout": null}', "x.meta")).toEqual({
      title: "Hi",
      layout: null,
    });
  });

  it("returns an empty map for blank or comment-only documents", () => {
    expect(yaml.parseDocument("", "x.meta")).toEqual({});
    expect(yaml.parseDocument("  \n", "x.meta")).toEqual({});
    expect(yaml.parseDocument("# nothing here\n", "x.meta")).toEqual({});
    expect(json.parseDocument("\n", "x.meta")).toEqual({});
  });

  it("throws AttributeParseError naming the file on malformed YAML", () => {
    let caught: unknown;
    try {
      yaml.parseDocument("title: [unclosed", "/site/content/broken.md");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AttributeParseError);
    if (caught instanceof AttributeParseError) {
      expect(caught.filePath).toBe("/site/content/broken.md");
      expect(caught.code).toBe("ATTRIBUTE_PARSE_ERROR");
      expect(caught.message).toContain('Invalid attributes in "/site/content/broken.md"');
    }
  });

  it("throws on malformed JSON", () => {
    expect(() => json.parseDocument("{title: 1}", "x.meta")).toThrow(AttributeParseError);
  });

  it("throws when the document is not a mapping", () => {
    expect(() => yaml.parseDocument("- a\n- b\n", "list.meta")).toThrow(
      "expected a yaml mapping at the top level",
    );
    expect(() => json.parseDocument('"just text"', "text.meta")).toThrow(AttributeParseError);
  });

  it("rejects a __proto__ key instead of dropping it", () => {
    expect(() => yaml.parseDocument("__proto__:\n  title: injected\n", "x.meta")).toThrow(
      'key "__proto__" is not allowed at "__proto__"',
    );
    expect(() => json.parseDocument('{"a": [{"__proto__": {"b": 1}}]}', "x.meta")).toThrow(
      'key "__proto__" is not allowed at "a.0.__proto__"',
    );
  });

  it("rejects a __proto__ key in frontmatter", () => {
    expect(() =>
      yaml.parseFrontmatter("---\n__proto__:\n  title: injected\n---\nBody", "2020-01-01-hello.md"),
    ).toThrow(AttributeParseError);
  });

  it("rejects values outside the attribute model", () => {
    expect(() => yaml.parseDocument("ratio: .inf", "x.meta")).toThrow(AttributeParseError);
  });
});

describe("AttributeParser.parseFrontmatter", () => {
  it("parses and strips a leading YAML block", () => {
    const result = yaml.parseFrontmatter("---\ntitle: Hello\nlayout: post\n---\n# Body\n", "a.md");
    expect(result.found).toBe(true);
    expect(result.attributes).toEqual({ title: "Hello", layout: "post" });
    expect(result.body).toBe("# Body\n");
  });

  it("handles CRLF line endings", () => {
    const result = yaml.parseFrontmatter("---\r\ntitle: Win\r\n---\r\nBody", "a.md");
    expect(result.attributes).toEqual({ title: "Win" });
    expect(result.body).toBe("Body");
  });

  it("treats an empty block as empty attributes", () => {
    const result = yaml.parseFrontmatter("---\n---\nBody", "a.md");
    expect(result.found).toBe(true);
    expect(result.attributes).toEqual({});
    expect(result.body).toBe("Body");
  });

  it("does not let a later separator close an empty block", () => {
    const result = yaml.parseFrontmatter("---\n---\nintro\n---\nmore", "a.md");
    expect(result.attributes).toEqual({});
    expect(result.body).toBe("intro\n---\nmore");
  });

  it("accepts a block closing at end of file", () => {
    const result = yaml.parseFrontmatter("---\ntitle: Only\n---", "a.md");
    expect(result.attributes).toEqual({ title: "Only" });
    expect(result.body).toBe("");
  });

  it("parses JSON frontmatter", () => {
    const result = json.parseFrontmatter('---\n{"title": "J", "tags": ["x"]}\n---\nText', "a.md");
    expect(result.attributes).toEqual({ title: "J", tags: ["x"] });
    expect(result.body).toBe("Text");
  });

  it("leaves content without a block untouched", () => {
    const content = "# Title\n\n---\n\nNot frontmatter\n";
    const result = yaml.parseFrontmatter(content, "a.md");
    expect(result).toEqual({ attributes: {}, body: content, found: false });
  });

  it("requires the block to start on the first line", () => {
    const content = "\n---\ntitle: Late\n---\n";
    expect(yaml.parseFrontmatter(content, "a.md").found).toBe(false);
  });

  it("ignores an unclosed block", () => {
    const content = "---\ntitle: Open\nBody";
    expect(yaml.parseFrontmatter(content, "a.md")).toEqual({
      attributes: {},
      body: content,
      found: false,
    });
  });

  it("propagates parse errors from the block", () => {
    expect(() => yaml.parseFrontmatter("---\ntitle: [oops\n---\nBody", "bad.md")).toThrow(
      AttributeParseError,
    );
  });
});
