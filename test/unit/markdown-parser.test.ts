/**
 * Unit tests for the markdown parser.
 */

import { describe, it, expect } from "vitest";
import {
  parseDocument,
  parseMarkdown,
  stripFrontmatter,
} from "../../src/parser/markdown-parser.js";

describe("markdown-parser", () => {
  describe("stripFrontmatter", () => {
    it("removes a front matter block", () => {
      expect(stripFrontmatter("---\ntitle: Hello\n---\n# Content")).toBe("# Content");
    });

    it("returns content without front matter unchanged", () => {
      expect(stripFrontmatter("# Just a heading\n\nSome text.")).toBe(
        "# Just a heading\n\nSome text."
      );
    });

    it("handles empty front matter", () => {
      expect(stripFrontmatter("---\n---\n# Content")).toBe("# Content");
    });

    it("returns an empty body for front matter only", () => {
      expect(stripFrontmatter("---\ntitle: Only\n---")).toBe("");
    });

    it("keeps content with an unclosed delimiter", () => {
      expect(stripFrontmatter("---\ntitle: Open\n# Content")).toBe(
        "---\ntitle: Open\n# Content"
      );
    });

    it("normalizes CRLF line endings", () => {
      expect(stripFrontmatter("---\r\ntitle: Win\r\n---\r\nLine 1\r\nLine 2")).toBe(
        "Line 1\nLine 2"
      );
    });

    it("ignores a thematic break that is not at the start", () => {
      expect(stripFrontmatter("Intro\n\n---\n\nMore")).toBe("Intro\n\n---\n\nMore");
    });
  });

  describe("parseMarkdown", () => {
    it("parses headings and paragraphs", () => {
      const ast = parseMarkdown("# Hello\n\nParagraph with **bold**.");

      expect(ast.type).toBe("root");
      expect(ast.children.map((node) => node.type)).toEqual(["heading", "paragraph"]);
    });

    it("parses GFM tables, task lists and strikethrough", () => {
      const ast = parseMarkdown("| a | b |\n| - | - |\n| 1 | 2 |\n\n- [x] done\n\n~~gone~~");

      expect(ast.children.map((node) => node.type)).toEqual(["table", "list", "paragraph"]);
      const list = ast.children[1];
      expect(list.type === "list" && list.children[0].checked).toBe(true);
      const paragraph = ast.children[2];
      expect(paragraph.type === "paragraph" && paragraph.children[0].type).toBe("delete");
    });

    it("turns reference links and images into inline ones", () => {
      const ast = parseMarkdown(
        'Read [the guide][g] and ![Logo][l].\n\n[g]: ./guide.md "Guide"\n[l]: https://example.com/logo.png'
      );

      expect(ast.children).toHaveLength(1);
      expect(ast.children[0]).toMatchObject({
        type: "paragraph",
        children: [
          { type: "text", value: "Read " },
          {
            type: "link",
            url: "./guide.md",
            title: "Guide",
            children: [{ type: "text", value: "the guide" }],
          },
          { type: "text", value: " and " },
          { type: "image", url: "https://example.com/logo.png", alt: "Logo" },
          { type: "text", value: "." },
        ],
      });
    });

    it("matches reference labels case-insensitively", () => {
      const ast = parseMarkdown("See [Setup].\n\n[setup]: ./setup.md");

      expect(ast.children[0]).toMatchObject({
        type: "paragraph",
        children: [
          { type: "text", value: "See " },
          { type: "link", url: "./setup.md", children: [{ type: "text", value: "Setup" }] },
          { type: "text", value: "." },
        ],
      });
    });

    it("drops definitions nested in containers", () => {
      const ast = parseMarkdown("> [Home][h]\n>\n> [h]: ./home.md");

      expect(ast.children[0]).toMatchObject({
        type: "blockquote",
        children: [{ type: "paragraph", children: [{ type: "link", url: "./home.md" }] }],
      });
      const quote = ast.children[0];
      expect(quote.type === "blockquote" && quote.children).toHaveLength(1);
    });

    it("splits a single-node details block around its parsed body", () => {
      const ast = parseMarkdown("<details><summary>More</summary>\nSee [setup](./setup.md)\n</details>");

      expect(ast.children.map((node) => node.type)).toEqual(["html", "paragraph", "html"]);
      expect(ast.children[0]).toMatchObject({ value: "<details><summary>More</summary>" });
      expect(ast.children[1]).toMatchObject({
        children: [{ type: "text", value: "See " }, { type: "link", url: "./setup.md" }],
      });
      expect(ast.children[2]).toMatchObject({ value: "</details>" });
    });
  });

  describe("parseDocument", () => {
    it("does not turn front matter into a thematic break", () => {
      const ast = parseDocument("---\ntitle: Page\n---\n\nBody text");

      expect(ast.children.map((node) => node.type)).toEqual(["paragraph"]);
    });
  });
});
