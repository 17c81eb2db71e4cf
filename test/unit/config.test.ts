/**
 * Unit tests for command-line and environment configuration.
 */

import { describe, it, expect } from "vitest";
import { parseArgs, parsePageReference, resolveConfig } from "../../src/config.js";
import { ConfigError } from "../../src/errors.js";

const PAGE_ID = "0f3c6c1e-8f0d-4a43-9d2b-3b4cbb1e2a10";

describe("config", () => {
  describe("parseArgs", () => {
    it("applies defaults", () => {
      expect(parseArgs([])).toEqual({
        rootParentUrl: null,
        dir: null,
        githubWikiRoots: [],
        indexFileName: "index.md",
        unresolvedLinks: "error",
        prune: false,
        quiet: false,
        help: false,
      });
    });

    it("parses every flag", () => {
      const args = parseArgs([
        "--root-parent-url",
        "https://www.notion.so/Team-0f3c6c1e8f0d4a439d2b3b4cbb1e2a10",
        "--dir",
        "./wiki",
        "--github-wiki-root",
        "https://github.com/acme/handbook/wiki",
        "--index-file=README.md",
        "--unresolved-links",
        "keep",
        "--prune",
        "-q",
      ]);

      expect(args).toEqual({
        rootParentUrl: "https://www.notion.so/Team-0f3c6c1e8f0d4a439d2b3b4cbb1e2a10",
        dir: "./wiki",
        githubWikiRoots: ["https://github.com/acme/handbook/wiki"],
        indexFileName: "README.md",
        unresolvedLinks: "keep",
        prune: true,
        quiet: true,
        help: false,
      });
    });

    it("collects repeated and comma-separated wiki roots", () => {
      const args = parseArgs([
        "--github-wiki-root",
        "https://github.com/acme/a/wiki, https://github.com/acme/b/wiki",
        "--github-wiki-root=https://github.com/acme/c/wiki",
      ]);

      expect(args.githubWikiRoots).toEqual([
        "https://github.com/acme/a/wiki",
        "https://github.com/acme/b/wiki",
        "https://github.com/acme/c/wiki",
      ]);
    });

    it("recognizes help", () => {
      expect(parseArgs(["-h"]).help).toBe(true);
      expect(parseArgs(["--help"]).help).toBe(true);
    });

    it("rejects a flag without its value", () => {
      expect(() => parseArgs(["--dir"])).toThrow(new ConfigError("--dir requires a value"));
      expect(() => parseArgs(["--dir", "--prune"])).toThrow("--dir requires a value");
    });

    it("rejects unknown link policies", () => {
      expect(() => parseArgs(["--unresolved-links", "ignore"])).toThrow(
        "--unresolved-links must be one of: error, keep"
      );
    });

    it("rejects unknown arguments", () => {
      expect(() => parseArgs(["--full"])).toThrow("Unknown argument: --full");
      expect(() => parseArgs(["sync"])).toThrow("Unknown argument: sync");
    });
  });

  describe("resolveConfig", () => {
    const env = { NOTION_TOKEN: "test-secret" };

    it("builds a sync configuration", () => {
      const args = parseArgs(["--root-parent-url", PAGE_ID, "--dir", "./wiki", "--prune"]);

      expect(resolveConfig(args, env)).toEqual({
        notionToken: "test-secret",
        rootParentId: PAGE_ID,
        sourceDir: "./wiki",
        indexFileName: "index.md",
        githubWikiRoots: [],
        unresolvedLinks: "error",
        prune: true,
      });
    });

    it("reports every missing setting at once", () => {
      expect(() => resolveConfig(parseArgs([]), {})).toThrow(
        new ConfigError(
          "NOTION_TOKEN environment variable is not set; --root-parent-url is required; --dir is required"
        )
      );
    });

    it("rejects a parent reference without a page ID", () => {
      const args = parseArgs(["--root-parent-url", "https://www.notion.so/Team", "--dir", "./wiki"]);

      expect(() => resolveConfig(args, env)).toThrow(
        "--root-parent-url is not a Notion page URL or ID: https://www.notion.so/Team"
      );
    });

    it("rejects an index file given as a path", () => {
      const args = parseArgs(["--root-parent-url", PAGE_ID, "--dir", "./wiki", "--index-file", "docs/index.md"]);

      expect(() => resolveConfig(args, env)).toThrow(
        "--index-file must be a file name, not a path: docs/index.md"
      );
    });

    it("treats a blank token as missing", () => {
      const args = parseArgs(["--root-parent-url", PAGE_ID, "--dir", "./wiki"]);

      expect(() => resolveConfig(args, { NOTION_TOKEN: "  " })).toThrow(
        "NOTION_TOKEN environment variable is not set"
      );
    });
  });

  describe("parsePageReference", () => {
    it.each([
      ["0f3c6c1e8f0d4a439d2b3b4cbb1e2a10", PAGE_ID],
      [PAGE_ID, PAGE_ID],
      ["0F3C6C1E8F0D4A439D2B3B4CBB1E2A10", PAGE_ID],
      ["https://www.notion.so/Team-Wiki-0f3c6c1e8f0d4a439d2b3b4cbb1e2a10", PAGE_ID],
      ["https://www.notion.so/acme/0f3c6c1e8f0d4a439d2b3b4cbb1e2a10?pvs=4", PAGE_ID],
      ["https://acme.notion.site/Docs-0f3c6c1e8f0d4a439d2b3b4cbb1e2a10#heading", PAGE_ID],
      [`https://www.notion.so/${PAGE_ID}`, PAGE_ID],
    ])("parses %s", (reference, expected) => {
      expect(parsePageReference(reference)).toBe(expected);
    });

    it.each([
      "",
      "not-a-page",
      "https://www.notion.so/Team",
      "https://www.notion.so/0f3c6c1e8f0d4a439d2b3b4cbb1e2a10/Subpage",
      "0f3c6c1e8f0d4a439d2b3b4cbb1e2a1",
    ])("rejects %s", (reference) => {
      expect(parsePageReference(reference)).toBeNull();
    });
  });
});
