/**
 * Test doubles for the tree sync.
 *
 * - FakePageClient: an in-memory page tree behind the RemotePageClient interface
 * - mock* factories: Notion API response shapes for testing the SDK wrapper
 * - writeTree: lays out a source directory from a path → content record
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { RemoteApiError } from "../src/errors.js";
import type { NotionBlockPayload, RemotePageClient, RemotePageRef } from "../src/types.js";

// =============================================================================
// In-memory remote
// =============================================================================

export interface FakePage {
  id: string;
  parentId: string;
  title: string;
  blocks: NotionBlockPayload[];
  archived: boolean;
}

export type FakeMethod = keyof RemotePageClient;

export interface FakeCall {
  method: FakeMethod;
  args: unknown[];
}

/**
 * RemotePageClient over an in-memory page tree.
 *
 * Page IDs are `page-0001`, `page-0002`, ... in creation order, and URLs are
 * `https://notion.test/<id>`. `failOn` makes the n-th call (1-based) of a
 * method throw a RemoteApiError without side effects.
 */
export class FakePageClient implements RemotePageClient {
  readonly pages: Map<string, FakePage> = new Map();
  readonly calls: FakeCall[] = [];

  private nextId = 1;
  private failure: { method: FakeMethod; call: number } | null = null;

  /** Adds an existing page, as if created by an earlier run or by hand */
  seedPage(parentId: string, title: string): string {
    const id = this.newId();
    this.pages.set(id, { id, parentId, title, blocks: [], archived: false });
    return id;
  }

  failOn(method: FakeMethod, call: number): void {
    this.failure = { method, call };
  }

  callsTo(method: FakeMethod): FakeCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  /** Live children of a page, in creation order */
  childrenOf(parentId: string): FakePage[] {
    return [...this.pages.values()].filter(
      (page) => page.parentId === parentId && !page.archived
    );
  }

  /** Finds a live page by its title path below `parentId` */
  pageAt(parentId: string, ...titles: string[]): FakePage {
    let current: FakePage | undefined;
    let currentId = parentId;
    for (const title of titles) {
      current = this.childrenOf(currentId).find((page) => page.title === title);
      if (!current) {
        throw new Error(`No page "${titles.join(" / ")}" under ${parentId}`);
      }
      currentId = current.id;
    }
    if (!current) {
      throw new Error("pageAt needs at least one title");
    }
    return current;
  }

  async createPage(parentId: string, title: string): Promise<string> {
    this.record("createPage", [parentId, title]);
    const id = this.newId();
    this.pages.set(id, { id, parentId, title, blocks: [], archived: false });
    return id;
  }

  async setPageContent(pageId: string, blocks: NotionBlockPayload[]): Promise<void> {
    this.record("setPageContent", [pageId, blocks]);
    this.livePage(pageId).blocks = blocks;
  }

  async listChildren(pageId: string): Promise<RemotePageRef[]> {
    this.record("listChildren", [pageId]);
    return this.childrenOf(pageId).map((page) => ({ pageId: page.id, title: page.title }));
  }

  async getPageUrl(pageId: string): Promise<string> {
    this.record("getPageUrl", [pageId]);
    return `https://notion.test/${this.livePage(pageId).id}`;
  }

  async archivePage(pageId: string): Promise<void> {
    this.record("archivePage", [pageId]);
    this.livePage(pageId).archived = true;
  }

  private record(method: FakeMethod, args: unknown[]): void {
    this.calls.push({ method, args });
    if (this.failure?.method === method && this.callsTo(method).length === this.failure.call) {
      throw new RemoteApiError(`Failed to ${method}: simulated outage (HTTP 503)`, {
        status: 503,
      });
    }
  }

  private livePage(pageId: string): FakePage {
    const page = this.pages.get(pageId);
    if (!page || page.archived) {
      throw new RemoteApiError(`Page ${pageId} not found`, {
        status: 404,
        code: "object_not_found",
      });
    }
    return page;
  }

  private newId(): string {
    return `page-${(this.nextId++).toString().padStart(4, "0")}`;
  }
}

// =============================================================================
// Local source trees
// =============================================================================

/**
 * Writes `files` (relative path → content) below `rootDir`.
 * A path ending in "/" creates an empty directory.
 */
export async function writeTree(rootDir: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(rootDir, relativePath);
    if (relativePath.endsWith("/")) {
      await fs.mkdir(target, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf-8");
  }
}

// =============================================================================
// Notion API response shapes
// =============================================================================

/**
 * Represents a rich text item response from the Notion API.
 */
export interface MockRichTextItem {
  type: "text";
  text: {
    content: string;
    link: { url: string } | null;
  };
  plain_text: string;
  href: string | null;
  annotations: {
    bold: boolean;
    italic: boolean;
    strikethrough: boolean;
    underline: boolean;
    code: boolean;
    color: "default";
  };
}

export function mockRichText(text: string): MockRichTextItem {
  return {
    type: "text",
    text: { content: text, link: null },
    plain_text: text,
    href: null,
    annotations: {
      bold: false,
      italic: false,
      strikethrough: false,
      underline: false,
      code: false,
      color: "default",
    },
  };
}

/**
 * Block types the page client distinguishes.
 */
export type MockBlockType = "paragraph" | "heading_1" | "child_page" | "child_database";

/**
 * Base structure for a mock block response.
 */
export interface MockBlock {
  object: "block";
  id: string;
  type: MockBlockType;
  created_time: string;
  created_by: { object: "user"; id: string };
  last_edited_time: string;
  last_edited_by: { object: "user"; id: string };
  has_children: boolean;
  archived: boolean;
  in_trash: boolean;
  parent: { type: "page_id"; page_id: string };
  [key: string]: unknown;
}

let blockIdCounter = 0;

function generateBlockId(): string {
  blockIdCounter++;
  return `block-${blockIdCounter.toString().padStart(4, "0")}`;
}

/**
 * Creates a mock block object matching the Notion API response shape.
 *
 * @param content - Text for paragraphs and headings, the title for child pages
 */
export function mockBlock(
  type: MockBlockType,
  content: string = "",
  options: { id?: string; parentId?: string } = {}
): MockBlock {
  const now = new Date().toISOString();

  const block: MockBlock = {
    object: "block",
    id: options.id ?? generateBlockId(),
    type,
    created_time: now,
    created_by: { object: "user", id: "user-001" },
    last_edited_time: now,
    last_edited_by: { object: "user", id: "user-001" },
    has_children: type === "child_page" || type === "child_database",
    archived: false,
    in_trash: false,
    parent: { type: "page_id", page_id: options.parentId ?? "page-001" },
  };

  switch (type) {
    case "paragraph":
      block.paragraph = { rich_text: content ? [mockRichText(content)] : [], color: "default" };
      break;
    case "heading_1":
      block.heading_1 = {
        rich_text: [mockRichText(content)],
        is_toggleable: false,
        color: "default",
      };
      break;
    case "child_page":
      block.child_page = { title: content };
      break;
    case "child_database":
      block.child_database = { title: content };
      break;
  }

  return block;
}

/**
 * Creates a mock blocks.children.list response.
 */
export function mockBlocksResponse(
  blocks: MockBlock[],
  hasMore: boolean = false,
  nextCursor: string | null = null
): {
  object: "list";
  results: MockBlock[];
  next_cursor: string | null;
  has_more: boolean;
  type: "block";
  block: Record<string, never>;
} {
  return {
    object: "list",
    results: blocks,
    next_cursor: nextCursor,
    has_more: hasMore,
    type: "block",
    block: {},
  };
}

/**
 * Represents a mock page response from the Notion API.
 */
export interface MockPage {
  object: "page";
  id: string;
  created_time: string;
  last_edited_time: string;
  created_by: { object: "user"; id: string };
  last_edited_by: { object: "user"; id: string };
  archived: boolean;
  in_trash: boolean;
  is_locked: boolean;
  url: string;
  public_url: string | null;
  parent: { type: "page_id"; page_id: string };
  properties: Record<string, unknown>;
  icon: null;
  cover: null;
}

/**
 * Creates a mock page object as returned by pages.retrieve and pages.create.
 */
export function mockNotionPage(
  options: { id: string; title?: string; url?: string; parentId?: string }
): MockPage {
  const now = new Date().toISOString();
  return {
    object: "page",
    id: options.id,
    created_time: now,
    last_edited_time: now,
    created_by: { object: "user", id: "user-001" },
    last_edited_by: { object: "user", id: "user-001" },
    archived: false,
    in_trash: false,
    is_locked: false,
    url: options.url ?? `https://www.notion.so/${options.id.replace(/-/g, "")}`,
    public_url: null,
    parent: { type: "page_id", page_id: options.parentId ?? "page-001" },
    properties: {
      title: { id: "title", type: "title", title: [mockRichText(options.title ?? "Untitled")] },
    },
    icon: null,
    cover: null,
  };
}

/**
 * Resets the block ID counter (useful between tests).
 */
export function resetMockCounters(): void {
  blockIdCounter = 0;
}
