/**
 * Notion implementation of the RemotePageClient the synchronizer talks to.
 *
 * Page content replacement strategy:
 * 1. List the page's top-level blocks
 * 2. Delete every block except child pages and child databases
 * 3. Append the new blocks in batches of 100
 *
 * Child page blocks are the page's subtree; deleting one would trash the
 * child page with it.
 */

import { NotionClientWrapper } from "./client.js";
import { PAGE_CONTAINER_BLOCK_TYPES, pageUrlFromId } from "./types.js";
import type { NotionBlockPayload, RemotePageClient, RemotePageRef } from "../types.js";

/**
 * Remote page client backed by the Notion API.
 *
 * All operations go through the NotionClientWrapper for throttling and
 * error mapping.
 *
 * @example
 * ```ts
 * const pages = new NotionPageClient(new NotionClientWrapper({ token }));
 * const pageId = await pages.createPage(parentId, "Getting Started");
 * await pages.setPageContent(pageId, blocks);
 * ```
 */
export class NotionPageClient implements RemotePageClient {
  /** Page ID → browsable URL, filled by createPage and getPageUrl */
  private readonly urlCache: Map<string, string> = new Map();

  constructor(private readonly client: NotionClientWrapper) {}

  async createPage(parentId: string, title: string): Promise<string> {
    const { id, url } = await this.client.createChildPage(parentId, title);
    if (url) {
      this.urlCache.set(id, url);
    }
    return id;
  }

  async setPageContent(pageId: string, blocks: NotionBlockPayload[]): Promise<void> {
    const existingBlocks = await this.client.listBlockChildren(pageId);

    // Deleting a parent block deletes its children, so top level is enough
    for (const block of existingBlocks) {
      if (!PAGE_CONTAINER_BLOCK_TYPES.has(block.type)) {
        await this.client.deleteBlock(block.id);
      }
    }

    if (blocks.length > 0) {
      await this.client.appendBlocks(pageId, blocks);
    }
  }

  async listChildren(pageId: string): Promise<RemotePageRef[]> {
    const blocks = await this.client.listBlockChildren(pageId);
    const children: RemotePageRef[] = [];

    for (const block of blocks) {
      // A child_page block shares its ID with the page it holds
      if (block.type === "child_page") {
        children.push({ pageId: block.id, title: block.child_page.title });
      }
    }

    return children;
  }

  async getPageUrl(pageId: string): Promise<string> {
    const cached = this.urlCache.get(pageId);
    if (cached) {
      return cached;
    }

    const page = await this.client.retrievePage(pageId);
    const url = page.url || pageUrlFromId(pageId);
    this.urlCache.set(pageId, url);
    return url;
  }

  async archivePage(pageId: string): Promise<void> {
    await this.client.archivePage(pageId);
    this.urlCache.delete(pageId);
  }
}
