/**
 * Notion SDK type helpers.
 *
 * Re-exports the SDK guards the page client works with and derives the
 * response shapes it reads from the Client method signatures, so nothing
 * here depends on the SDK's internal module layout.
 */

import type { Client } from "@notionhq/client";

export { isFullPage, isFullBlock, Client } from "@notionhq/client";

/**
 * Response of pages.retrieve / pages.create (full or partial page).
 */
export type GetPageResponse = Awaited<ReturnType<Client["pages"]["retrieve"]>>;

/**
 * A full page object, as narrowed by isFullPage().
 */
export type NotionPage = Extract<GetPageResponse, { url: string }>;

/**
 * Response of blocks.children.list.
 */
export type ListBlockChildrenResponse = Awaited<
  ReturnType<Client["blocks"]["children"]["list"]>
>;

/**
 * A full block object, as narrowed by isFullBlock().
 */
export type NotionBlock = Extract<
  ListBlockChildrenResponse["results"][number],
  { type: string }
>;

/**
 * Block type string literal union.
 */
export type NotionBlockType = NotionBlock["type"];

/**
 * Block types that hold other pages rather than page content.
 * Content replacement must never delete these, or the subtree goes with them.
 */
export const PAGE_CONTAINER_BLOCK_TYPES: ReadonlySet<NotionBlockType> =
  new Set<NotionBlockType>(["child_page", "child_database"]);

/**
 * Formats a Notion ID in its dashed 8-4-4-4-12 form.
 * Returns null when `value` is not a 32-digit hex ID (with or without dashes).
 */
export function normalizeNotionId(value: string): string | null {
  const compact = value.replace(/-/g, "").toLowerCase();
  if (!/^[0-9a-f]{32}$/.test(compact)) {
    return null;
  }
  return [
    compact.slice(0, 8),
    compact.slice(8, 12),
    compact.slice(12, 16),
    compact.slice(16, 20),
    compact.slice(20),
  ].join("-");
}

/**
 * Browsable URL for a page ID, used when the API response carries none.
 */
export function pageUrlFromId(pageId: string): string {
  return `https://www.notion.so/${pageId.replace(/-/g, "")}`;
}
