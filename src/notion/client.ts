/**
 * Notion SDK client wrapper.
 *
 * Handles request throttling, pagination, and error mapping so the page
 * client doesn't deal with these low-level concerns. Every SDK failure
 * surfaces as a RemoteApiError.
 */

import {
  Client,
  isFullPage,
  isFullBlock,
  type NotionPage,
  type NotionBlock,
  type ListBlockChildrenResponse,
} from "./types.js";
import type { NotionBlockPayload } from "../types.js";
import { RemoteApiError, NotionRateLimitError } from "../errors.js";

export { NotionRateLimitError } from "../errors.js";

/**
 * Configuration for the NotionClientWrapper.
 */
export interface NotionClientConfig {
  /** Notion integration token */
  token: string;
  /** Minimum delay between requests in ms (default: 334ms for 3 req/s) */
  minRequestInterval?: number;
  /**
   * Retry attempts on 429 (default: 0). A sync aborts on the first failed
   * call, so retries are opt-in.
   */
  maxRetries?: number;
}

/**
 * Maximum number of blocks per append call.
 * Notion's API limits the children array to 100 blocks.
 */
export const MAX_BLOCKS_PER_REQUEST = 100;

/**
 * SDK client wrapper that handles throttling, pagination and error mapping.
 *
 * @example
 * ```ts
 * const client = new NotionClientWrapper({ token });
 * const blocks = await client.listBlockChildren(pageId);
 * const childPages = blocks.filter((block) => block.type === "child_page");
 * ```
 */
export class NotionClientWrapper {
  private readonly client: Client;
  private readonly minRequestInterval: number;
  private readonly maxRetries: number;

  /** Timestamp of the last API request (for throttling) */
  private lastRequestTime: number = 0;

  constructor(config: NotionClientConfig) {
    this.client = new Client({ auth: config.token });
    this.minRequestInterval = config.minRequestInterval ?? 334; // 3 req/s
    this.maxRetries = config.maxRetries ?? 0;
  }

  /**
   * Retrieves a full page object.
   *
   * @throws RemoteApiError if the page is missing or only partially returned
   */
  async retrievePage(pageId: string): Promise<NotionPage> {
    const response = await this.execute(`retrieve page ${pageId}`, () =>
      this.client.pages.retrieve({ page_id: pageId })
    );
    if (!isFullPage(response)) {
      throw new RemoteApiError(`Page ${pageId} was returned without its properties`);
    }
    return response;
  }

  /**
   * Creates a page titled `title` below another page.
   *
   * @returns The created page object (full when the API returns one)
   */
  async createChildPage(
    parentPageId: string,
    title: string
  ): Promise<{ id: string; url: string | null }> {
    const response = await this.execute(`create page "${title}"`, () =>
      this.client.pages.create({
        parent: { page_id: parentPageId },
        properties: {
          title: { title: [{ text: { content: title } }] },
        },
      })
    );
    return { id: response.id, url: isFullPage(response) ? response.url : null };
  }

  /**
   * Moves a page to the trash.
   */
  async archivePage(pageId: string): Promise<void> {
    await this.execute(`archive page ${pageId}`, () =>
      this.client.pages.update({ page_id: pageId, archived: true })
    );
  }

  /**
   * Lists the top-level blocks of a page or block.
   *
   * Follows pagination until all children are fetched. Nested children are
   * not fetched: for a page, child_page blocks would otherwise pull in the
   * whole subtree.
   *
   * @param blockId - The parent page or block ID
   */
  async listBlockChildren(blockId: string): Promise<NotionBlock[]> {
    const allBlocks: NotionBlock[] = [];
    let cursor: string | undefined = undefined;
    let hasMore = true;

    while (hasMore) {
      const startCursor: string | undefined = cursor;
      const response: ListBlockChildrenResponse = await this.execute(`list children of ${blockId}`, () =>
        this.client.blocks.children.list({
          block_id: blockId,
          start_cursor: startCursor,
        })
      );

      for (const result of response.results) {
        if (isFullBlock(result)) {
          allBlocks.push(result);
        }
      }

      hasMore = response.has_more;
      cursor = response.next_cursor ?? undefined;
    }

    return allBlocks;
  }

  /**
   * Deletes (archives) a single block.
   */
  async deleteBlock(blockId: string): Promise<void> {
    await this.execute(`delete block ${blockId}`, () =>
      this.client.blocks.delete({ block_id: blockId })
    );
  }

  /**
   * Appends blocks to a page in batches of MAX_BLOCKS_PER_REQUEST.
   */
  async appendBlocks(pageId: string, blocks: NotionBlockPayload[]): Promise<void> {
    for (let i = 0; i < blocks.length; i += MAX_BLOCKS_PER_REQUEST) {
      const batch = blocks.slice(i, i + MAX_BLOCKS_PER_REQUEST);

      await this.execute(`append blocks to ${pageId}`, () =>
        this.client.blocks.children.append({
          block_id: pageId,
          children: batch,
        })
      );
    }
  }

  /**
   * Executes an API call with throttling and error mapping.
   *
   * - Ensures minimum interval between requests (3 req/s)
   * - On 429, retries up to `maxRetries` times with exponential backoff
   *   (1s, 2s, 4s) or the server's retry-after
   * - Any other failure is rethrown as RemoteApiError
   *
   * @param operation - Short description used in error messages
   * @param apiCall - The API call to execute
   */
  private async execute<T>(operation: string, apiCall: () => Promise<T>): Promise<T> {
    let retryDelay = 1000;

    for (let attempt = 0; ; attempt++) {
      await this.throttle();

      try {
        this.lastRequestTime = Date.now();
        return await apiCall();
      } catch (error) {
        if (!isRateLimitError(error)) {
          throw toRemoteApiError(operation, error);
        }

        if (attempt >= this.maxRetries) {
          throw new NotionRateLimitError(
            this.maxRetries > 0
              ? `Rate limit exceeded after ${this.maxRetries} retries (${operation})`
              : `Rate limit exceeded (${operation})`,
            getRetryAfter(error),
            error
          );
        }

        await this.sleep(getRetryAfter(error) ?? retryDelay);
        retryDelay *= 2;
      }
    }
  }

  private async throttle(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.minRequestInterval) {
      await this.sleep(this.minRequestInterval - elapsed);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Exposes the underlying Notion client for advanced use cases.
   * Calls made through it bypass throttling and error mapping.
   */
  get rawClient(): Client {
    return this.client;
  }
}

/**
 * Checks if an error is a Notion rate limit error (HTTP 429).
 */
function isRateLimitError(error: unknown): boolean {
  return getErrorStatus(error) === 429 || getErrorCode(error) === "rate_limited";
}

function getErrorStatus(error: unknown): number | undefined {
  if (error && typeof error === "object" && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Extracts the retry-after value from a rate limit error (in ms).
 *
 * SDK errors carry fetch Headers; plain records are accepted too.
 */
function getRetryAfter(error: unknown): number | undefined {
  if (!error || typeof error !== "object" || !("headers" in error)) {
    return undefined;
  }
  const headers = error.headers;
  let value: unknown;
  if (headers && typeof headers === "object") {
    if ("get" in headers && typeof headers.get === "function") {
      value = headers.get("retry-after");
    } else if ("retry-after" in headers) {
      value = headers["retry-after"];
    }
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const seconds = parseInt(value, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

function toRemoteApiError(operation: string, error: unknown): RemoteApiError {
  if (error instanceof RemoteApiError) {
    return error;
  }
  const status = getErrorStatus(error);
  const code = getErrorCode(error);
  const reason = error instanceof Error ? error.message : String(error);
  const tag = code ?? (status !== undefined ? `HTTP ${status}` : null);
  return new RemoteApiError(
    `Failed to ${operation}: ${reason}${tag ? ` (${tag})` : ""}`,
    { status, code, cause: error }
  );
}
