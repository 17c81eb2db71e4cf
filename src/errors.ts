/**
 * Error types raised by the tree sync.
 *
 * Every error propagates to the CLI, which prints `<name>: <message>` and
 * exits with status 1. Nothing is retried or rolled back.
 */

/**
 * Missing or invalid configuration: token, parent page reference, or an
 * unreadable local source directory.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Details carried by a {@link RemoteApiError}.
 */
export interface RemoteApiErrorDetails {
  /** HTTP status of the failed response, when there was one */
  status?: number;
  /** Notion API error code (e.g. "object_not_found", "rate_limited") */
  code?: string;
  /** The original SDK error */
  cause?: unknown;
}

/**
 * Any failure reported by the Notion API or its transport.
 */
export class RemoteApiError extends Error {
  public readonly status?: number;
  public readonly code?: string;

  constructor(message: string, details: RemoteApiErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = "RemoteApiError";
    this.status = details.status;
    this.code = details.code;
  }
}

/**
 * Thrown when rate limiting exhausts the configured retries.
 */
export class NotionRateLimitError extends RemoteApiError {
  constructor(
    message: string,
    public readonly retryAfter?: number,
    cause?: unknown
  ) {
    super(message, { status: 429, code: "rate_limited", cause });
    this.name = "NotionRateLimitError";
  }
}

/**
 * A link inside the synchronized tree that points at no synchronized page.
 */
export class LinkResolutionError extends Error {
  constructor(
    message: string,
    /** The link as written in the source document */
    public readonly href: string,
    /** Source document path, relative to the sync root */
    public readonly sourcePath: string
  ) {
    super(message);
    this.name = "LinkResolutionError";
  }
}
