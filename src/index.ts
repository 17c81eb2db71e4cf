/**
 * notion-tree
 *
 * One-way mirror of a local markdown directory into a Notion page hierarchy.
 *
 * @packageDocumentation
 */

// =============================================================================
// Core Sync Functions
// =============================================================================

/**
 * Main sync function: local directory → Notion pages
 */
export {
  syncDirectoryToNotion,
  syncTree,
  renderNode,
  type TreeSyncOptions,
} from "./sync/tree-sync.js";

/**
 * Link resolution against the page mapping of a run
 */
export {
  LinkResolver,
  registerMapping,
  type LinkResolverOptions,
  type LinkTarget,
} from "./sync/link-resolver.js";

// =============================================================================
// Local Tree and Configuration
// =============================================================================

export {
  readLocalTree,
  walkLocalTree,
  titleFromFileName,
  DEFAULT_INDEX_FILE_NAME,
  type TreeReaderOptions,
} from "./local/tree-reader.js";

export { parseArgs, resolveConfig, parsePageReference, type CliArgs } from "./config.js";

// =============================================================================
// Notion Client (for advanced use cases)
// =============================================================================

export {
  NotionClientWrapper,
  MAX_BLOCKS_PER_REQUEST,
  type NotionClientConfig,
} from "./notion/client.js";

export { NotionPageClient } from "./notion/page-client.js";

// =============================================================================
// Converters (for custom pipelines)
// =============================================================================

export { parseDocument, parseMarkdown, stripFrontmatter } from "./parser/markdown-parser.js";

export { mdastToNotionBlocks, codeLanguage } from "./converter/md-to-blocks.js";

export {
  phrasesToRichText,
  plainRichText,
  isLinkableUrl,
  MAX_RICH_TEXT_LENGTH,
  type NotionAnnotations,
  type NotionRichTextPayload,
} from "./converter/md-to-rich-text.js";

// =============================================================================
// Errors
// =============================================================================

export {
  ConfigError,
  RemoteApiError,
  NotionRateLimitError,
  LinkResolutionError,
  type RemoteApiErrorDetails,
} from "./errors.js";

// =============================================================================
// Core Types
// =============================================================================

export type {
  TreeSyncConfig,
  TreeSyncResult,
  PageSyncResult,
  UnresolvedLinkPolicy,
  LocalNode,
  LocalDocument,
  LocalDirectory,
  RemotePageClient,
  RemotePageRef,
  MappedPage,
  PageMapping,
  NotionBlockPayload,
} from "./types.js";

// =============================================================================
// Notion Type Helpers
// =============================================================================

export type { NotionPage, NotionBlock, NotionBlockType } from "./notion/types.js";

export { isFullPage, isFullBlock, normalizeNotionId, pageUrlFromId, Client } from "./notion/types.js";
