/**
 * Core types for the tree sync.
 */

/**
 * Policy for intra-tree links that point at no synchronized page.
 *
 * - `error`: abort the run with a LinkResolutionError
 * - `keep`: leave the link text in place without a link
 */
export type UnresolvedLinkPolicy = "error" | "keep";

export interface TreeSyncConfig {
  /** Notion integration token */
  notionToken: string;
  /** Dashed ID of the Notion page the tree is created under */
  rootParentId: string;
  /** Local directory to mirror */
  sourceDir: string;
  /** Name of the document that holds a directory's own content */
  indexFileName: string;
  /** GitHub wiki URLs whose links map onto local documents */
  githubWikiRoots: string[];
  /** What to do with links that resolve to nothing */
  unresolvedLinks: UnresolvedLinkPolicy;
  /** Archive remote child pages that have no local counterpart */
  prune: boolean;
}

// =============================================================================
// Local tree
// =============================================================================

/**
 * A markdown document in the source tree.
 */
export interface LocalDocument {
  kind: "document";
  /** Absolute path */
  path: string;
  /** Path relative to the source root, POSIX separators (e.g. "dir1/page1.md") */
  relativePath: string;
  /** File name without the .md extension */
  title: string;
  /** Raw file content, front matter included */
  content: string;
}

/**
 * A directory in the source tree. Its page body comes from `index`.
 */
export interface LocalDirectory {
  kind: "directory";
  path: string;
  /** "" for the source root */
  relativePath: string;
  /** Directory name */
  title: string;
  /** The directory's index document, if it has one */
  index: LocalDocument | null;
  /** Subdirectories and non-index documents, sorted by name */
  children: LocalNode[];
}

export type LocalNode = LocalDirectory | LocalDocument;

// =============================================================================
// Remote pages
// =============================================================================

/**
 * A child page as listed under a remote parent.
 */
export interface RemotePageRef {
  pageId: string;
  title: string;
}

/**
 * Notion block creation payload.
 *
 * Notion SDK block request types (BlockObjectRequest) are a deep union
 * keyed on computed property names that the converters build dynamically,
 * so payloads are left untyped here.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type NotionBlockPayload = any;

/**
 * Operations the synchronizer needs from the hosted workspace.
 */
export interface RemotePageClient {
  /** Creates an empty page titled `title` under `parentId`, returns its ID */
  createPage(parentId: string, title: string): Promise<string>;
  /** Replaces the page's content blocks (child pages are left in place) */
  setPageContent(pageId: string, blocks: NotionBlockPayload[]): Promise<void>;
  /** Child pages of `pageId`, in their remote order */
  listChildren(pageId: string): Promise<RemotePageRef[]>;
  /** Browsable URL of the page, used as a link target */
  getPageUrl(pageId: string): Promise<string>;
  /** Moves the page to the trash */
  archivePage(pageId: string): Promise<void>;
}

// =============================================================================
// Sync results
// =============================================================================

/**
 * The remote page a local node was mapped to during a run.
 */
export interface MappedPage {
  pageId: string;
  title: string;
  node: LocalNode;
}

/**
 * Local path → remote page for one run.
 *
 * Directories are registered under their own path and under the path of
 * their index document.
 */
export type PageMapping = Map<string, MappedPage>;

export interface PageSyncResult {
  pageId: string;
  title: string;
  /** Path relative to the source root ("" for the root directory) */
  relativePath: string;
  kind: LocalNode["kind"];
  action: "created" | "matched";
}

export interface TreeSyncResult {
  /** One entry per local node, in pre-order */
  pages: PageSyncResult[];
  /** Remote pages archived by prune */
  archived: RemotePageRef[];
}
