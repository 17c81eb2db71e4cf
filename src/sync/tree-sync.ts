/**
 * Tree synchronizer: local directory → Notion page hierarchy.
 *
 * Runs in two phases so link rewriting never depends on traversal order:
 *
 * 1. Structure: walk the local tree depth-first (pre-order). Under each
 *    remote parent, match every local child to an existing child page by
 *    title and position, or create it. Record local path → page ID.
 * 2. Content: with the mapping complete, render each node's markdown,
 *    rewrite intra-tree links to remote page URLs, and replace the page's
 *    content.
 *
 * Every remote call is awaited in turn. The first failure aborts the run;
 * pages created before it stay and are matched again on the next run.
 */

import * as path from "node:path";
import type {
  LocalDirectory,
  LocalNode,
  MappedPage,
  NotionBlockPayload,
  PageMapping,
  PageSyncResult,
  RemotePageClient,
  RemotePageRef,
  TreeSyncConfig,
  TreeSyncResult,
  UnresolvedLinkPolicy,
} from "../types.js";
import { ConfigError } from "../errors.js";
import { NotionClientWrapper } from "../notion/client.js";
import { NotionPageClient } from "../notion/page-client.js";
import { normalizeNotionId } from "../notion/types.js";
import { readLocalTree, walkLocalTree } from "../local/tree-reader.js";
import { parseDocument } from "../parser/markdown-parser.js";
import { mdastToNotionBlocks } from "../converter/md-to-blocks.js";
import { LinkResolver, registerMapping } from "./link-resolver.js";

/**
 * Options for a sync run.
 */
export interface TreeSyncOptions {
  /** GitHub wiki URLs whose links map onto local documents */
  githubWikiRoots?: string[];
  /** What to do with intra-tree links that resolve to nothing (default: error) */
  unresolvedLinks?: UnresolvedLinkPolicy;
  /** Archive remote child pages with no local counterpart (default: false) */
  prune?: boolean;
  /** If true, suppress console output */
  quiet?: boolean;
}

/**
 * Internal sync context passed between helper functions.
 */
interface SyncContext {
  client: RemotePageClient;
  options: TreeSyncOptions;
  mapping: PageMapping;
  results: PageSyncResult[];
  archived: RemotePageRef[];
  log: (message: string) => void;
}

/**
 * Mirrors a local directory into Notion, end to end.
 *
 * 1. Validates the configuration
 * 2. Reads the whole local tree (no remote call is made if this fails)
 * 3. Connects to Notion and runs {@link syncTree}
 *
 * @throws ConfigError for a missing token, invalid parent page ID, or unreadable source
 * @throws RemoteApiError if any Notion call fails
 * @throws LinkResolutionError for dangling intra-tree links (policy "error")
 *
 * @example
 * ```ts
 * const result = await syncDirectoryToNotion({
 *   notionToken: process.env.NOTION_TOKEN ?? "",
 *   rootParentId: "0f3c6c1e-8f0d-4a43-9d2b-3b4cbb1e2a10",
 *   sourceDir: "./wiki",
 *   indexFileName: "index.md",
 *   githubWikiRoots: [],
 *   unresolvedLinks: "error",
 *   prune: false,
 * });
 * console.log(`Synced ${result.pages.length} pages`);
 * ```
 */
export async function syncDirectoryToNotion(
  config: TreeSyncConfig,
  options: Pick<TreeSyncOptions, "quiet"> = {}
): Promise<TreeSyncResult> {
  if (!config.notionToken) {
    throw new ConfigError("Notion token is missing (set NOTION_TOKEN)");
  }
  const rootParentId = normalizeNotionId(config.rootParentId);
  if (!rootParentId) {
    throw new ConfigError(`Invalid root parent page ID: ${config.rootParentId}`);
  }

  const root = await readLocalTree(config.sourceDir, {
    indexFileName: config.indexFileName,
  });

  const client = new NotionPageClient(new NotionClientWrapper({ token: config.notionToken }));

  return syncTree(root, rootParentId, client, {
    githubWikiRoots: config.githubWikiRoots,
    unresolvedLinks: config.unresolvedLinks,
    prune: config.prune,
    quiet: options.quiet,
  });
}

/**
 * Synchronizes a local tree under a remote parent page.
 *
 * The root directory becomes a child page of `remoteParentId`; the rest of
 * the tree nests below it. Running it again with the same inputs creates
 * nothing new.
 *
 * @param root - The local tree (from readLocalTree)
 * @param remoteParentId - ID of the page that receives the root page
 * @param client - Remote page operations
 * @returns Per-node results in pre-order, plus pages archived by prune
 */
export async function syncTree(
  root: LocalDirectory,
  remoteParentId: string,
  client: RemotePageClient,
  options: TreeSyncOptions = {}
): Promise<TreeSyncResult> {
  const { quiet = false } = options;
  const ctx: SyncContext = {
    client,
    options,
    mapping: new Map(),
    results: [],
    archived: [],
    log: quiet ? () => {} : (message) => console.log(message),
  };

  // Phase 1: structure
  let phaseStart = Date.now();
  ctx.log(`[sync] Matching ${countNodes(root)} local nodes under page ${remoteParentId}...`);
  await ensurePages([root], remoteParentId, ctx, false);
  const created = ctx.results.filter((result) => result.action === "created").length;
  ctx.log(
    `[sync] Page hierarchy ready: ${created} created, ${ctx.results.length - created} matched (${elapsed(phaseStart)})`
  );

  // Phase 2: content
  phaseStart = Date.now();
  const resolver = new LinkResolver(ctx.mapping, {
    rootDir: root.path,
    githubWikiRoots: options.githubWikiRoots,
    unresolvedLinks: options.unresolvedLinks,
  });
  const urls = new Map<string, string>();
  const urlFor = async (localPath: string): Promise<string> => {
    const page = ctx.mapping.get(localPath);
    if (!page) {
      // Only paths taken from the mapping reach this point
      throw new Error(`No page mapped for ${localPath}`);
    }
    let url = urls.get(page.pageId);
    if (!url) {
      url = await client.getPageUrl(page.pageId);
      urls.set(page.pageId, url);
    }
    return url;
  };

  const nodes = [...walkLocalTree(root)];
  for (const [index, node] of nodes.entries()) {
    const page = mappedPage(ctx.mapping, node);
    const blocks = await renderNode(node, resolver, urlFor);
    await client.setPageContent(page.pageId, blocks);
    ctx.log(
      `[sync] Updated page ${index + 1}/${nodes.length} "${page.title}" (${displayPath(node)}, ${blocks.length} blocks)`
    );
  }
  ctx.log(`[sync] Content uploaded (${elapsed(phaseStart)})`);

  return { pages: ctx.results, archived: ctx.archived };
}

/**
 * Renders the page body of a node: the document itself, or a directory's
 * index document. Directories without one get an empty body.
 */
export async function renderNode(
  node: LocalNode,
  resolver: LinkResolver,
  urlFor: (localPath: string) => Promise<string>
): Promise<NotionBlockPayload[]> {
  const source = node.kind === "directory" ? node.index : node;
  if (!source) {
    return [];
  }

  const ast = parseDocument(source.content);
  await resolver.rewriteLinks(ast, source.path, urlFor);
  return mdastToNotionBlocks(ast.children);
}

/**
 * Matches or creates pages for `nodes` under `parentId`, then recurses.
 *
 * Remote children are paired with local siblings by {@link claimRemotePages}.
 *
 * @param pruneParent - Whether unclaimed children of `parentId` may be archived.
 *   False for the caller-supplied parent, which may hold unrelated pages.
 */
async function ensurePages(
  nodes: LocalNode[],
  parentId: string,
  ctx: SyncContext,
  pruneParent: boolean
): Promise<void> {
  if (nodes.length === 0 && !(pruneParent && ctx.options.prune)) {
    return;
  }

  const remoteChildren = await ctx.client.listChildren(parentId);
  const claims = await claimRemotePages(nodes, remoteChildren, ctx.client);
  const claimed = new Set<string>();

  for (const node of nodes) {
    const match = claims.get(node);

    let pageId: string;
    if (match) {
      pageId = match.pageId;
    } else {
      pageId = await ctx.client.createPage(parentId, node.title);
      ctx.log(`[sync] Created page "${node.title}" (${displayPath(node)})`);
    }
    claimed.add(pageId);

    registerMapping(ctx.mapping, node, pageId);
    ctx.results.push({
      pageId,
      title: node.title,
      relativePath: node.relativePath,
      kind: node.kind,
      action: match ? "matched" : "created",
    });

    if (node.kind === "directory") {
      await ensurePages(node.children, pageId, ctx, true);
    }
  }

  if (pruneParent && ctx.options.prune) {
    for (const child of remoteChildren) {
      if (!claimed.has(child.pageId)) {
        await ctx.client.archivePage(child.pageId);
        ctx.archived.push(child);
        ctx.log(`[sync] Archived page "${child.title}" (no local source)`);
      }
    }
  }
}

/**
 * Pairs local siblings with existing remote children of the same title.
 *
 * The n-th local sibling titled T claims the n-th remote child titled T, so
 * repeated titles stay stable across runs. When a directory and a document
 * share a title, a remote page that holds child pages goes to the directory
 * and one without goes to the document first; the rest pair by position.
 */
async function claimRemotePages(
  nodes: LocalNode[],
  remoteChildren: RemotePageRef[],
  client: RemotePageClient
): Promise<Map<LocalNode, RemotePageRef>> {
  const claims = new Map<LocalNode, RemotePageRef>();

  for (const title of new Set(nodes.map((node) => node.title))) {
    const siblings = nodes.filter((node) => node.title === title);
    const candidates = remoteChildren.filter((child) => child.title === title);
    if (candidates.length === 0) {
      continue;
    }

    const take = (accepts: (child: RemotePageRef) => boolean): RemotePageRef | undefined => {
      const index = candidates.findIndex(accepts);
      return index === -1 ? undefined : candidates.splice(index, 1)[0];
    };

    const mixed =
      siblings.some((node) => node.kind === "directory") &&
      siblings.some((node) => node.kind === "document");
    if (mixed) {
      const parents = new Set<string>();
      for (const child of candidates) {
        if ((await client.listChildren(child.pageId)).length > 0) {
          parents.add(child.pageId);
        }
      }
      for (const node of siblings) {
        const match = take((child) => parents.has(child.pageId) === (node.kind === "directory"));
        if (match) {
          claims.set(node, match);
        }
      }
    }

    for (const node of siblings) {
      const match = claims.has(node) ? undefined : take(() => true);
      if (match) {
        claims.set(node, match);
      }
    }
  }

  return claims;
}

function mappedPage(mapping: PageMapping, node: LocalNode): MappedPage {
  const page = mapping.get(node.path);
  if (!page) {
    throw new Error(`No page mapped for ${node.path}`);
  }
  return page;
}

function countNodes(root: LocalNode): number {
  return [...walkLocalTree(root)].length;
}

function displayPath(node: LocalNode): string {
  if (node.relativePath === "") {
    return path.basename(node.path) + "/";
  }
  return node.kind === "directory" ? `${node.relativePath}/` : node.relativePath;
}

function elapsed(start: number): string {
  return `${((Date.now() - start) / 1000).toFixed(1)}s`;
}
