/**
 * Link resolution for synchronized documents.
 *
 * Maps links written in a source document onto the local nodes of the
 * synchronized tree. The synchronizer then rewrites each resolved link to
 * the URL of the node's remote page.
 *
 * Resolution rules:
 * - Links with a scheme (`https:`, `mailto:`) or protocol-relative links are
 *   external, unless they start with a configured GitHub wiki root
 * - Fragment-only links (`#section`) stay as they are
 * - Relative links resolve against the source document's directory; they are
 *   intra-tree when they stay inside the source root and name a `.md` file,
 *   a directory, or an extensionless path (tried as `<path>.md`, then as a
 *   directory). Other relative links (images, assets) are left alone.
 * - GitHub wiki links `<root>/Page-Name` resolve to `Page-Name.md` at the
 *   source root, then to the only document with that file name anywhere in
 *   the tree. The bare wiki root is `Home.md`.
 *
 * Fragments are dropped from rewritten links: Notion addresses blocks by ID,
 * not by heading slug.
 */

import * as path from "node:path";
import type { Link, Root, RootContent } from "mdast";
import { LinkResolutionError } from "../errors.js";
import type { LocalNode, PageMapping, UnresolvedLinkPolicy } from "../types.js";

const MARKDOWN_EXTENSION = ".md";

/**
 * GitHub's wiki landing page.
 */
const WIKI_HOME_PAGE = "Home";

export interface LinkResolverOptions {
  /** Absolute path of the synchronized root directory */
  rootDir: string;
  /** GitHub wiki URLs (e.g. "https://github.com/acme/handbook/wiki") */
  githubWikiRoots?: string[];
  /** What to do when an intra-tree link has no target (default: error) */
  unresolvedLinks?: UnresolvedLinkPolicy;
}

/**
 * Outcome of resolving one link.
 *
 * - `external`: not a link into the synchronized tree, left untouched
 * - `resolved`: points at the page mapped for `localPath`
 * - `unresolved`: looks like an intra-tree link but matches no node
 */
export type LinkTarget =
  | { kind: "external" }
  | { kind: "resolved"; localPath: string }
  | { kind: "unresolved"; reason: string };

/**
 * Resolves links against the page mapping of one sync run.
 *
 * @example
 * ```ts
 * const resolver = new LinkResolver(mapping, { rootDir: "/docs" });
 * resolver.resolve("./page1.md", "/docs/dir1/index.md");
 * // { kind: "resolved", localPath: "/docs/dir1/page1.md" }
 * ```
 */
export class LinkResolver {
  private readonly rootDir: string;
  private readonly wikiRoots: string[];
  private readonly unresolvedLinks: UnresolvedLinkPolicy;

  /** Document file name → absolute paths, for wiki lookups */
  private readonly documentsByName: Map<string, string[]> = new Map();

  constructor(
    private readonly mapping: PageMapping,
    options: LinkResolverOptions
  ) {
    this.rootDir = path.resolve(options.rootDir);
    this.wikiRoots = (options.githubWikiRoots ?? [])
      .map((root) => root.trim())
      .filter((root) => root.length > 0)
      .map((root) => (root.endsWith("/") ? root : `${root}/`));
    this.unresolvedLinks = options.unresolvedLinks ?? "error";

    for (const [localPath, page] of mapping) {
      if (page.node.kind === "document" && page.node.path === localPath) {
        const name = path.basename(localPath);
        this.documentsByName.set(name, [...(this.documentsByName.get(name) ?? []), localPath]);
      }
    }
  }

  /**
   * Resolves a link found in `sourcePath` (absolute path of the document).
   *
   * @throws LinkResolutionError for ambiguous wiki links
   */
  resolve(href: string, sourcePath: string): LinkTarget {
    const wikiRoot = this.wikiRoots.find(
      (root) => href.startsWith(root) || `${href}/` === root
    );
    if (wikiRoot) {
      return this.resolveWikiLink(href, wikiRoot, sourcePath);
    }

    if (href === "" || href.startsWith("#") || href.startsWith("//") || /^[a-z][a-z0-9+.-]*:/i.test(href)) {
      return { kind: "external" };
    }

    const linkPath = decodePath(stripQueryAndFragment(href));
    if (linkPath === "") {
      return { kind: "external" };
    }

    const base = linkPath.startsWith("/") ? this.rootDir : path.dirname(sourcePath);
    const target = path.resolve(base, linkPath.replace(/^\/+/, ""));
    if (!this.isInsideRoot(target)) {
      return { kind: "external" };
    }

    const extension = path.extname(target);
    if (extension !== "" && extension !== MARKDOWN_EXTENSION) {
      // Assets (images, PDFs) have no page of their own
      return { kind: "external" };
    }

    const candidates = extension === "" ? [`${target}${MARKDOWN_EXTENSION}`, target] : [target];
    const found = candidates.find((candidate) => this.mapping.has(candidate));
    return found
      ? { kind: "resolved", localPath: found }
      : { kind: "unresolved", reason: `no document or directory at ${this.relative(target)}` };
  }

  /**
   * Rewrites every resolvable link in `ast` in place.
   *
   * @param urlFor - Remote URL of the page mapped for a local path
   * @returns Number of links rewritten
   * @throws LinkResolutionError for unresolved links under the "error" policy
   */
  async rewriteLinks(
    ast: Root,
    sourcePath: string,
    urlFor: (localPath: string) => Promise<string>
  ): Promise<number> {
    let rewritten = 0;

    for (const link of collectLinks(ast.children)) {
      const target = this.resolve(link.url, sourcePath);

      if (target.kind === "resolved") {
        link.url = await urlFor(target.localPath);
        rewritten++;
      } else if (target.kind === "unresolved" && this.unresolvedLinks === "error") {
        throw new LinkResolutionError(
          `Cannot resolve link "${link.url}" in ${this.relative(sourcePath)}: ${target.reason}`,
          link.url,
          this.relative(sourcePath)
        );
      }
    }

    return rewritten;
  }

  private resolveWikiLink(href: string, wikiRoot: string, sourcePath: string): LinkTarget {
    const pageName = decodePath(stripQueryAndFragment(href.slice(wikiRoot.length))).replace(/\/+$/, "");
    const fileName = `${pageName || WIKI_HOME_PAGE}${MARKDOWN_EXTENSION}`;

    const atRoot = path.join(this.rootDir, fileName);
    if (this.mapping.has(atRoot)) {
      return { kind: "resolved", localPath: atRoot };
    }

    const matches = this.documentsByName.get(path.basename(fileName)) ?? [];
    if (matches.length === 1) {
      return { kind: "resolved", localPath: matches[0] };
    }
    if (matches.length > 1) {
      throw new LinkResolutionError(
        `Wiki link "${href}" in ${this.relative(sourcePath)} is ambiguous: ${matches
          .map((match) => this.relative(match))
          .join(", ")}`,
        href,
        this.relative(sourcePath)
      );
    }

    return { kind: "unresolved", reason: `no wiki page named ${fileName}` };
  }

  private isInsideRoot(target: string): boolean {
    const relative = path.relative(this.rootDir, target);
    return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
  }

  private relative(target: string): string {
    return path.relative(this.rootDir, target).split(path.sep).join("/");
  }
}

/**
 * Registers a node's page under every local path a link may use for it.
 */
export function registerMapping(
  mapping: PageMapping,
  node: LocalNode,
  pageId: string
): void {
  const page = { pageId, title: node.title, node };
  mapping.set(node.path, page);
  if (node.kind === "directory" && node.index) {
    mapping.set(node.index.path, page);
  }
}

/**
 * Collects link nodes in document order.
 */
function collectLinks(nodes: RootContent[]): Link[] {
  const links: Link[] = [];
  for (const node of nodes) {
    if (node.type === "link") {
      links.push(node);
    }
    if ("children" in node) {
      links.push(...collectLinks(node.children));
    }
  }
  return links;
}

function stripQueryAndFragment(href: string): string {
  return href.replace(/[?#].*$/, "");
}

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escapes are kept verbatim, like a browser would
    return value;
  }
}
