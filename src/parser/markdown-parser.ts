/**
 * Markdown parser for source documents.
 *
 * Parses document content into an mdast AST using unified/remark:
 * - remark-parse: Markdown → mdast
 * - remark-gfm: GFM support (tables, strikethrough, task lists, autolinks)
 *
 * Front matter is stripped before parsing; its keys don't map onto anything
 * a plain Notion page holds.
 *
 * The parsed tree is normalized so later stages see every link:
 * - reference links and images become inline links and images, and their
 *   definitions are dropped
 * - a `<details>` block held in a single HTML node is split into its opening
 *   tag, the parsed markdown body, and the closing tag
 */

import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import type { Definition, RootContent, Root } from "mdast";

/**
 * `<details>` opening (with its optional `<summary>`), body, and closing tag.
 */
const SELF_CONTAINED_DETAILS =
  /^(<details[^>]*>\s*(?:<summary>[\s\S]*?<\/summary>)?)([\s\S]*)<\/details>$/i;

/**
 * Removes a YAML front matter block from the start of a document.
 *
 * Front matter must be at the very start of the file, delimited by `---`
 * lines. Handles edge cases:
 * - No front matter → content returned as is (line endings normalized)
 * - Opening `---` without a closing one → content returned as is
 * - Front matter only → empty body
 *
 * @param content - Raw markdown file content
 * @returns The markdown body
 *
 * @example
 * ```ts
 * stripFrontmatter("---\ntitle: Hello\n---\n# Content");
 * // "# Content"
 * ```
 */
export function stripFrontmatter(content: string): string {
  const normalized = content.replace(/\r\n/g, "\n");

  if (!normalized.startsWith("---\n")) {
    return normalized;
  }

  // Closing delimiter must sit on its own line
  const closing = /\n---[ \t]*(\n|$)/.exec(normalized.slice(3));
  if (!closing) {
    return normalized;
  }

  return normalized.slice(3 + closing.index + closing[0].length);
}

/**
 * Parses markdown body content into an mdast AST.
 *
 * @param body - Markdown content (without front matter)
 * @returns mdast Root node containing the AST
 *
 * @example
 * ```ts
 * const ast = parseMarkdown("# Hello\n\nParagraph with **bold**.");
 * // ast.children[0].type === "heading"
 * // ast.children[1].type === "paragraph"
 * ```
 */
export function parseMarkdown(body: string): Root {
  const ast = unified().use(remarkParse).use(remarkGfm).parse(body);
  expandDetails(ast.children);
  inlineReferences(ast);
  return ast;
}

/**
 * Parses a complete document: strips front matter, then parses the body.
 */
export function parseDocument(content: string): Root {
  return parseMarkdown(stripFrontmatter(content));
}

/**
 * Splits self-contained `<details>` HTML blocks so their markdown body sits
 * between an opening and a closing HTML node.
 */
function expandDetails(nodes: RootContent[]): void {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];

    if (node.type === "html") {
      const match = SELF_CONTAINED_DETAILS.exec(node.value.trim());
      if (match) {
        const expanded: RootContent[] = [
          { type: "html", value: match[1] },
          ...parseMarkdown(match[2]).children,
          { type: "html", value: "</details>" },
        ];
        nodes.splice(i, 1, ...expanded);
        i += expanded.length - 1;
      }
      continue;
    }

    if (
      node.type === "blockquote" ||
      node.type === "list" ||
      node.type === "listItem" ||
      node.type === "footnoteDefinition"
    ) {
      expandDetails(node.children);
    }
  }
}

/**
 * Replaces `[text][id]` and `![alt][id]` with inline links and images
 * carrying the definition's URL, and removes the definitions.
 *
 * The first definition of an identifier wins, as in CommonMark.
 */
function inlineReferences(ast: Root): void {
  const definitions = new Map<string, Definition>();
  collectDefinitions(ast.children, definitions);
  replaceReferences(ast.children, definitions);
}

function collectDefinitions(nodes: RootContent[], definitions: Map<string, Definition>): void {
  for (const node of nodes) {
    if (node.type === "definition") {
      if (!definitions.has(node.identifier)) {
        definitions.set(node.identifier, node);
      }
    } else if ("children" in node) {
      collectDefinitions(node.children, definitions);
    }
  }
}

function replaceReferences(nodes: RootContent[], definitions: Map<string, Definition>): void {
  for (let i = nodes.length - 1; i >= 0; i--) {
    const node = nodes[i];

    if (node.type === "definition") {
      nodes.splice(i, 1);
      continue;
    }

    if (node.type === "linkReference" || node.type === "imageReference") {
      const definition = definitions.get(node.identifier);
      if (definition) {
        nodes[i] =
          node.type === "linkReference"
            ? {
                type: "link",
                url: definition.url,
                title: definition.title,
                children: node.children,
                position: node.position,
              }
            : {
                type: "image",
                url: definition.url,
                title: definition.title,
                alt: node.alt,
                position: node.position,
              };
      }
    }

    const current = nodes[i];
    if ("children" in current) {
      replaceReferences(current.children, definitions);
    }
  }
}
