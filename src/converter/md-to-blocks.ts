/**
 * mdast to Notion block converter.
 *
 * Converts mdast block nodes (from remark parsing) to Notion block creation
 * payloads for `blocks.children.append`.
 *
 * Supported mdast node types:
 * - heading (depth 1-3) → heading_1/heading_2/heading_3 (deeper → heading_3)
 * - paragraph → paragraph (a lone image with an absolute URL → image)
 * - code → code block with language
 * - list (ordered/unordered) → bulleted_list_item/numbered_list_item
 * - listItem with checked → to_do
 * - blockquote → quote
 * - blockquote starting with a GitHub alert marker (`> [!NOTE]`) → callout
 * - table → table with table_row children (split past 100 rows)
 * - html `<details><summary>` ... `</details>` → toggle (the parser splits
 *   single-node details blocks into opening, body and closing nodes)
 * - thematicBreak → divider
 *
 * Unsupported types are logged with a warning and skipped.
 */

import type {
  Blockquote,
  Code,
  Heading,
  Html,
  Image,
  List,
  ListItem,
  Paragraph,
  RootContent,
  Table,
} from "mdast";
import type { NotionBlockPayload } from "../types.js";
import {
  isLinkableUrl,
  phrasesToRichText,
  plainRichText,
  type NotionRichTextPayload,
} from "./md-to-rich-text.js";

/**
 * GitHub alert types and the callout icons they map to.
 */
const ALERT_TO_ICON: Record<string, string> = {
  note: "📝",
  tip: "💡",
  important: "❗",
  warning: "⚠️",
  caution: "🔥",
};

const ALERT_MARKER = /^\[!(NOTE|TIP|IMPORTANT|WARNING|CAUTION)\][ \t]*\n?/i;

/**
 * Fence languages that Notion knows under another name.
 */
const LANGUAGE_ALIASES: Record<string, string> = {
  js: "javascript",
  jsx: "javascript",
  ts: "typescript",
  tsx: "typescript",
  sh: "shell",
  zsh: "shell",
  console: "shell",
  yml: "yaml",
  py: "python",
  rb: "ruby",
  md: "markdown",
  golang: "go",
  cpp: "c++",
  cs: "c#",
  csharp: "c#",
  dockerfile: "docker",
  text: "plain text",
  txt: "plain text",
};

/**
 * Notion accepts two levels of nested children in one append request.
 */
const MAX_NESTING_DEPTH = 2;

/**
 * Notion takes at most 100 children per block in one request.
 */
export const MAX_TABLE_ROWS = 100;

/**
 * Converts an array of mdast block nodes to Notion block creation payloads.
 *
 * This is the main entry point for converting markdown AST to Notion blocks.
 * Nesting deeper than Notion accepts in a single request is flattened into
 * the deepest allowed level.
 *
 * @param nodes - Array of mdast nodes (typically Root.children)
 * @returns Array of Notion block payloads
 *
 * @example
 * ```ts
 * const ast = parseMarkdown("# Hello\n\nWorld");
 * const blocks = mdastToNotionBlocks(ast.children);
 * // blocks = [
 * //   { type: "heading_1", heading_1: { rich_text: [...] } },
 * //   { type: "paragraph", paragraph: { rich_text: [...] } }
 * // ]
 * ```
 */
export function mdastToNotionBlocks(nodes: RootContent[]): NotionBlockPayload[] {
  return limitNesting(convertNodes(nodes), 0);
}

/**
 * Converts sibling nodes, pairing `<details>` HTML with the nodes between it
 * and its closing tag.
 */
function convertNodes(nodes: RootContent[]): NotionBlockPayload[] {
  if (!nodes || nodes.length === 0) {
    return [];
  }

  const result: NotionBlockPayload[] = [];

  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];

    if (node.type === "html" && isOpenDetails(node.value)) {
      const closeIndex = nodes.findIndex(
        (candidate, j) => j > i && candidate.type === "html" && candidate.value.includes("</details>")
      );
      if (closeIndex !== -1) {
        result.push(buildToggle(node.value, nodes.slice(i + 1, closeIndex)));
        i = closeIndex;
        continue;
      }
    }

    result.push(...convertNode(node));
  }

  return result;
}

/**
 * Converts a single mdast node to zero or more Notion block payloads.
 */
function convertNode(node: RootContent): NotionBlockPayload[] {
  switch (node.type) {
    case "heading":
      return [convertHeading(node)];

    case "paragraph":
      return [convertParagraph(node)];

    case "code":
      return [convertCode(node)];

    case "list":
      return convertList(node);

    case "blockquote":
      return [convertBlockquote(node)];

    case "table":
      return convertTable(node);

    case "thematicBreak":
      return [{ type: "divider", divider: {} }];

    case "image":
      return [convertImage(node)];

    case "html":
      return convertHtml(node);

    // These are handled within their parent containers
    case "listItem":
    case "tableRow":
    case "tableCell":
      return [];

    // Inlined into their references by the parser
    case "definition":
      return [];

    case "footnoteDefinition":
      console.warn(`[md-to-blocks] Skipping unsupported node type: ${node.type}`);
      return [];

    // Front matter is stripped before parsing
    case "yaml":
      return [];

    default: {
      const unknownNode: { type: string } = node;
      console.warn(`[md-to-blocks] Unknown node type: ${unknownNode.type}`);
      return [];
    }
  }
}

/**
 * Converts a heading node to a Notion heading block.
 * Notion supports heading levels 1-3; levels 4+ are converted to heading_3.
 */
function convertHeading(node: Heading): NotionBlockPayload {
  const level = Math.min(node.depth, 3);
  const headingKey = `heading_${level}`;

  return {
    type: headingKey,
    [headingKey]: {
      rich_text: phrasesToRichText(node.children),
    },
  };
}

function convertParagraph(node: Paragraph): NotionBlockPayload {
  const image = soleImage(node);
  if (image && isLinkableUrl(image.url)) {
    return convertImage(image);
  }

  return {
    type: "paragraph",
    paragraph: {
      rich_text: phrasesToRichText(node.children),
    },
  };
}

/**
 * The image a paragraph consists of, ignoring surrounding whitespace.
 */
function soleImage(node: Paragraph): Image | null {
  const meaningful = node.children.filter(
    (child) => !(child.type === "text" && child.value.trim() === "")
  );
  const [first] = meaningful;
  return meaningful.length === 1 && first.type === "image" ? first : null;
}

function convertCode(node: Code): NotionBlockPayload {
  return {
    type: "code",
    code: {
      language: codeLanguage(node.lang),
      rich_text: plainRichText(node.value),
    },
  };
}

/**
 * Maps a fence language to Notion's name for it.
 * Notion's language must not be empty, so "plain text" is the fallback.
 */
export function codeLanguage(lang: string | null | undefined): string {
  if (!lang) {
    return "plain text";
  }
  const normalized = lang.toLowerCase();
  return LANGUAGE_ALIASES[normalized] ?? normalized;
}

/**
 * Converts a list node to an array of Notion list item blocks.
 */
function convertList(node: List): NotionBlockPayload[] {
  const blockType = node.ordered === true ? "numbered_list_item" : "bulleted_list_item";
  return node.children.map((item) => convertListItem(item, blockType));
}

/**
 * Converts a list item to a Notion list item or to_do block.
 * Task list items (with a boolean `checked`) become to_do blocks.
 */
function convertListItem(
  node: ListItem,
  blockType: "numbered_list_item" | "bulleted_list_item"
): NotionBlockPayload {
  const { richText, childBlocks } = splitLeadParagraph(node.children);

  if (typeof node.checked === "boolean") {
    return withChildren(
      { type: "to_do", to_do: { rich_text: richText, checked: node.checked } },
      childBlocks
    );
  }

  return withChildren({ type: blockType, [blockType]: { rich_text: richText } }, childBlocks);
}

/**
 * Splits container content into the block's own rich_text (the first
 * paragraph) and its nested child blocks (everything else).
 */
function splitLeadParagraph(children: RootContent[]): {
  richText: NotionRichTextPayload[];
  childBlocks: NotionBlockPayload[];
} {
  const [first, ...rest] = children;
  if (first && first.type === "paragraph") {
    return { richText: phrasesToRichText(first.children), childBlocks: convertNodes(rest) };
  }
  return { richText: [], childBlocks: convertNodes(children) };
}

/**
 * Converts a blockquote to a Notion quote block, or to a callout when it
 * opens with a GitHub alert marker.
 */
function convertBlockquote(node: Blockquote): NotionBlockPayload {
  const alert = extractAlert(node);
  if (alert) {
    const { richText, childBlocks } = splitLeadParagraph(alert.children);
    return withChildren(
      {
        type: "callout",
        callout: {
          rich_text: richText,
          icon: { type: "emoji", emoji: ALERT_TO_ICON[alert.kind] },
        },
      },
      childBlocks
    );
  }

  // Paragraphs merge into the quote's rich_text; other content nests
  const allRichText: NotionRichTextPayload[] = [];
  const nested: RootContent[] = [];

  for (const child of node.children) {
    if (child.type === "paragraph") {
      if (allRichText.length > 0) {
        allRichText.push({ type: "text", text: { content: "\n" } });
      }
      allRichText.push(...phrasesToRichText(child.children));
    } else {
      nested.push(child);
    }
  }

  return withChildren({ type: "quote", quote: { rich_text: allRichText } }, convertNodes(nested));
}

/**
 * Detects a GitHub alert (`> [!WARNING]`) and returns its kind and the
 * blockquote content with the marker removed.
 */
function extractAlert(node: Blockquote): { kind: string; children: RootContent[] } | null {
  const [first, ...rest] = node.children;
  if (!first || first.type !== "paragraph") {
    return null;
  }
  const [lead, ...phrases] = first.children;
  if (!lead || lead.type !== "text") {
    return null;
  }
  const match = ALERT_MARKER.exec(lead.value);
  if (!match) {
    return null;
  }

  const remainder = lead.value.slice(match[0].length);
  const paragraphChildren = remainder ? [{ ...lead, value: remainder }, ...phrases] : phrases;
  const children: RootContent[] =
    paragraphChildren.length > 0 ? [{ ...first, children: paragraphChildren }, ...rest] : rest;

  return { kind: match[1].toLowerCase(), children };
}

/**
 * Converts a table to Notion table blocks with table_row children.
 * Rows shorter than the header are padded with empty cells.
 *
 * Tables longer than MAX_TABLE_ROWS become consecutive tables, each
 * starting with a copy of the header row.
 */
function convertTable(node: Table): NotionBlockPayload[] {
  const tableWidth = Math.max(1, ...node.children.map((row) => row.children.length));

  const tableRows = node.children.map((row) => {
    const cells = row.children.map((cell) => phrasesToRichText(cell.children));
    while (cells.length < tableWidth) {
      cells.push([]);
    }
    return { type: "table_row", table_row: { cells } };
  });

  const [header, ...body] = tableRows;
  if (!header) {
    return [];
  }
  if (tableRows.length <= MAX_TABLE_ROWS) {
    return [tableBlock(tableWidth, tableRows)];
  }

  const tables: NotionBlockPayload[] = [];
  for (let i = 0; i < body.length; i += MAX_TABLE_ROWS - 1) {
    tables.push(tableBlock(tableWidth, [header, ...body.slice(i, i + MAX_TABLE_ROWS - 1)]));
  }
  return tables;
}

function tableBlock(tableWidth: number, rows: NotionBlockPayload[]): NotionBlockPayload {
  return {
    type: "table",
    table: {
      table_width: tableWidth,
      has_column_header: true,
      has_row_header: false,
      children: rows,
    },
  };
}

/**
 * Converts an image to an external image block.
 * Relative image paths can't be uploaded, so they degrade to their alt text.
 */
function convertImage(node: Image): NotionBlockPayload {
  if (!isLinkableUrl(node.url)) {
    return {
      type: "paragraph",
      paragraph: { rich_text: plainRichText(`[${node.alt || "image"}]`) },
    };
  }

  return {
    type: "image",
    image: {
      type: "external",
      external: { url: node.url },
      caption: node.alt ? plainRichText(node.alt) : [],
    },
  };
}

/**
 * Converts block-level HTML. `<details>` openings are paired with their
 * closing tag in convertNodes; other HTML is skipped.
 */
function convertHtml(node: Html): NotionBlockPayload[] {
  const html = node.value.trim();

  // Don't warn for closing tags, comments, or empty elements
  if (
    !html.startsWith("</") &&
    !html.startsWith("<!--") &&
    !/^<(br|hr)\s*\/?>$/i.test(html)
  ) {
    console.warn(
      `[md-to-blocks] Skipping unsupported HTML: ${html.substring(0, 50)}${html.length > 50 ? "..." : ""}`
    );
  }

  return [];
}

function isOpenDetails(html: string): boolean {
  return html.trim().toLowerCase().startsWith("<details");
}

/**
 * Builds a toggle block from a `<details>` opening (which carries the
 * `<summary>`) and the markdown nodes inside it.
 */
function buildToggle(openingHtml: string, body: RootContent[]): NotionBlockPayload {
  const summaryMatch = /<summary>([\s\S]*?)<\/summary>/i.exec(openingHtml);
  const summary = summaryMatch ? summaryMatch[1].trim() : "Details";

  return withChildren(
    { type: "toggle", toggle: { rich_text: plainRichText(summary) } },
    convertNodes(body)
  );
}

/**
 * Attaches nested blocks under the block's type-specific payload.
 */
function withChildren(block: NotionBlockPayload, children: NotionBlockPayload[]): NotionBlockPayload {
  if (children.length > 0) {
    block[block.type].children = children;
  }
  return block;
}

/**
 * Lifts children nested deeper than MAX_NESTING_DEPTH up to the deepest
 * allowed level, right after the block that held them.
 */
function limitNesting(blocks: NotionBlockPayload[], depth: number): NotionBlockPayload[] {
  return placeAtDepth(blocks, depth).placed;
}

/**
 * Places blocks at `depth`. A table's rows sit one level below it, so a
 * table that lands at the limit is returned in `lifted` and placed after
 * the nearest ancestor that leaves room for its rows.
 */
function placeAtDepth(
  blocks: NotionBlockPayload[],
  depth: number
): { placed: NotionBlockPayload[]; lifted: NotionBlockPayload[] } {
  const placed: NotionBlockPayload[] = [];
  const lifted: NotionBlockPayload[] = [];

  for (const block of blocks) {
    if (block.type === "table") {
      if (depth < MAX_NESTING_DEPTH) {
        placed.push(block);
      } else {
        lifted.push(block);
      }
      continue;
    }

    const payload = block[block.type];
    const children: NotionBlockPayload[] | undefined = payload?.children;
    placed.push(block);

    if (!children || children.length === 0) {
      continue;
    }

    if (depth < MAX_NESTING_DEPTH) {
      const inner = placeAtDepth(children, depth + 1);
      if (inner.placed.length > 0) {
        payload.children = inner.placed;
      } else {
        delete payload.children;
      }
      placed.push(...inner.lifted);
    } else {
      delete payload.children;
      const inner = placeAtDepth(children, depth);
      placed.push(...inner.placed);
      lifted.push(...inner.lifted);
    }
  }

  return { placed, lifted };
}
