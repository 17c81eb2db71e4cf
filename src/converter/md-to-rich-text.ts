/**
 * Markdown to Notion rich text converter.
 *
 * Converts mdast phrasing content (inline nodes) to Notion rich_text arrays.
 *
 * Handles the following mdast node types:
 * - text: Plain text content
 * - strong: **bold** -> annotations.bold: true
 * - emphasis: *italic* -> annotations.italic: true
 * - inlineCode: `code` -> annotations.code: true
 * - delete: ~~strikethrough~~ -> annotations.strikethrough: true
 * - link: [text](url) -> text.link.url set (absolute URLs only)
 * - linkReference / imageReference without a definition -> their text
 * - break: hard line break -> "\n"
 *
 * Multiple annotations are combined via recursive traversal with an
 * annotation stack.
 */

import type { PhrasingContent } from "mdast";

/**
 * Notion caps the content of a single rich text object at 2000 characters.
 */
export const MAX_RICH_TEXT_LENGTH = 2000;

/**
 * Notion rich text annotations.
 */
export interface NotionAnnotations {
  bold?: boolean;
  italic?: boolean;
  strikethrough?: boolean;
  code?: boolean;
}

/**
 * Notion rich text element for page/block creation payloads.
 */
export interface NotionRichTextPayload {
  type: "text";
  text: {
    content: string;
    link?: {
      url: string;
    } | null;
  };
  annotations?: NotionAnnotations;
}

/**
 * True for URLs Notion accepts as a link target.
 *
 * Relative paths that survive link resolution (assets, links leaving the
 * synchronized tree) are rejected by the API, so they render as plain text.
 */
export function isLinkableUrl(url: string): boolean {
  return /^(https?:|mailto:|tel:)/i.test(url);
}

/**
 * Converts mdast phrasing content to a Notion rich_text array.
 *
 * Walks the phrasing content tree depth-first, accumulating annotations.
 * At leaf nodes, emits rich_text elements carrying the accumulated
 * annotations, split into chunks Notion accepts.
 *
 * @example
 * ```ts
 * phrasesToRichText([{ type: "strong", children: [{ type: "text", value: "bold" }] }]);
 * // [{ type: "text", text: { content: "bold" }, annotations: { bold: true } }]
 * ```
 */
export function phrasesToRichText(nodes: PhrasingContent[]): NotionRichTextPayload[] {
  if (!nodes || nodes.length === 0) {
    return [];
  }

  return convertChildren(nodes, {}, null);
}

/**
 * Rich text for a plain string (code blocks, captions, toggle summaries).
 */
export function plainRichText(content: string): NotionRichTextPayload[] {
  return splitContent(content).map((chunk): NotionRichTextPayload => ({
    type: "text",
    text: { content: chunk },
  }));
}

function convertPhrasingNode(
  node: PhrasingContent,
  annotations: NotionAnnotations,
  linkUrl: string | null
): NotionRichTextPayload[] {
  switch (node.type) {
    case "text":
      return createRichTextElements(node.value, annotations, linkUrl);

    case "strong":
      return convertChildren(node.children, { ...annotations, bold: true }, linkUrl);

    case "emphasis":
      return convertChildren(node.children, { ...annotations, italic: true }, linkUrl);

    case "inlineCode":
      return createRichTextElements(node.value, { ...annotations, code: true }, linkUrl);

    case "delete":
      return convertChildren(node.children, { ...annotations, strikethrough: true }, linkUrl);

    case "link":
      return convertChildren(
        node.children,
        annotations,
        isLinkableUrl(node.url) ? node.url : null
      );

    case "break":
      return createRichTextElements("\n", annotations, linkUrl);

    case "html":
      // Notion has no inline HTML; keep the source visible
      return createRichTextElements(node.value, annotations, linkUrl);

    case "image": {
      // Block-level images are handled by md-to-blocks.ts
      const alt = node.alt || "image";
      return createRichTextElements(
        `[${alt}]`,
        annotations,
        isLinkableUrl(node.url) ? node.url : linkUrl
      );
    }

    // References are inlined by the parser; one left here has no definition
    case "linkReference":
      return convertChildren(node.children, annotations, linkUrl);

    case "imageReference":
      return createRichTextElements(`[${node.alt || "image"}]`, annotations, linkUrl);

    case "footnoteReference":
      return createRichTextElements(`[^${node.label ?? node.identifier}]`, annotations, linkUrl);

    default: {
      const unknownNode: { type: string } = node;
      console.warn(`[md-to-rich-text] Unknown phrasing node type: ${unknownNode.type}`);
      return [];
    }
  }
}

function convertChildren(
  children: PhrasingContent[],
  annotations: NotionAnnotations,
  linkUrl: string | null
): NotionRichTextPayload[] {
  const result: NotionRichTextPayload[] = [];

  for (const child of children) {
    result.push(...convertPhrasingNode(child, annotations, linkUrl));
  }

  return result;
}

/**
 * Creates rich_text elements for one run of formatted text.
 * Only annotations that are true are included, to keep payloads minimal.
 */
function createRichTextElements(
  content: string,
  annotations: NotionAnnotations,
  linkUrl: string | null
): NotionRichTextPayload[] {
  const elementAnnotations: NotionAnnotations = {};
  if (annotations.bold) elementAnnotations.bold = true;
  if (annotations.italic) elementAnnotations.italic = true;
  if (annotations.strikethrough) elementAnnotations.strikethrough = true;
  if (annotations.code) elementAnnotations.code = true;

  return splitContent(content).map((chunk) => {
    const element: NotionRichTextPayload = {
      type: "text",
      text: { content: chunk },
      annotations: { ...elementAnnotations },
    };
    if (linkUrl) {
      element.text.link = { url: linkUrl };
    }
    return element;
  });
}

function splitContent(content: string): string[] {
  if (content.length <= MAX_RICH_TEXT_LENGTH) {
    return [content];
  }
  const chunks: string[] = [];
  for (let i = 0; i < content.length; i += MAX_RICH_TEXT_LENGTH) {
    chunks.push(content.slice(i, i + MAX_RICH_TEXT_LENGTH));
  }
  return chunks;
}
