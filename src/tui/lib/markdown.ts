/**
 * Markdown rendering for the PR description panel, plus extraction of the
 * images and videos it references. The body is parsed with remark (GFM) and
 * the tree flattened into styled terminal rows.
 */

import type { List, ListItem, PhrasingContent, Root, RootContent, Table } from "mdast";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import { unified } from "unified";
import { displayWidth, wrapLine } from "./layout";

// ============================================================================
// Types
// ============================================================================

export type MediaType = "image" | "video";

export interface MediaRef {
  type: MediaType;
  url: string;
  alt: string;
}

export type LineColor = "cyan" | "yellow" | "gray" | "green" | "magenta";

export interface StyledLine {
  text: string;
  color?: LineColor;
  bold?: boolean;
  dim?: boolean;
}

// ============================================================================
// Media References
// ============================================================================

const MARKDOWN_IMAGE = /!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;
const HTML_IMG = /<img\b[^>]*>/gi;
const HTML_VIDEO = /<video\b[^>]*>(?:[\s\S]*?<\/video>)?/gi;
const VIDEO_EXTENSION = /\.(mp4|mov|webm)$/i;
const ASSET_PREFIXES = [
  "https://github.com/user-attachments/assets/",
  "https://private-user-images.githubusercontent.com/",
];

function htmlAttr(tag: string, name: string): string | null {
  const match = new RegExp(`\\b${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, "i").exec(tag);
  if (!match) return null;
  return match[1] ?? match[2] ?? null;
}

/**
 * A bare attachment URL on its own line. Images are normally wrapped in
 * `![]()`, so a bare one is taken to be a video.
 */
function bareVideoUrl(line: string): string | null {
  const trimmed = line.trim();
  if (!ASSET_PREFIXES.some((p) => trimmed.startsWith(p))) return null;
  if (/\s/.test(trimmed)) return null;
  return trimmed;
}

export function isVideoUrl(url: string): boolean {
  return VIDEO_EXTENSION.test(url.split("?")[0] ?? url);
}

/**
 * Replace media in the PR body with placeholders.
 * Returns the rewritten text and the media in order of appearance.
 */
export function preprocessPrBody(body: string): { text: string; refs: MediaRef[] } {
  const refs: MediaRef[] = [];
  const out: string[] = [];

  const add = (ref: MediaRef): string => {
    refs.push(ref);
    return ref.type === "video" ? "[🎬 Video]" : `[🖼 ${ref.alt}]`;
  };

  for (const line of body.replace(/\r\n/g, "\n").split("\n")) {
    const bare = bareVideoUrl(line);
    if (bare) {
      out.push("", add({ type: "video", url: bare, alt: "Video" }), "");
      continue;
    }

    const replaced = line
      .replace(MARKDOWN_IMAGE, (_m, alt: string, url: string) =>
        add({
          type: isVideoUrl(url) ? "video" : "image",
          url,
          alt: alt.trim() || "Image",
        })
      )
      .replace(HTML_VIDEO, (tag) => {
        const src = htmlAttr(tag, "src");
        return src ? add({ type: "video", url: src, alt: "Video" }) : tag;
      })
      .replace(HTML_IMG, (tag) => {
        const src = htmlAttr(tag, "src");
        if (!src) return tag;
        return add({ type: "image", url: src, alt: htmlAttr(tag, "alt")?.trim() || "Image" });
      });
    out.push(replaced);
  }

  return { text: collapseBlankLines(out).join("\n"), refs };
}

/** Media URLs in `body`, de-duplicated, in order. */
export function extractMediaRefs(body: string): MediaRef[] {
  const seen = new Set<string>();
  return preprocessPrBody(body).refs.filter((ref) => {
    if (seen.has(ref.url)) return false;
    seen.add(ref.url);
    return true;
  });
}

function collapseBlankLines(lines: string[]): string[] {
  const result: string[] = [];
  let prevBlank = false;
  for (const line of lines) {
    const blank = line.trim().length === 0;
    if (blank && prevBlank) continue;
    result.push(line);
    prevBlank = blank;
  }
  return result;
}

// ============================================================================
// Rendering
// ============================================================================

const parser = unified().use(remarkParse).use(remarkGfm);

const MEDIA_PLACEHOLDER = /^\[(?:🖼|🎬)/u;

function stripHtml(html: string): string {
  return html
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<\/?[a-z][a-z0-9-]*(?:\s[^>]*?)?\/?>/gi, "");
}

/** Plain text of inline content; emphasis and links keep only their text. */
function inlineText(nodes: readonly PhrasingContent[]): string {
  return nodes
    .map((node) => {
      switch (node.type) {
        case "text":
        case "inlineCode":
          return node.value;
        case "html":
          return stripHtml(node.value);
        case "break":
          return "\n";
        case "image":
        case "imageReference":
          return node.alt ?? "";
        case "footnoteReference":
          return `[^${node.identifier}]`;
        case "emphasis":
        case "strong":
        case "delete":
        case "link":
        case "linkReference":
          return inlineText(node.children);
        default:
          return "";
      }
    })
    .join("");
}

// GitHub keeps single newlines inside a paragraph
function paragraphLines(children: readonly PhrasingContent[]): StyledLine[] {
  return inlineText(children)
    .split("\n")
    .map((text): StyledLine =>
      MEDIA_PLACEHOLDER.test(text.trim()) ? { text, color: "magenta" } : { text }
    );
}

function listItemLines(item: ListItem, head: string, depth: number): StyledLine[] {
  const pad = " ".repeat(displayWidth(head));
  const lines: StyledLine[] = [];
  for (const child of item.children) {
    if (child.type === "list") {
      lines.push(...listLines(child, depth + 1));
      continue;
    }
    for (const line of blockLines(child, depth)) {
      lines.push({ ...line, text: (lines.length === 0 ? head : pad) + line.text });
    }
  }
  return lines.length > 0 ? lines : [{ text: head.trimEnd() }];
}

function listLines(list: List, depth: number): StyledLine[] {
  const indent = "  ".repeat(depth);
  const start = list.start ?? 1;
  return list.children.flatMap((item, i) => {
    let marker = list.ordered ? `${start + i}.` : "•";
    if (item.checked === true) marker = "☑";
    if (item.checked === false) marker = "☐";
    return listItemLines(item, `${indent}${marker} `, depth);
  });
}

function tableLines(table: Table): StyledLine[] {
  const rows = table.children.map((row) => row.children.map((cell) => inlineText(cell.children)));
  const columns = Math.max(0, ...rows.map((cells) => cells.length));
  const widths = Array.from({ length: columns }, (_, col) =>
    Math.max(0, ...rows.map((cells) => displayWidth(cells[col] ?? "")))
  );
  const format = (cells: string[]) =>
    widths
      .map((w, col) => {
        const cell = cells[col] ?? "";
        return cell + " ".repeat(w - displayWidth(cell));
      })
      .join(" │ ")
      .trimEnd();

  const [header, ...body] = rows;
  if (!header) return [];
  return [
    { text: format(header), bold: true },
    { text: widths.map((w) => "─".repeat(w)).join("─┼─"), dim: true },
    ...body.map((cells) => ({ text: format(cells) })),
  ];
}

function blockLines(node: RootContent, depth = 0): StyledLine[] {
  switch (node.type) {
    case "heading":
      return [{ text: inlineText(node.children), color: "cyan", bold: true }];
    case "paragraph":
      return paragraphLines(node.children);
    case "list":
      return listLines(node, depth);
    case "blockquote":
      return joinBlocks(node.children).map((line): StyledLine => ({
        ...line,
        text: `│ ${line.text}`,
        color: "gray",
      }));
    case "code":
      return node.value.split("\n").map((text): StyledLine => ({ text, color: "green" }));
    case "thematicBreak":
      return [{ text: "───", dim: true }];
    case "table":
      return tableLines(node);
    case "html":
      return stripHtml(node.value)
        .split("\n")
        .filter((text) => text.trim().length > 0)
        .map((text) => ({ text }));
    default:
      // Link definitions and footnote bodies aren't shown
      return [];
  }
}

/** Blocks separated by one blank row; blocks that render nothing leave no gap. */
function joinBlocks(nodes: readonly RootContent[]): StyledLine[] {
  const lines: StyledLine[] = [];
  for (const node of nodes) {
    const block = blockLines(node);
    if (block.length === 0) continue;
    if (lines.length > 0) lines.push({ text: "" });
    lines.push(...block);
  }
  return lines;
}

/** Render markdown into styled rows wrapped at `width`. */
export function renderMarkdown(text: string, width: number): StyledLine[] {
  const tree: Root = parser.parse(text);
  const lines = joinBlocks(tree.children).flatMap((line) =>
    wrapLine(line.text, width).map((row) => ({ ...line, text: row }))
  );

  while (lines.length > 0 && lines[lines.length - 1].text.trim() === "") lines.pop();
  return lines;
}
