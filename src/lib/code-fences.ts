import type { Code, Nodes } from "mdast";
import { remark } from "remark";
import remarkGfm from "remark-gfm";
import { UnclosedFenceError } from "./errors";

export interface CodeFence {
  /** 1-based line of the opening fence. */
  openLine: number;
  /** 1-based line of the closing fence, `null` when the fence is never closed. */
  closeLine: number | null;
  /** The opening run of backticks or tildes, e.g. "```" or "~~~~". */
  marker: string;
  /** Info string after the opening marker, trimmed ("tsx", "" ...). */
  info: string;
}

export interface ScanOptions {
  /** Added to every reported line, for bodies cut out of a larger file. */
  lineOffset?: number;
}

const OPENING_FENCE = /^([ \t]*)(`{3,}|~{3,})([^\r\n]*)/;
// Whatever precedes a closing run may only be indentation or blockquote markers
const CLOSING_FENCE = /^[ \t>]*(`{3,}|~{3,})[ \t]*$/;

function collectCodeNodes(node: Nodes, found: Code[]): Code[] {
  if (node.type === "code") found.push(node);
  if ("children" in node) {
    for (const child of node.children) collectCodeNodes(child, found);
  }
  return found;
}

function lineBefore(markdown: string, offset: number): string {
  const lineStart = markdown.lastIndexOf("\n", offset - 1) + 1;
  return markdown.slice(lineStart, offset);
}

function toFence(markdown: string, node: Code, lineOffset: number): CodeFence | null {
  const { position } = node;
  if (!position || position.start.offset === undefined || position.end.offset === undefined) {
    return null;
  }

  const opening = OPENING_FENCE.exec(markdown.slice(position.start.offset));
  if (!opening) return null;
  const [, indent = "", marker = "", rest = ""] = opening;
  // Four columns of indent make an indented code block, not a fence
  if (indent.includes("\t") || indent.length >= 4) return null;

  const closing =
    position.end.line > position.start.line
      ? CLOSING_FENCE.exec(lineBefore(markdown, position.end.offset))
      : null;
  const closeRun = closing?.[1] ?? "";
  const closed = closeRun[0] === marker[0] && closeRun.length >= marker.length;

  return {
    openLine: position.start.line + lineOffset,
    closeLine: closed ? position.end.line + lineOffset : null,
    marker,
    info: rest.trim(),
  };
}

/**
 * Report every fenced code block in a Markdown document, in source order.
 *
 * Blocks are found on the GFM syntax tree, so fences nested in list items
 * and blockquotes count too. A block is closed when its last line is a run
 * of the opening character at least as long as the opener; a fence ended by
 * the end of the document or of its container is reported with
 * `closeLine: null`.
 */
export function scanCodeFences(markdown: string, options: ScanOptions = {}): CodeFence[] {
  const lineOffset = options.lineOffset ?? 0;
  const tree = remark().use(remarkGfm).parse(markdown);

  const fences: CodeFence[] = [];
  for (const node of collectCodeNodes(tree, [])) {
    const fence = toFence(markdown, node, lineOffset);
    if (fence) fences.push(fence);
  }
  return fences;
}

export function findUnclosedFence(markdown: string, options?: ScanOptions): CodeFence | null {
  return scanCodeFences(markdown, options).find((fence) => fence.closeLine === null) ?? null;
}

/** @throws UnclosedFenceError naming the line of the first fence left open. */
export function assertFencesBalanced(markdown: string, options?: ScanOptions): CodeFence[] {
  const fences = scanCodeFences(markdown, options);
  const unclosed = fences.find((fence) => fence.closeLine === null);
  if (unclosed) {
    throw new UnclosedFenceError(unclosed.openLine, unclosed.marker);
  }
  return fences;
}
