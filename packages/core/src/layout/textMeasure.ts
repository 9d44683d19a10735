/**
 * packages/core/src/layout/textMeasure.ts — Plain default measurement collaborator.
 *
 * Unicode width shaping belongs to the host; this fallback counts one cell
 * per code point, which is exact for ASCII and adequate for tests and demos.
 *
 * @see createPlainTextMeasure
 */

import type { MeasurableNode, WidgetNode } from "../widgets/types.js";
import type { Size } from "./types.js";

/** Width of `text` in cells, one cell per code point. */
export function measureTextCells(text: string): number {
  return Array.from(text).length;
}

function splitByWidth(word: string, maxWidth: number): string[] {
  const chunks: string[] = [];
  let chunk = "";
  let chunkWidth = 0;
  for (const ch of word) {
    if (chunkWidth === maxWidth) {
      chunks.push(chunk);
      chunk = "";
      chunkWidth = 0;
    }
    chunk += ch;
    chunkWidth++;
  }
  if (chunk.length > 0) chunks.push(chunk);
  return chunks;
}

/**
 * Greedy word wrap.
 *
 * - Splits paragraphs on `\n`
 * - Collapses the whitespace run at each soft break
 * - Hard-breaks words longer than `maxWidth`
 */
export function wrapTextToLines(text: string, maxWidth: number): readonly string[] {
  if (text.length === 0 || maxWidth <= 0) return Object.freeze([]);

  const lines: string[] = [];
  const paragraphs = text.split("\n");
  for (let p = 0; p < paragraphs.length; p++) {
    const paragraph = paragraphs[p] ?? "";
    const tokens = paragraph.match(/[^\s]+|\s+/g);
    if (!tokens) {
      lines.push("");
      continue;
    }

    let line = "";
    let lineWidth = 0;
    let pendingSpace = "";

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i] ?? "";
      if (/^\s+$/.test(token)) {
        pendingSpace = token;
        continue;
      }
      const tokenWidth = measureTextCells(token);
      const spaceWidth = lineWidth > 0 ? measureTextCells(pendingSpace) : 0;

      if (lineWidth + spaceWidth + tokenWidth <= maxWidth) {
        line += (lineWidth > 0 ? pendingSpace : "") + token;
        lineWidth += spaceWidth + tokenWidth;
        pendingSpace = "";
        continue;
      }

      if (lineWidth > 0) lines.push(line);
      line = "";
      lineWidth = 0;
      pendingSpace = "";

      const chunks = tokenWidth <= maxWidth ? [token] : splitByWidth(token, maxWidth);
      for (let j = 0; j < chunks.length - 1; j++) lines.push(chunks[j] ?? "");
      line = chunks[chunks.length - 1] ?? "";
      lineWidth = measureTextCells(line);
    }

    lines.push(line);
  }

  return Object.freeze(lines);
}

/** Full text content of a text node: its own text followed by its spans. */
export function collectText(node: WidgetNode): string {
  if (node.kind !== "text" && node.kind !== "span") return "";
  let out = node.text;
  for (const child of node.children) out += collectText(child);
  return out;
}

/**
 * Default measurement collaborator. Text and spans wrap at the available
 * width; a childless canvas without explicit dimensions measures 0x0.
 */
export function createPlainTextMeasure(): (node: MeasurableNode, availableWidth: number) => Size {
  return (node, availableWidth) => {
    if (node.kind === "canvas") return { w: 0, h: 0 };
    const lines = wrapTextToLines(collectText(node), availableWidth);
    let w = 0;
    for (const line of lines) {
      const lw = measureTextCells(line);
      if (lw > w) w = lw;
    }
    return { w, h: lines.length };
  };
}
