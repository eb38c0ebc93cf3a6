/**
 * Page Snapshots
 *
 * Parses page HTML once with cheerio and derives the visible text used by
 * the pattern strategy. Block-level elements end a line so that labels on
 * one row never run into the next row's value.
 */

import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { isTag, isText } from "domhandler";

export interface PageSnapshot {
  readonly $: cheerio.CheerioAPI;
  readonly html: string;
  /** Visible text, NFC-normalized, one block per line. */
  readonly text: string;
}

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "template", "head", "svg"]);

const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "dd", "div", "dl", "dt", "fieldset",
  "figcaption", "figure", "footer", "form", "h1", "h2", "h3", "h4", "h5", "h6",
  "header", "hr", "li", "main", "nav", "ol", "p", "pre", "section", "table",
  "tbody", "thead", "tfoot", "tr", "ul", "caption", "option",
]);

const CELL_TAGS = new Set(["td", "th"]);

function collect(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
      continue;
    }
    if (!isTag(node) || SKIPPED_TAGS.has(node.name)) {
      continue;
    }
    if (node.name === "br") {
      out.push("\n");
      continue;
    }
    const block = BLOCK_TAGS.has(node.name);
    if (block) out.push("\n");
    collect(node.children, out);
    if (block) out.push("\n");
    else if (CELL_TAGS.has(node.name)) out.push(" ");
  }
}

/**
 * Visible text of an HTML document with one line per block element.
 */
export function visibleText($: cheerio.CheerioAPI): string {
  const parts: string[] = [];
  collect($.root().contents().toArray(), parts);
  return parts
    .join("")
    .normalize("NFC")
    .split("\n")
    .map((line) => line.replace(/[^\S\n]+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

export function createSnapshot(html: string): PageSnapshot {
  const $ = cheerio.load(html);
  return { $, html, text: visibleText($) };
}
