/**
 * Field Extractor
 *
 * Tries each strategy of a field spec in order and returns the first
 * non-blank value. A field that cannot be found yields "" and is not an
 * error.
 */

import type { Cheerio } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import { isTag, isText } from "domhandler";
import { EXTRACTED_FIELDS, type InternalFields } from "../types";
import { comparisonKey, foldDiacritics, normalizeWhitespace } from "../utils/text";
import type { ExtractionStrategy, FieldSpec, FieldSpecTable } from "./field-spec";
import type { PageSnapshot } from "./page-text";

const PLACEHOLDER_VALUES = new Set(["-", "--", "n/a", "—", "–"]);

const LABEL_CANDIDATES = "th, td, dt, label, strong, b, span, div, p, li";

const FORM_CONTROLS = new Set(["input", "select", "textarea"]);

function clean(value: string | undefined): string {
  if (!value) return "";
  const normalized = normalizeWhitespace(value);
  return PLACEHOLDER_VALUES.has(normalized.toLowerCase()) ? "" : normalized;
}

// ============================================================================
// Strategies
// ============================================================================

function readElement($el: Cheerio<AnyNode>): string {
  const el = $el.get(0);
  if (!el) return "";
  if (!isTag(el) || !FORM_CONTROLS.has(el.name)) {
    return clean($el.text());
  }
  if (el.name === "select") {
    return clean($el.find("option[selected]").first().text() || $el.find("option").first().text());
  }
  const value = $el.attr("value");
  return clean(value ?? $el.text());
}

function bySelector(snapshot: PageSnapshot, selectors: readonly string[]): string {
  for (const sel of selectors) {
    const matches = snapshot.$(sel).toArray().filter(isTag);
    for (const el of matches) {
      const value = readElement(snapshot.$(el));
      if (value) return value;
    }
  }
  return "";
}

/**
 * Text that follows `el` inside its parent, up to the next element.
 */
function trailingText(el: Element): string {
  const parts: string[] = [];
  let node = el.next;
  while (node) {
    if (isText(node)) parts.push(node.data);
    else if (isTag(node)) break;
    node = node.next;
  }
  return parts.join("");
}

function valueNextTo(snapshot: PageSnapshot, el: Element): string {
  const $ = snapshot.$;
  const $el = $(el);

  if (el.name === "dt") {
    return clean($el.nextAll("dd").first().text());
  }
  if (el.name === "td" || el.name === "th") {
    return clean($el.nextAll("td, th").first().text());
  }

  const cell = $el.closest("td, th");
  if (cell.length) {
    const next = clean(cell.nextAll("td, th").first().text());
    if (next) return next;
  }

  if (el.name === "label") {
    const target = $el.attr("for");
    if (target) {
      const control = $(`[id="${target}"]`).first();
      const value = readElement(control);
      if (value) return value;
    }
  }

  const trailing = clean(trailingText(el).replace(/^\s*:/, ""));
  if (trailing) return trailing;

  return clean($el.next().text());
}

function byLabel(snapshot: PageSnapshot, labels: readonly string[]): string {
  const wanted = new Set(labels.map(comparisonKey));
  const $ = snapshot.$;

  for (const el of $(LABEL_CANDIDATES).toArray().filter(isTag)) {
    if (!wanted.has(comparisonKey($(el).text()))) continue;
    const value = valueNextTo(snapshot, el);
    if (value) return value;
  }
  return "";
}

const compiledPatterns = new Map<string, RegExp>();

function compile(source: string): RegExp {
  let regex = compiledPatterns.get(source);
  if (!regex) {
    regex = new RegExp(foldDiacritics(source), "id");
    compiledPatterns.set(source, regex);
  }
  return regex;
}

/**
 * Matches against the accent-folded text and slices the capture out of the
 * original, so "Alphonse-Gariépy" keeps its accent.
 */
function byPattern(snapshot: PageSnapshot, source: string): string {
  const folded = foldDiacritics(snapshot.text);
  const match = compile(source).exec(folded);
  const span = match?.indices?.groups?.value;
  if (!span) return "";
  return clean(snapshot.text.slice(span[0], span[1]));
}

function runStrategy(snapshot: PageSnapshot, strategy: ExtractionStrategy): string {
  switch (strategy.kind) {
    case "selector":
      return bySelector(snapshot, strategy.selectors);
    case "label":
      return byLabel(snapshot, strategy.labels);
    case "pattern":
      return byPattern(snapshot, strategy.pattern);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Extract one field. Returns "" when every strategy comes up empty.
 */
export function extract(snapshot: PageSnapshot, spec: FieldSpec): string {
  for (const strategy of spec) {
    try {
      const value = runStrategy(snapshot, strategy);
      if (value) return value;
    } catch (error) {
      // A malformed selector or pattern only disables that strategy.
      console.warn(`[Extractor] ${strategy.kind} strategy failed:`, error instanceof Error ? error.message : error);
    }
  }
  return "";
}

/**
 * Extract every field of a table, keeping only non-empty values.
 */
export function extractAll(snapshot: PageSnapshot, table: FieldSpecTable): InternalFields {
  const fields: InternalFields = {};
  for (const name of EXTRACTED_FIELDS) {
    const spec = table[name];
    if (!spec) continue;
    const value = extract(snapshot, spec);
    if (value) fields[name] = value;
  }
  return fields;
}
