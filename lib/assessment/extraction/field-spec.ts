/**
 * Field Specifications
 *
 * A field spec is an ordered list of independent strategies. Tables of
 * specs are plain data so each municipality dialect can supply its own.
 */

import type { ExtractedFieldName } from "../types";

export type ExtractionStrategy =
  | { kind: "selector"; selectors: readonly string[] }
  | { kind: "label"; labels: readonly string[] }
  | { kind: "pattern"; pattern: string };

export type FieldSpec = readonly ExtractionStrategy[];

export type FieldSpecTable = Partial<Record<ExtractedFieldName, FieldSpec>>;

/** Digits with space, dot or comma separators, no unit. */
export const NUMBER_CAPTURE = "\\d(?:[\\d \\u00a0\\u202f.,]*\\d)?";

const LABEL_SEPARATOR = "[ \\t]*:?[ \\t]*";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function labelSource(label: string): string {
  return escapeRegExp(label.trim()).replace(/\s+/g, "\\s+");
}

export function selector(...selectors: string[]): ExtractionStrategy {
  return { kind: "selector", selectors };
}

export function label(...labels: string[]): ExtractionStrategy {
  return { kind: "label", labels };
}

export function pattern(source: string): ExtractionStrategy {
  return { kind: "pattern", pattern: source };
}

/**
 * Pattern capturing the number that follows one of `labels`, separators
 * kept, unit dropped.
 */
export function labelledNumber(...labels: string[]): ExtractionStrategy {
  const alternatives = labels.map(labelSource).join("|");
  return pattern(`(?:${alternatives})${LABEL_SEPARATOR}\\$?[ \\t]*(?<value>${NUMBER_CAPTURE})`);
}

/**
 * Pattern capturing the rest of the line after one of `labels`.
 */
export function labelledLine(...labels: string[]): ExtractionStrategy {
  const alternatives = labels.map(labelSource).join("|");
  return pattern(`(?:${alternatives})${LABEL_SEPARATOR}(?<value>[^\\n]+)`);
}
