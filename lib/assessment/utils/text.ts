/**
 * Text normalization shared by the registry, the block detector and the
 * field extractor.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Replace accented letters with their base letter and typographic
 * apostrophes with a plain one. The output has the same length as the
 * NFC form of the input, so indices found in folded text can be used to
 * slice the original.
 */
export function foldDiacritics(input: string): string {
  let out = "";
  for (const ch of input.normalize("NFC")) {
    if (ch === "\u2019" || ch === "\u2018" || ch === "\u02bc") {
      out += "'";
      continue;
    }
    const base = ch.normalize("NFD").replace(COMBINING_MARKS, "");
    out += base.length === ch.length ? base : ch;
  }
  return out;
}

/**
 * Collapse runs of whitespace (including non-breaking spaces) and trim.
 */
export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

/**
 * Case- and accent-insensitive comparison key: folded, lower-cased,
 * whitespace collapsed, trailing colon dropped.
 */
export function comparisonKey(input: string): string {
  return normalizeWhitespace(foldDiacritics(input).toLowerCase()).replace(/\s*:$/, "");
}

/**
 * Lookup key for municipality names: folded, lower-cased, letters and
 * digits only ("Saint-Eustache" → "sainteustache").
 */
export function municipalityKey(input: string): string {
  return foldDiacritics(input).toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Matches a lot number however the portal groups its digits
 * ("1234567", "1 234 567"), but not inside a longer number.
 */
export function lotNumberPattern(lotNumber: string): RegExp {
  const digits = lotNumber.replace(/\D/g, "").split("");
  return new RegExp(`(?<!\\d)${digits.join("\\s*")}(?!\\d)`);
}
