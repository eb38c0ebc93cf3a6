/**
 * Page Driver Contract
 *
 * The narrow set of page operations navigation needs. The Playwright
 * implementation drives a real browser; tests use an in-process fixture
 * site that implements the same contract.
 */

/** Controls that submit the form or entry they sit in. */
export const SUBMIT_CONTROL_SELECTOR = "button, input[type='submit'], input[type='image']";

export interface EntryQuery {
  /** CSS selector of candidate entries. */
  selector: string;
  /**
   * Text the entry must contain: a case-insensitive, whitespace-normalized
   * substring, or a pattern tested against the normalized text.
   */
  containsText: string | RegExp;
}

export interface EntryMatch {
  /** Position among the entries matching the query. */
  index: number;
  text: string;
  hasSubmitControl: boolean;
}

/** "submit" clicks the entry's first submit control, "self" the entry itself. */
export type ActivationMode = "submit" | "self";

export interface PageDriver {
  goto(url: string): Promise<void>;
  url(): string;
  content(): Promise<string>;
  /**
   * First selector of the list with a visible match, or null.
   */
  firstVisible(selectors: readonly string[]): Promise<string | null>;
  isChecked(selector: string): Promise<boolean>;
  clear(selector: string): Promise<void>;
  typeKey(selector: string, key: string): Promise<void>;
  click(selector: string): Promise<void>;
  findEntries(query: EntryQuery): Promise<EntryMatch[]>;
  activateEntry(query: EntryQuery, index: number, mode: ActivationMode): Promise<void>;
  settle(ms: number): Promise<void>;
}
