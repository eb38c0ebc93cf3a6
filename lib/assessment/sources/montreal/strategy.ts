/**
 * Montréal Navigation Strategy
 *
 * Montréal runs its own portal: a lot search posting to a listing of
 * evaluation units, each with a small form that opens the unit's page.
 */

import type { PageSnapshot } from "../../extraction/page-text";
import type { NavigationStrategy } from "../../navigation/types";
import { foldDiacritics } from "../../utils/text";
import {
  DETAIL_PAGE_MARKERS,
  LOT_INPUT_SELECTORS,
  MONTREAL_FIELDS,
  NO_RESULTS_PHRASES,
  RESULT_ENTRY_SELECTORS,
  SUBMIT_SELECTORS,
} from "./constants";

const FOLDED_MARKERS = DETAIL_PAGE_MARKERS.map((marker) => foldDiacritics(marker));

export function isMontrealDetailPage(snapshot: PageSnapshot): boolean {
  const text = foldDiacritics(snapshot.text).toLowerCase();
  return FOLDED_MARKERS.some((marker) => text.includes(marker));
}

export function createMontrealStrategy(): NavigationStrategy {
  return {
    kind: "MONTREAL",
    lotInputSelectors: LOT_INPUT_SELECTORS,
    submitSelectors: SUBMIT_SELECTORS,
    resultEntrySelectors: RESULT_ENTRY_SELECTORS,
    noResultsPhrases: NO_RESULTS_PHRASES,
    fields: MONTREAL_FIELDS,
    isDetailPage: (snapshot) => isMontrealDetailPage(snapshot),
  };
}
