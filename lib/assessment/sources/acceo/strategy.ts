/**
 * Acceo Navigation Strategy
 */

import type { PageSnapshot } from "../../extraction/page-text";
import type { NavigationContext, NavigationStrategy } from "../../navigation/types";
import { foldDiacritics } from "../../utils/text";
import { pollUntil } from "../../utils/timing";
import {
  ACCEO_FIELDS,
  CADASTRE_TAB_SELECTORS,
  CADASTRE_TAB_TEXT,
  DETAIL_PAGE_MARKERS,
  EVALUATION_REPORT_RADIO,
  LOT_INPUT_SELECTORS,
  NO_RESULTS_PHRASES,
  RESULT_ENTRY_SELECTORS,
  SUBMIT_SELECTORS,
} from "./constants";

const FOLDED_MARKERS = DETAIL_PAGE_MARKERS.map((marker) => foldDiacritics(marker));

export function isAcceoDetailPage(snapshot: PageSnapshot): boolean {
  const text = foldDiacritics(snapshot.text).toLowerCase();
  return FOLDED_MARKERS.some((marker) => text.includes(marker));
}

/**
 * Switch to the cadastre tab when the page has one, then wait for the lot
 * field to render.
 */
async function openCadastreSearch(ctx: NavigationContext): Promise<void> {
  const { driver, timings } = ctx;

  const tabQuery = { selector: "a, button", containsText: CADASTRE_TAB_TEXT };
  const byText = await driver.findEntries(tabQuery);
  if (byText.length > 0) {
    await driver.activateEntry(tabQuery, byText[0].index, "self");
    console.log("[Navigation] Opened the cadastre search tab");
  } else {
    const tab = await driver.firstVisible(CADASTRE_TAB_SELECTORS);
    if (tab) {
      await driver.click(tab);
      console.log(`[Navigation] Opened the cadastre search tab (${tab})`);
    }
  }
  await driver.settle(timings.settleMs);

  await pollUntil(async () => (await driver.firstVisible(LOT_INPUT_SELECTORS)) ?? undefined, {
    timeoutMs: timings.elementWaitMs,
    intervalMs: timings.pollIntervalMs,
    what: "the cadastre search form",
  });
}

/**
 * Ask for the evaluation report rather than the tax account.
 */
async function selectEvaluationReport(ctx: NavigationContext): Promise<void> {
  const radio = await ctx.driver.firstVisible([EVALUATION_REPORT_RADIO]);
  if (radio && !(await ctx.driver.isChecked(radio))) {
    await ctx.driver.click(radio);
  }
}

export function createAcceoStrategy(): NavigationStrategy {
  return {
    kind: "ACCEO_GENERIC",
    lotInputSelectors: LOT_INPUT_SELECTORS,
    submitSelectors: SUBMIT_SELECTORS,
    resultEntrySelectors: RESULT_ENTRY_SELECTORS,
    noResultsPhrases: NO_RESULTS_PHRASES,
    fields: ACCEO_FIELDS,
    preSearch: openCadastreSearch,
    beforeSubmit: selectEvaluationReport,
    isDetailPage: (snapshot) => isAcceoDetailPage(snapshot),
  };
}
