import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import { BlockDetector } from "../detection/block-detector";
import { ConsoleObserver, NoopObserver } from "../observability";
import { dispatch, resolve } from "../registry";
import { FixtureSiteDriver, readFixture, type FixtureSite } from "../testing/fixture-site";
import { fastConfig } from "../testing/test-config";
import type { ScrapeObserver } from "../observability/types";
import { Deadline } from "../utils/timing";
import { runNavigation } from "./state-machine";
import type { NavigationContext } from "./types";

import "../sources/acceo";
import "../sources/montreal";

const { timings } = fastConfig();

const ACCEO_BASE = "https://e-services.acceo.com/immosoft/controller/ImmoNetPub/U4051/";
const MONTREAL_SEARCH = "https://montreal.ca/role-evaluation-fonciere/lot-renove";
const laval = resolve("laval");
const montreal = resolve("montreal");

const acceoPage = (name: string) =>
  readFixture(import.meta.url, `../sources/acceo/golden/fixtures/${name}.html`);

function acceoSite(overrides: Record<string, string> = {}): FixtureSite {
  return {
    pages: {
      [laval.searchUrl]: acceoPage("search"),
      [`${ACCEO_BASE}trouverParCadastre`]: acceoPage("cadastre"),
      [`${ACCEO_BASE}resultats`]: acceoPage("results"),
      [`${ACCEO_BASE}consulter`]: acceoPage("detail"),
      ...overrides,
    },
  };
}

function context(
  driver: FixtureSiteDriver,
  profile = laval,
  lotNumber = "1234567",
  observer: ScrapeObserver = new NoopObserver()
): NavigationContext {
  return {
    runId: "test-run",
    driver,
    profile,
    lotNumber,
    timings,
    randomizedTiming: false,
    detector: new BlockDetector(),
    deadline: new Deadline(5000),
    observer,
  };
}

describe("runNavigation", () => {
  it("goes straight to extraction when the search lands on a detail page", async () => {
    const driver = new FixtureSiteDriver(acceoSite({ [`${ACCEO_BASE}resultats`]: acceoPage("detail") }));
    const observer = new ConsoleObserver(() => undefined);

    const result = await runNavigation(context(driver, laval, "1234567", observer), dispatch(laval));

    expect(result.currentStage).toBe("DONE");
    expect(result.lastUrl).toBe(`${ACCEO_BASE}resultats`);
    expect(result.fields.owner_name).toBe("Gestion Tremblay inc.");
    expect(observer.getMetrics().steps.map((s) => s.step)).toEqual(["SEARCH", "DETAIL"]);
  });

  it("selects the evaluation report before submitting", async () => {
    const cadastre = acceoPage("cadastre").replace('action="resultats" ', "");
    const driver = new FixtureSiteDriver(acceoSite({ [`${ACCEO_BASE}trouverParCadastre`]: cadastre }));

    const result = await runNavigation(context(driver), dispatch(laval));

    // The form goes nowhere, so the lot never shows up as a result.
    expect(result.currentStage).toBe("FAILED");
    expect(result.cause).toBe("no-results");
    const $ = cheerio.load(await driver.content());
    expect($("#ty_rapport_eval").attr("checked")).toBe("checked");
    expect($("#ty_rapport_compte").attr("checked")).toBeUndefined();
    expect($("#NoCadastre").attr("value")).toBe("1234567");
  });

  it("falls back to any clickable element that mentions the lot", async () => {
    const driver = new FixtureSiteDriver(acceoSite({ [`${ACCEO_BASE}resultats`]: acceoPage("results-link") }));

    const result = await runNavigation(context(driver), dispatch(laval));

    expect(result.currentStage).toBe("DONE");
    expect(result.degraded).toBe(false);
    expect(result.fields.address).toBe("1500 Boulevard Saint-Martin Ouest");
    expect(driver.activations).toEqual(["a, button[0]:self", "a, button, [role='button'], [onclick][0]:self"]);
  });

  it("tries an entry matched by several selectors only once", async () => {
    const listing = "<html><body><div class='resultat result'>Lot 1234567</div></body></html>";
    const driver = new FixtureSiteDriver(acceoSite({ [`${ACCEO_BASE}resultats`]: listing }));

    const result = await runNavigation(context(driver), dispatch(laval));

    expect(result.currentStage).toBe("DONE");
    expect(result.degraded).toBe(true);
    expect(driver.activations).toEqual([
      "a, button[0]:self",
      ".resultat[0]:self",
      ".resultat[0]:self",
      ".resultat[0]:self",
    ]);
  });

  it("finds entries that print the lot in digit groups", async () => {
    const results = acceoPage("results").replace("<td>1234567</td>", "<td>1 234 567</td>");
    const driver = new FixtureSiteDriver(acceoSite({ [`${ACCEO_BASE}resultats`]: results }));

    const result = await runNavigation(context(driver), dispatch(laval));

    expect(result.currentStage).toBe("DONE");
    expect(result.degraded).toBe(false);
    expect(result.lastUrl).toBe(`${ACCEO_BASE}consulter`);
    expect(driver.activations).toEqual(["a, button[0]:self", "table tr[0]:submit"]);
  });

  it("fails with no-results when the portal says so", async () => {
    const driver = new FixtureSiteDriver(acceoSite({ [`${ACCEO_BASE}resultats`]: acceoPage("no-results") }));

    const result = await runNavigation(context(driver), dispatch(laval));

    expect(result.currentStage).toBe("FAILED");
    expect(result.blocked).toBe(false);
    expect(result.cause).toBe("no-results");
    expect(result.fields).toEqual({});
  });

  it("fails when the search page has no lot input", async () => {
    const driver = new FixtureSiteDriver({
      pages: { [MONTREAL_SEARCH]: "<html><body><p>Maintenance en cours</p></body></html>" },
    });

    const result = await runNavigation(context(driver, montreal, "5829908"), dispatch(montreal));

    expect(result.currentStage).toBe("FAILED");
    expect(result.cause).toBe("element-not-found: lot number input");
  });

  it("fails when the search form has no submit control", async () => {
    const driver = new FixtureSiteDriver({
      pages: { [MONTREAL_SEARCH]: "<html><body><input type='text' name='lotNumber'></body></html>" },
    });

    const result = await runNavigation(context(driver, montreal, "5829908"), dispatch(montreal));

    expect(result.currentStage).toBe("FAILED");
    expect(result.cause).toBe("element-not-found: submit control");
    expect(driver.typed.join("")).toBe("5829908");
  });

  it("reports a block even when the stage itself failed", async () => {
    const driver = new FixtureSiteDriver({ pages: { [laval.searchUrl]: acceoPage("blocked") } });

    const result = await runNavigation(context(driver), dispatch(laval));

    expect(result.currentStage).toBe("BLOCKED");
    expect(result.blocked).toBe(true);
    expect(result.blockReason).toBe("Free consultation quota notice");
    expect(result.cause).toBe("blocked: Free consultation quota notice");
  });

  it("lets unexpected driver errors propagate", async () => {
    const driver = new FixtureSiteDriver({ ...acceoSite(), faults: { goto: new Error("net::ERR_CONNECTION_RESET") } });

    await expect(runNavigation(context(driver), dispatch(laval))).rejects.toThrow("net::ERR_CONNECTION_RESET");
  });
});
