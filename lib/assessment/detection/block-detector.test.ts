import { describe, expect, it } from "vitest";
import { BlockDetector, DEFAULT_BLOCK_PATTERNS, check, detectBlocking } from "./block-detector";

describe("block detector", () => {
  it("detects every default phrase in upper, lower and mixed case", () => {
    for (const { phrase } of DEFAULT_BLOCK_PATTERNS) {
      const mixed = phrase
        .split("")
        .map((ch, i) => (i % 2 === 0 ? ch.toUpperCase() : ch))
        .join("");
      expect(check(`<p>${phrase.toUpperCase()}</p>`)).toBe(true);
      expect(check(`<p>${phrase.toLowerCase()}</p>`)).toBe(true);
      expect(check(`<div>${mixed}</div>`)).toBe(true);
    }
  });

  it("ignores accents when matching portal notices", () => {
    const result = detectBlocking("<p>Vous avez atteint la LIMITE DE CONSULTATIONS GRATUITES.</p>");
    expect(result).toEqual({
      blocked: true,
      reason: "Free consultation limit reached",
      phrase: "limite de consultations gratuites",
    });
    expect(check("Acces illimite au role d'evaluation")).toBe(true);
  });

  it("matches typographic apostrophes", () => {
    expect(check("L’outil gratuit est destiné à la consultation personnelle citoyenne")).toBe(true);
  });

  it("returns false for ordinary assessment pages", () => {
    const page = "<h1>Rôle d'évaluation foncière</h1><p>Numéro de lot : 5829908</p><p>Aire d'étage 4500</p>";
    expect(check(page)).toBe(false);
    expect(detectBlocking(page)).toEqual({ blocked: false });
  });

  it("uses a custom phrase list when given one", () => {
    const detector = new BlockDetector([{ phrase: "Quota épuisé", reason: "Quota" }]);
    expect(detector.check("quota epuise pour aujourd'hui")).toBe(true);
    expect(detector.check("too many requests")).toBe(false);
  });
});
