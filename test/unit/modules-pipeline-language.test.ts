import { describe, expect, it } from "vitest";
import { UnsupportedLanguageError } from "../../src/modules/pipeline/errors.js";
import {
  createLanguageTable,
  languageDisplayName,
  listAvailableLanguages,
  loadLanguageTable,
  resolveLanguageCode
} from "../../src/modules/pipeline/language.js";
import { QUERY_TOO_LONG_MESSAGE, unsupportedLanguageMessage } from "../../src/modules/pipeline/messages.js";
import { normalizeQuery, validateQuery } from "../../src/modules/pipeline/query.js";

const table = createLanguageTable({
  names: { english: "en", spanish: "es", filipino: "fil" },
  variations: { castilian: "es", tagalog: "fil" }
});

describe("modules/pipeline/language", () => {
  it("resolves names, variations and bare codes case-insensitively", () => {
    expect(resolveLanguageCode(" Spanish ", table)).toBe("es");
    expect(resolveLanguageCode("Tagalog", table)).toBe("fil");
    expect(resolveLanguageCode("ES", table)).toBe("es");
  });

  it("lists every accepted name when a language is unknown", () => {
    expect(listAvailableLanguages(table)).toEqual(["castilian", "english", "filipino", "spanish", "tagalog"]);

    let caught: unknown;
    try {
      resolveLanguageCode("Klingon", table);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnsupportedLanguageError);
    expect(caught instanceof Error ? caught.message : null).toBe(
      "Unsupported language: klingon\nAvailable languages:\ncastilian, english, filipino, spanish, tagalog"
    );
  });

  it("names a code by its first listed language", () => {
    expect(languageDisplayName("es", table)).toBe("spanish");
    expect(languageDisplayName("xx", table)).toBe("xx");
  });

  it("loads the bundled table once", () => {
    const bundled = loadLanguageTable();

    expect(loadLanguageTable()).toBe(bundled);
    expect(resolveLanguageCode("english", bundled)).toBe("en");
    expect(resolveLanguageCode("castellano", bundled)).toBe("es");
  });

  it("rejects malformed tables", () => {
    expect(() => createLanguageTable({ names: { english: "e" } })).toThrow();
  });
});

describe("modules/pipeline/query", () => {
  it("trims and lowercases before checking length", () => {
    expect(normalizeQuery("  Why Is It HOT?  ")).toBe("why is it hot?");
    expect(validateQuery("  Why Is It HOT?  ")).toEqual({ valid: true, normalized: "why is it hot?" });
  });

  it("rejects queries outside the length bounds", () => {
    expect(validateQuery("  hi  ")).toEqual({ valid: false, problem: "too_short" });
    expect(validateQuery("abc")).toEqual({ valid: true, normalized: "abc" });
    expect(validateQuery("a".repeat(1000))).toEqual({ valid: true, normalized: "a".repeat(1000) });
    expect(validateQuery("a".repeat(1001))).toEqual({ valid: false, problem: "too_long" });
  });

  it("formats the fixed user-facing texts", () => {
    expect(QUERY_TOO_LONG_MESSAGE).toBe("Your question is too long. Please provide a more concise question.");
    expect(unsupportedLanguageMessage("klingon", ["english"])).toBe(
      "Unsupported language: klingon\nAvailable languages:\nenglish"
    );
  });
});
