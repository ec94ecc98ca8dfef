import fs from "node:fs";
import { z } from "zod";
import { UnsupportedLanguageError } from "./errors.js";

export const PIVOT_LANGUAGE_CODE = "en";

const DEFAULT_LANGUAGE_TABLE_URL = new URL("../../../data/languages.json", import.meta.url);

const languageFileSchema = z.object({
  names: z.record(z.string().min(2)),
  variations: z.record(z.string().min(2)).default({})
});

export interface LanguageTable {
  names: ReadonlyMap<string, string>;
  variations: ReadonlyMap<string, string>;
  codes: ReadonlySet<string>;
}

export const createLanguageTable = (raw: unknown): LanguageTable => {
  const parsed = languageFileSchema.parse(raw);
  const names = new Map(Object.entries(parsed.names));
  const variations = new Map(Object.entries(parsed.variations));
  return {
    names,
    variations,
    codes: new Set([...names.values(), ...variations.values()])
  };
};

let defaultTable: LanguageTable | null = null;

export const loadLanguageTable = (fileUrl: URL = DEFAULT_LANGUAGE_TABLE_URL): LanguageTable => {
  const isDefault = fileUrl.href === DEFAULT_LANGUAGE_TABLE_URL.href;
  if (isDefault && defaultTable) {
    return defaultTable;
  }
  const raw: unknown = JSON.parse(fs.readFileSync(fileUrl, "utf8"));
  const table = createLanguageTable(raw);
  if (isDefault) {
    defaultTable = table;
  }
  return table;
};

export const listAvailableLanguages = (table: LanguageTable): string[] =>
  [...new Set([...table.names.keys(), ...table.variations.keys()])].sort();

/**
 * Resolves a language name, a known variation or a bare ISO code. Matching is
 * case-insensitive and ignores surrounding whitespace.
 */
export const resolveLanguageCode = (languageName: string, table: LanguageTable = loadLanguageTable()): string => {
  const normalized = languageName.trim().toLowerCase();
  const code = table.names.get(normalized) ?? table.variations.get(normalized);
  if (code) {
    return code;
  }
  if (table.codes.has(normalized)) {
    return normalized;
  }
  throw new UnsupportedLanguageError(normalized, listAvailableLanguages(table));
};

/** Display name used in translation prompts; falls back to the code itself. */
export const languageDisplayName = (code: string, table: LanguageTable = loadLanguageTable()): string => {
  for (const [name, candidate] of table.names) {
    if (candidate === code) {
      return name;
    }
  }
  return code;
};
