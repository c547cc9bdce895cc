/**
 * Company name normalizer.
 *
 * normalizeCompanyKey turns a free-form company name into the canonical key used
 * for clustering. It is pure and idempotent: feeding a key back in returns the
 * same key. Empty or punctuation-only input yields the empty key "", which the
 * clusterer treats as unclusterable.
 */
import { DEFAULT_ABBREVIATIONS, DEFAULT_LEGAL_SUFFIXES, SPECIAL_LETTERS } from "./vocabulary";

export interface KeyOptions {
  legalSuffixes?: readonly string[];
  abbreviations?: Readonly<Record<string, string>>;
  stripPrefixes?: readonly string[];
}

/** Sentinel key for names with nothing left to compare. */
export const EMPTY_KEY = "";

const LEADING_ARTICLES = ["the"];
const TRAILING_CONNECTORS = ["and"];

/**
 * Fold diacritics to base characters ("Société" -> "Societe", "Straße" -> "Strasse").
 * Non-Latin letters pass through unchanged.
 */
export function transliterate(text: string): string {
  let out = "";
  for (const ch of text.normalize("NFKD")) {
    out += SPECIAL_LETTERS[ch] ?? ch;
  }
  return out.replace(/\p{M}+/gu, "");
}

/** Trim and collapse internal whitespace; casing and punctuation are kept. */
export function cleanDisplayName(raw: string): string {
  return raw.trim().replace(/\s+/g, " ");
}

export function keyTokens(key: string): string[] {
  return key.split(" ").filter(Boolean);
}

export function normalizeCompanyKey(rawName: string, options: KeyOptions = {}): string {
  const suffixes = new Set(
    [...(options.legalSuffixes ?? DEFAULT_LEGAL_SUFFIXES), ...TRAILING_CONNECTORS].map((s) =>
      s.toLowerCase(),
    ),
  );
  const prefixes = new Set(
    [...(options.stripPrefixes ?? []), ...LEADING_ARTICLES].map((s) => s.toLowerCase()),
  );
  const abbreviations = new Map(
    Object.entries(options.abbreviations ?? DEFAULT_ABBREVIATIONS).map(
      ([from, to]) => [from.toLowerCase(), to.toLowerCase()] as const,
    ),
  );

  const folded = transliterate(rawName).toLowerCase();
  if (!/[\p{L}\p{N}]/u.test(folded)) return EMPTY_KEY;

  const cleaned = folded
    .replace(/[&+]/g, " and ")
    // "A.C.M.E" and "O'Neil" stay single tokens
    .replace(/['’.]/g, "")
    .replace(/[^\p{L}\p{N}]+/gu, " ");

  const tokens = keyTokens(cleaned).flatMap((token) => keyTokens(abbreviations.get(token) ?? token));

  let changed = true;
  while (changed) {
    changed = false;
    while (tokens.length > 1 && prefixes.has(tokens[0])) {
      tokens.shift();
      changed = true;
    }
    while (tokens.length > 1 && suffixes.has(tokens[tokens.length - 1])) {
      tokens.pop();
      changed = true;
    }
  }

  return tokens.join(" ");
}
