/**
 * Default vocabularies for company name normalization.
 * All of these can be overridden through the pipeline configuration.
 */

/** Legal-entity tokens stripped when they trail a name. */
export const DEFAULT_LEGAL_SUFFIXES = [
  "inc",
  "incorporated",
  "corp",
  "corporation",
  "llc",
  "llp",
  "lp",
  "ltd",
  "limited",
  "co",
  "company",
  "plc",
  "gmbh",
  "ag",
  "sa",
  "sarl",
  "srl",
  "spa",
  "bv",
  "nv",
  "oy",
  "ab",
  "pty",
  "pvt",
  "kk",
] as const;

/** Token-level expansions applied before suffix stripping. */
export const DEFAULT_ABBREVIATIONS: Record<string, string> = {
  intl: "international",
  ind: "industry",
  tech: "technology",
  elec: "electronic",
  mfg: "manufacturing",
  svcs: "services",
};

/** Letters NFKD leaves untouched, mapped to their usual ASCII spelling. */
export const SPECIAL_LETTERS: Record<string, string> = {
  "ß": "ss",
  "ẞ": "ss",
  "æ": "ae",
  "Æ": "ae",
  "œ": "oe",
  "Œ": "oe",
  "ø": "o",
  "Ø": "o",
  "ł": "l",
  "Ł": "l",
  "đ": "d",
  "Đ": "d",
  "þ": "th",
  "Þ": "th",
  "ı": "i",
};
